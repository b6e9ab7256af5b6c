import { resolve } from 'node:path';
import { config as loadDotEnv } from 'dotenv';

export interface RuntimeConfig {
  panels: {
    count: number;
  };
  audit: {
    enabled: boolean;
    filePath: string;
    maxEventBytes: number;
    maxFileBytes: number;
    maxFiles: number;
  };
}

type ArgMap = Record<string, string>;

export function loadRuntimeConfig(argv = process.argv.slice(2), env = process.env): RuntimeConfig {
  loadDotEnv({ quiet: true });

  const args = parseArgs(argv);

  return {
    panels: {
      count: parsePositiveInteger(args.panels ?? env.RELAY_PANELS ?? '3', 'relay panel count', 64)
    },
    audit: {
      enabled: parseBoolean(args['audit-enabled'] ?? env.RELAY_AUDIT_ENABLED ?? 'false'),
      filePath: resolve(args['audit-file'] ?? env.RELAY_AUDIT_FILE ?? '.status-relay/audit.log'),
      maxEventBytes: parsePositiveInteger(
        args['audit-max-event-bytes'] ?? env.RELAY_AUDIT_MAX_EVENT_BYTES ?? '20000',
        'relay audit max event bytes',
        1_000_000
      ),
      maxFileBytes: parsePositiveInteger(
        args['audit-max-file-bytes'] ?? env.RELAY_AUDIT_MAX_FILE_BYTES ?? '10000000',
        'relay audit max file bytes',
        1_000_000_000
      ),
      maxFiles: parsePositiveInteger(
        args['audit-max-files'] ?? env.RELAY_AUDIT_MAX_FILES ?? '5',
        'relay audit max files',
        100
      )
    }
  };
}

function parseArgs(argv: string[]): ArgMap {
  const args: ArgMap = {};

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token || !token.startsWith('--')) {
      continue;
    }

    const name = token.slice(2);
    const eqIndex = name.indexOf('=');
    if (eqIndex > -1) {
      const key = name.slice(0, eqIndex);
      const value = name.slice(eqIndex + 1);
      if (key.length > 0 && value.length > 0) {
        args[key] = value;
      }
      continue;
    }

    const next = argv[i + 1];
    if (next && !next.startsWith('--')) {
      args[name] = next;
      i += 1;
      continue;
    }

    args[name] = 'true';
  }

  return args;
}

function parsePositiveInteger(value: string, label: string, max: number): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > max) {
    throw new Error(`Invalid ${label} "${value}". Expected 1-${max}.`);
  }

  return parsed;
}

function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }

  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }

  throw new Error(`Invalid boolean value "${value}".`);
}
