import { appendFile, mkdir, rename, rm, stat } from 'node:fs/promises';
import { dirname } from 'node:path';

export interface AuditLoggerOptions {
  enabled: boolean;
  filePath: string;
  maxEventBytes: number;
  maxFileBytes: number;
  maxFiles: number;
  service: string;
  serviceVersion: string;
}

export type AuditAction =
  | 'listener.subscribe'
  | 'listener.unsubscribe'
  | 'listener.failure'
  | 'notification.publish'
  | 'status.change'
  | 'relay.tool';

export interface AuditEvent {
  action: AuditAction;
  event?: string;
  target?: string;
  result: 'success' | 'error' | 'ignored';
  details?: Record<string, unknown>;
}

/**
 * Appends relay activity to a JSONL file. Writes are chained so lines keep
 * call order; a failed write never rejects the caller.
 */
export class AuditLogger {
  private readonly options: AuditLoggerOptions;
  private pending: Promise<void> = Promise.resolve();

  constructor(options: AuditLoggerOptions) {
    this.options = options;
  }

  isEnabled(): boolean {
    return this.options.enabled;
  }

  log(event: AuditEvent): Promise<void> {
    if (!this.options.enabled) {
      return Promise.resolve();
    }

    const entry = {
      timestamp: new Date().toISOString(),
      service: this.options.service,
      serviceVersion: this.options.serviceVersion,
      ...redactEvent(event)
    };

    this.pending = this.pending
      .then(() => this.append(this.encode(entry)))
      .catch((error: unknown) => {
        console.error('[status-relay] audit write failed:', error);
      });

    return this.pending;
  }

  flush(): Promise<void> {
    return this.pending;
  }

  private encode(entry: Record<string, unknown>): string {
    const line = JSON.stringify(entry);
    if (Buffer.byteLength(line, 'utf8') <= this.options.maxEventBytes) {
      return line;
    }

    return JSON.stringify({
      ...entry,
      details: {
        truncated: true,
        reason: `entry exceeds ${this.options.maxEventBytes} bytes`
      }
    });
  }

  private async append(line: string): Promise<void> {
    const { filePath } = this.options;
    await mkdir(dirname(filePath), { recursive: true });

    const size = await fileSize(filePath);
    if (size + Buffer.byteLength(`${line}\n`, 'utf8') > this.options.maxFileBytes) {
      await this.rotate();
    }

    await appendFile(filePath, `${line}\n`, 'utf8');
  }

  private async rotate(): Promise<void> {
    const { filePath, maxFiles } = this.options;
    await rm(`${filePath}.${maxFiles}`, { force: true });
    for (let generation = maxFiles - 1; generation >= 1; generation -= 1) {
      await moveIfPresent(`${filePath}.${generation}`, `${filePath}.${generation + 1}`);
    }
    await moveIfPresent(filePath, `${filePath}.1`);
  }
}

async function fileSize(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch (error) {
    if (isMissingFile(error)) {
      return 0;
    }

    throw error;
  }
}

async function moveIfPresent(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (error) {
    if (!isMissingFile(error)) {
      throw error;
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

const sensitiveKeyPattern =
  /(?:token|password|secret|authorization|cookie|api[-_]?key|bearer|credential)/i;

function redactEvent(event: AuditEvent): AuditEvent {
  if (!event.details) {
    return event;
  }

  return { ...event, details: redactRecord(event.details, 0) };
}

function redactRecord(input: Record<string, unknown>, depth: number): Record<string, unknown> {
  const output: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    output[key] = sensitiveKeyPattern.test(key) ? '[REDACTED]' : redactValue(value, depth + 1);
  }

  return output;
}

function redactValue(value: unknown, depth: number): unknown {
  if (depth > 8) {
    return '[TRUNCATED_DEPTH]';
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => redactValue(item, depth + 1));
  }

  if (isPlainRecord(value)) {
    return redactRecord(value, depth);
  }

  return value;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
