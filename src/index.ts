#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { AuditLogger } from './audit/logger.js';
import { loadRuntimeConfig } from './config/runtime.js';
import { networkConnectionChannel } from './notifications/channel.js';
import { NotificationRegistry } from './notifications/registry.js';
import { StatusLogObserver } from './notifications/status-log.js';
import { PanelBoard } from './panels/board.js';
import { createRelayServer } from './server/create-server.js';
import { serviceName, serviceVersion } from './version.js';

async function main(): Promise<void> {
  const config = loadRuntimeConfig();
  const auditLogger = new AuditLogger({
    ...config.audit,
    service: serviceName,
    serviceVersion
  });

  const registry = new NotificationRegistry({ auditLogger });
  const board = new PanelBoard(registry, config.panels.count);
  const statusLog = auditLogger.isEnabled()
    ? new StatusLogObserver({ registry, channel: networkConnectionChannel, auditLogger })
    : null;
  const server = createRelayServer({ registry, board, auditLogger });

  installShutdownHandlers(async () => {
    await server.close();
    board.disposeAll();
    statusLog?.dispose();
    await auditLogger.flush();
  });

  await server.connect(new StdioServerTransport());
  console.error(`[status-relay] running in stdio mode with ${config.panels.count} panels`);
}

function installShutdownHandlers(stop: () => Promise<void>): void {
  let shuttingDown = false;
  const shutdown = async (signal: 'SIGINT' | 'SIGTERM'): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    try {
      await stop();
    } catch (error) {
      console.error(`[status-relay] ${signal} shutdown error:`, error);
      process.exit(1);
      return;
    }

    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}

main().catch((error: unknown) => {
  console.error('[status-relay] fatal error:', error);
  process.exit(1);
});
