import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import type { AuditLogger } from '../audit/logger.js';
import {
  NetworkConnectionStatusSchema,
  networkConnectionChannel,
  type NetworkConnectionStatus
} from '../notifications/channel.js';
import type { NotificationRegistry } from '../notifications/registry.js';
import { Subject } from '../notifications/subject.js';
import type { PanelBoard, PanelSnapshot } from '../panels/board.js';
import { serviceName, serviceVersion } from '../version.js';

const HealthOutputSchema = {
  status: z.literal('ok'),
  service: z.string(),
  version: z.string(),
  uptimeSeconds: z.number().int().nonnegative()
};

const PanelsOutputSchema = {
  panels: z.array(
    z.object({
      id: z.string(),
      status: z.string(),
      color: z.enum(['gray', 'green', 'red']),
      disposed: z.boolean()
    })
  )
};

const SetStatusInputSchema = {
  status: NetworkConnectionStatusSchema.describe('New network connection status to broadcast')
};

const ToggleInputSchema = {
  on: z.boolean().describe('Switch position: on means connected, off means disconnected')
};

const DisposeInputSchema = {
  id: z.string().min(1).describe('Panel id, e.g. panel-0')
};

const DisposeOutputSchema = {
  id: z.string(),
  alreadyDisposed: z.boolean()
};

const StatsOutputSchema = {
  events: z.array(
    z.object({
      event: z.string(),
      subscribers: z.number().int().nonnegative()
    })
  )
};

const textItem = (text: string) => ({ type: 'text' as const, text });

export interface CreateRelayServerOptions {
  registry: NotificationRegistry;
  board: PanelBoard;
  auditLogger?: AuditLogger;
}

export function createRelayServer(options: CreateRelayServerOptions): McpServer {
  const startedAt = Date.now();
  const { registry, board, auditLogger } = options;
  const network = new Subject<NetworkConnectionStatus>({
    registry,
    channel: networkConnectionChannel
  });

  const server = new McpServer(
    {
      name: serviceName,
      version: serviceVersion
    },
    {
      capabilities: {
        logging: {}
      }
    }
  );

  const broadcast = (status: NetworkConnectionStatus, tool: string): CallToolResult => {
    network.notify(status);
    void auditLogger?.log({
      action: 'relay.tool',
      target: tool,
      event: network.event,
      result: 'success',
      details: { status }
    });

    return panelsResult(board.list());
  };

  server.registerTool(
    'relay.health',
    {
      title: 'Relay Health',
      description: 'Return relay liveness and uptime info',
      outputSchema: HealthOutputSchema
    },
    async (): Promise<CallToolResult> => {
      const output = {
        status: 'ok' as const,
        service: serviceName,
        version: serviceVersion,
        uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000)
      };

      return {
        content: [textItem(JSON.stringify(output))],
        structuredContent: output
      };
    }
  );

  server.registerTool(
    'network.set_status',
    {
      title: 'Set Network Status',
      description: 'Broadcast a network connection status to every subscribed panel',
      inputSchema: SetStatusInputSchema,
      outputSchema: PanelsOutputSchema
    },
    async ({ status }): Promise<CallToolResult> => broadcast(status, 'network.set_status')
  );

  server.registerTool(
    'network.toggle',
    {
      title: 'Toggle Network Switch',
      description: 'Broadcast connected when the switch is on and disconnected when it is off',
      inputSchema: ToggleInputSchema,
      outputSchema: PanelsOutputSchema
    },
    async ({ on }): Promise<CallToolResult> =>
      broadcast(on ? 'connected' : 'disconnected', 'network.toggle')
  );

  server.registerTool(
    'panels.list',
    {
      title: 'List Panels',
      description: 'Return every panel with its last status and color',
      outputSchema: PanelsOutputSchema
    },
    async (): Promise<CallToolResult> => panelsResult(board.list())
  );

  server.registerTool(
    'panels.dispose',
    {
      title: 'Dispose Panel',
      description: 'Unsubscribe a panel handler so it stops receiving status changes',
      inputSchema: DisposeInputSchema,
      outputSchema: DisposeOutputSchema
    },
    async ({ id }): Promise<CallToolResult> => {
      const result = board.dispose(id);
      if (!result.found) {
        return {
          isError: true,
          content: [textItem(`Panel not found: ${id}`)]
        };
      }

      void auditLogger?.log({
        action: 'relay.tool',
        target: 'panels.dispose',
        result: result.alreadyDisposed ? 'ignored' : 'success',
        details: { id }
      });

      const output = { id, alreadyDisposed: result.alreadyDisposed };
      return {
        content: [textItem(JSON.stringify(output))],
        structuredContent: output
      };
    }
  );

  server.registerTool(
    'registry.stats',
    {
      title: 'Registry Stats',
      description: 'Return the subscriber count of every event with at least one subscriber',
      outputSchema: StatsOutputSchema
    },
    async (): Promise<CallToolResult> => {
      const output = {
        events: registry.events().map((event) => ({
          event,
          subscribers: registry.subscriberCount(event)
        }))
      };

      return {
        content: [textItem(JSON.stringify(output))],
        structuredContent: output
      };
    }
  );

  server.registerResource(
    'service.meta',
    'relay://service/meta',
    {
      title: 'Service Metadata',
      description: 'Basic metadata for this relay',
      mimeType: 'application/json'
    },
    async (uri) => {
      const payload = {
        name: serviceName,
        version: serviceVersion,
        transports: ['stdio'],
        channels: [
          {
            event: networkConnectionChannel.event,
            statusKey: networkConnectionChannel.statusKey,
            statuses: NetworkConnectionStatusSchema.options
          }
        ]
      };

      return {
        contents: [
          {
            uri: uri.href,
            mimeType: 'application/json',
            text: JSON.stringify(payload, null, 2)
          }
        ]
      };
    }
  );

  return server;
}

function panelsResult(panels: PanelSnapshot[]): CallToolResult {
  return {
    content: [textItem(JSON.stringify(panels, null, 2))],
    structuredContent: { panels }
  };
}
