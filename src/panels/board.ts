import { NetworkConnectionHandler, type PanelColor, type StatusPanel } from '../notifications/network.js';
import type { NotificationRegistry } from '../notifications/registry.js';

export interface PanelSnapshot {
  id: string;
  status: string;
  color: PanelColor;
  disposed: boolean;
}

export interface PanelDisposeResult {
  found: boolean;
  alreadyDisposed: boolean;
}

class InMemoryPanel implements StatusPanel {
  readonly id: string;
  color: PanelColor = 'gray';

  constructor(id: string) {
    this.id = id;
  }

  paint(color: PanelColor): void {
    this.color = color;
  }
}

interface BoardEntry {
  panel: InMemoryPanel;
  handler: NetworkConnectionHandler;
}

/**
 * A fixed set of status panels, each recolored by its own network handler.
 */
export class PanelBoard {
  private readonly entries = new Map<string, BoardEntry>();

  constructor(registry: NotificationRegistry, count: number) {
    for (let idx = 0; idx < count; idx += 1) {
      const panel = new InMemoryPanel(`panel-${idx}`);
      this.entries.set(panel.id, {
        panel,
        handler: new NetworkConnectionHandler(registry, panel)
      });
    }
  }

  list(): PanelSnapshot[] {
    return [...this.entries.values()].map(({ panel, handler }) => ({
      id: panel.id,
      status: handler.status,
      color: panel.color,
      disposed: handler.isDisposed
    }));
  }

  dispose(id: string): PanelDisposeResult {
    const entry = this.entries.get(id);
    if (!entry) {
      return { found: false, alreadyDisposed: false };
    }

    const alreadyDisposed = entry.handler.isDisposed;
    entry.handler.dispose();
    return { found: true, alreadyDisposed };
  }

  disposeAll(): void {
    for (const { handler } of this.entries.values()) {
      handler.dispose();
    }
  }
}
