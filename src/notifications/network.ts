import { networkConnectionChannel, type NetworkConnectionStatus } from './channel.js';
import { Observer } from './observer.js';
import type { NotificationRegistry } from './registry.js';

export type PanelColor = 'gray' | 'green' | 'red';

export interface StatusPanel {
  readonly id: string;
  paint(color: PanelColor): void;
}

export class NetworkConnectionHandler extends Observer<NetworkConnectionStatus> {
  readonly panel: StatusPanel;

  constructor(registry: NotificationRegistry, panel: StatusPanel) {
    super({ registry, channel: networkConnectionChannel });
    this.panel = panel;
  }

  protected handleChange(status: NetworkConnectionStatus): void {
    this.panel.paint(status === 'connected' ? 'green' : 'red');
  }
}
