import type { AuditLogger } from '../audit/logger.js';
import type { NotificationChannel } from './channel.js';
import { Observer } from './observer.js';
import type { NotificationRegistry } from './registry.js';

export interface StatusLogObserverOptions<TStatus extends string> {
  registry: NotificationRegistry;
  channel: NotificationChannel<TStatus>;
  auditLogger: AuditLogger;
}

export class StatusLogObserver<TStatus extends string = string> extends Observer<TStatus> {
  private readonly auditLogger: AuditLogger;
  private readonly entries: TStatus[] = [];

  constructor(options: StatusLogObserverOptions<TStatus>) {
    super({ registry: options.registry, channel: options.channel });
    this.auditLogger = options.auditLogger;
  }

  get history(): readonly TStatus[] {
    return this.entries;
  }

  protected handleChange(status: TStatus): void {
    this.entries.push(status);
    void this.auditLogger.log({
      action: 'status.change',
      event: this.event,
      result: 'success',
      details: { status }
    });
  }
}
