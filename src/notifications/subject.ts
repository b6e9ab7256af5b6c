import type { EventName, NotificationChannel, PayloadKey } from './channel.js';
import type { NotificationRegistry } from './registry.js';

export interface SubjectOptions<TStatus extends string> {
  registry: NotificationRegistry;
  channel: NotificationChannel<TStatus>;
}

export class Subject<TStatus extends string = string> {
  readonly event: EventName;
  readonly statusKey: PayloadKey;
  private readonly registry: NotificationRegistry;

  constructor(options: SubjectOptions<TStatus>) {
    this.registry = options.registry;
    this.event = options.channel.event;
    this.statusKey = options.channel.statusKey;
  }

  notify(changeTo: TStatus): void {
    this.registry.publish(this.event, { [this.statusKey]: changeTo });
  }
}
