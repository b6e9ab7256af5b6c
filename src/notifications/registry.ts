import type { AuditLogger } from '../audit/logger.js';
import type { EventName, NotificationPayload } from './channel.js';

export type DeliveryOutcome = 'applied' | 'ignored';

export interface NotificationReceiver {
  onNotified(payload: NotificationPayload): DeliveryOutcome;
}

export interface DeliveryFailure {
  event: EventName;
  receiver: NotificationReceiver;
  error: unknown;
}

export interface NotificationRegistryOptions {
  auditLogger?: AuditLogger;
  onDeliveryError?: (failure: DeliveryFailure) => void;
}

/**
 * Subscription table and synchronous dispatch. Receivers are held until they
 * unsubscribe; the registry never disposes them on its own.
 */
export class NotificationRegistry {
  private readonly subscribers = new Map<EventName, Set<NotificationReceiver>>();
  private readonly auditLogger?: AuditLogger;
  private readonly onDeliveryError: (failure: DeliveryFailure) => void;

  constructor(options: NotificationRegistryOptions = {}) {
    this.auditLogger = options.auditLogger;
    this.onDeliveryError = options.onDeliveryError ?? reportDeliveryError;
  }

  subscribe(event: EventName, receiver: NotificationReceiver): void {
    let receivers = this.subscribers.get(event);
    if (!receivers) {
      receivers = new Set();
      this.subscribers.set(event, receivers);
    }

    if (receivers.has(receiver)) {
      return;
    }

    receivers.add(receiver);
    void this.auditLogger?.log({
      action: 'listener.subscribe',
      event,
      result: 'success',
      details: { subscribers: receivers.size }
    });
  }

  unsubscribe(event: EventName, receiver: NotificationReceiver): void {
    const receivers = this.subscribers.get(event);
    if (!receivers || !receivers.delete(receiver)) {
      return;
    }

    if (receivers.size === 0) {
      this.subscribers.delete(event);
    }

    void this.auditLogger?.log({
      action: 'listener.unsubscribe',
      event,
      result: 'success',
      details: { subscribers: receivers.size }
    });
  }

  publish(event: EventName, payload: NotificationPayload): void {
    const snapshot = [...(this.subscribers.get(event) ?? [])];
    let applied = 0;
    let ignored = 0;
    let failed = 0;

    for (const receiver of snapshot) {
      try {
        if (receiver.onNotified(payload) === 'applied') {
          applied += 1;
        } else {
          ignored += 1;
        }
      } catch (error) {
        failed += 1;
        this.onDeliveryError({ event, receiver, error });
        void this.auditLogger?.log({
          action: 'listener.failure',
          event,
          result: 'error',
          details: { message: error instanceof Error ? error.message : String(error) }
        });
      }
    }

    void this.auditLogger?.log({
      action: 'notification.publish',
      event,
      result: failed > 0 ? 'error' : 'success',
      details: {
        payload,
        subscribers: snapshot.length,
        applied,
        ignored,
        failed
      }
    });
  }

  isSubscribed(event: EventName, receiver: NotificationReceiver): boolean {
    return this.subscribers.get(event)?.has(receiver) ?? false;
  }

  subscriberCount(event: EventName): number {
    return this.subscribers.get(event)?.size ?? 0;
  }

  events(): EventName[] {
    return [...this.subscribers.keys()].sort((a, b) => a.localeCompare(b));
  }
}

function reportDeliveryError(failure: DeliveryFailure): void {
  console.error(`[status-relay] listener failed on "${failure.event}":`, failure.error);
}
