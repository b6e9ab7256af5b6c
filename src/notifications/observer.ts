import type { EventName, NotificationChannel, NotificationPayload, PayloadKey } from './channel.js';
import type { DeliveryOutcome, NotificationReceiver, NotificationRegistry } from './registry.js';

export const UNKNOWN_STATUS = 'N/A';

export class ObserverContractError extends Error {
  constructor(observerName: string) {
    super(`${observerName} must implement handleChange().`);
    this.name = 'ObserverContractError';
  }
}

export interface ObserverOptions<TStatus extends string> {
  registry: NotificationRegistry;
  channel: NotificationChannel<TStatus>;
}

/**
 * Base class for anything that reacts to one notification channel.
 *
 * The observer subscribes itself on construction and stays subscribed until
 * {@link Observer.dispose} is called. Callers own that obligation; use
 * {@link withObservers} when the observers live for a bounded piece of work.
 */
export abstract class Observer<TStatus extends string = string> implements NotificationReceiver {
  readonly event: EventName;
  readonly statusKey: PayloadKey;
  private readonly channel: NotificationChannel<TStatus>;
  private readonly registry: NotificationRegistry;
  private currentStatus: TStatus | typeof UNKNOWN_STATUS = UNKNOWN_STATUS;
  private disposed = false;

  constructor(options: ObserverOptions<TStatus>) {
    if (typeof Reflect.get(this, 'handleChange') !== 'function') {
      throw new ObserverContractError(new.target.name);
    }

    this.channel = options.channel;
    this.registry = options.registry;
    this.event = options.channel.event;
    this.statusKey = options.channel.statusKey;
    this.registry.subscribe(this.event, this);
  }

  get status(): TStatus | typeof UNKNOWN_STATUS {
    return this.currentStatus;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  onNotified(payload: NotificationPayload): DeliveryOutcome {
    if (this.disposed) {
      return 'ignored';
    }

    const raw = payload[this.statusKey];
    if (raw === undefined) {
      return 'ignored';
    }

    const parsed = this.channel.statuses.safeParse(raw);
    if (!parsed.success) {
      return 'ignored';
    }

    this.currentStatus = parsed.data;
    this.handleChange(parsed.data);
    return 'applied';
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }

    this.disposed = true;
    this.registry.unsubscribe(this.event, this);
  }

  // Runs after status has been updated; receives the value just applied.
  protected abstract handleChange(status: TStatus): void;
}

/**
 * Runs `work`, then disposes every observer even when `work` or another
 * observer's dispose throws. The error from `work` wins; otherwise the first
 * dispose error is rethrown.
 */
export function withObservers<TObservers extends readonly { dispose(): void }[], TResult>(
  observers: TObservers,
  work: (observers: TObservers) => TResult
): TResult {
  let result: TResult;
  try {
    result = work(observers);
  } catch (error) {
    const disposeFailure = disposeEach(observers);
    if (disposeFailure) {
      console.error('[status-relay] observer dispose failed after work error:', disposeFailure.error);
    }
    throw error;
  }

  const disposeFailure = disposeEach(observers);
  if (disposeFailure) {
    throw disposeFailure.error;
  }

  return result;
}

function disposeEach(observers: readonly { dispose(): void }[]): { error: unknown } | null {
  let firstFailure: { error: unknown } | null = null;
  for (const observer of observers) {
    try {
      observer.dispose();
    } catch (error) {
      if (!firstFailure) {
        firstFailure = { error };
      }
    }
  }

  return firstFailure;
}
