import { describe, expect, it, vi } from 'vitest';

import {
  defineOpenChannel,
  networkConnectionChannel,
  type NetworkConnectionStatus
} from '../src/notifications/channel.js';
import {
  Observer,
  ObserverContractError,
  UNKNOWN_STATUS,
  withObservers
} from '../src/notifications/observer.js';
import { NotificationRegistry } from '../src/notifications/registry.js';

class SeenObserver extends Observer<NetworkConnectionStatus> {
  readonly seen: string[] = [];

  protected handleChange(status: NetworkConnectionStatus): void {
    this.seen.push(status);
  }
}

describe('Observer', () => {
  it('starts with the unknown sentinel and subscribes on construction', () => {
    const registry = new NotificationRegistry();
    const observer = new SeenObserver({ registry, channel: networkConnectionChannel });

    expect(observer.status).toBe(UNKNOWN_STATUS);
    expect(observer.status).toBe('N/A');
    expect(observer.event).toBe('networkConnection');
    expect(observer.statusKey).toBe('networkStatusKey');
    expect(registry.isSubscribed('networkConnection', observer)).toBe(true);
  });

  it('updates status before running the reaction hook', () => {
    const registry = new NotificationRegistry();
    const observer = new SeenObserver({ registry, channel: networkConnectionChannel });

    const outcome = observer.onNotified({ networkStatusKey: 'connecting' });

    expect(outcome).toBe('applied');
    expect(observer.seen).toEqual(['connecting']);
  });

  it('ignores payloads without its key', () => {
    const registry = new NotificationRegistry();
    const observer = new SeenObserver({ registry, channel: networkConnectionChannel });

    expect(observer.onNotified({ batteryStatusKey: 'low' })).toBe('ignored');
    expect(observer.status).toBe('N/A');
    expect(observer.seen).toEqual([]);
  });

  it('ignores values outside the channel status set', () => {
    const registry = new NotificationRegistry();
    const observer = new SeenObserver({ registry, channel: networkConnectionChannel });

    registry.publish('networkConnection', { networkStatusKey: 'connected' });
    registry.publish('networkConnection', { networkStatusKey: 'rebooting' });

    expect(observer.status).toBe('connected');
    expect(observer.seen).toEqual(['connected']);
  });

  it('accepts any value on an open channel', () => {
    const registry = new NotificationRegistry();
    const channel = defineOpenChannel('locationChange', 'locationKey');
    const seen: string[] = [];
    class LocationObserver extends Observer {
      protected handleChange(status: string): void {
        seen.push(status);
      }
    }
    const observer = new LocationObserver({ registry, channel });

    registry.publish('locationChange', { locationKey: '52.52,13.40' });

    expect(observer.status).toBe('52.52,13.40');
    expect(seen).toEqual(['52.52,13.40']);
  });

  it('unsubscribes on dispose and tolerates repeated disposal', () => {
    const registry = new NotificationRegistry();
    const observer = new SeenObserver({ registry, channel: networkConnectionChannel });

    observer.dispose();
    observer.dispose();
    registry.publish('networkConnection', { networkStatusKey: 'connected' });

    expect(observer.isDisposed).toBe(true);
    expect(observer.status).toBe('N/A');
    expect(registry.subscriberCount('networkConnection')).toBe(0);
  });

  it('does not apply a delivery once disposed during the same publish', () => {
    const registry = new NotificationRegistry();

    class PairedObserver extends Observer<NetworkConnectionStatus> {
      partner: PairedObserver | null = null;
      readonly seen: string[] = [];

      protected handleChange(status: NetworkConnectionStatus): void {
        this.seen.push(status);
        this.partner?.dispose();
      }
    }

    const left = new PairedObserver({ registry, channel: networkConnectionChannel });
    const right = new PairedObserver({ registry, channel: networkConnectionChannel });
    left.partner = right;
    right.partner = left;

    registry.publish('networkConnection', { networkStatusKey: 'error' });

    const applied = [left, right].filter((observer) => observer.status === 'error');
    const skipped = [left, right].filter((observer) => observer.status === 'N/A');
    expect(applied).toHaveLength(1);
    expect(skipped).toHaveLength(1);
    expect(applied[0]?.seen).toEqual(['error']);
    expect(applied[0]?.isDisposed).toBe(false);
    expect(skipped[0]?.seen).toEqual([]);
    expect(skipped[0]?.isDisposed).toBe(true);
    expect(registry.subscriberCount('networkConnection')).toBe(1);
  });

  it('rejects a subclass that provides no reaction hook', () => {
    class Unfinished extends Observer {
      protected handleChange(): void {
        // removed below
      }
    }
    Reflect.deleteProperty(Unfinished.prototype, 'handleChange');

    const registry = new NotificationRegistry();

    expect(() => new Unfinished({ registry, channel: networkConnectionChannel })).toThrow(
      ObserverContractError
    );
    expect(() => new Unfinished({ registry, channel: networkConnectionChannel })).toThrow(
      'Unfinished must implement handleChange().'
    );
    expect(registry.subscriberCount('networkConnection')).toBe(0);
  });
});

describe('withObservers', () => {
  it('disposes every observer after the work returns', () => {
    const registry = new NotificationRegistry();
    const observers = [
      new SeenObserver({ registry, channel: networkConnectionChannel }),
      new SeenObserver({ registry, channel: networkConnectionChannel })
    ] as const;

    const result = withObservers(observers, ([first]) => {
      registry.publish('networkConnection', { networkStatusKey: 'connected' });
      return first.status;
    });

    expect(result).toBe('connected');
    expect(observers.every((observer) => observer.isDisposed)).toBe(true);
    expect(registry.subscriberCount('networkConnection')).toBe(0);
  });

  it('disposes every observer when the work throws', () => {
    const registry = new NotificationRegistry();
    const observer = new SeenObserver({ registry, channel: networkConnectionChannel });

    expect(() =>
      withObservers([observer], () => {
        throw new Error('work failed');
      })
    ).toThrow('work failed');
    expect(observer.isDisposed).toBe(true);
    expect(registry.isSubscribed('networkConnection', observer)).toBe(false);
  });

  it('disposes the remaining observers when one dispose throws', () => {
    const registry = new NotificationRegistry();
    const observer = new SeenObserver({ registry, channel: networkConnectionChannel });
    const failing = {
      dispose: () => {
        throw new Error('dispose failed');
      }
    };

    expect(() => withObservers([failing, observer], () => 1)).toThrow('dispose failed');
    expect(observer.isDisposed).toBe(true);
    expect(registry.isSubscribed('networkConnection', observer)).toBe(false);
  });

  it('rethrows the work error when a dispose also throws', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const registry = new NotificationRegistry();
    const observer = new SeenObserver({ registry, channel: networkConnectionChannel });
    const disposeError = new Error('dispose failed');
    const failing = {
      dispose: () => {
        throw disposeError;
      }
    };

    expect(() =>
      withObservers([failing, observer], () => {
        throw new Error('work failed');
      })
    ).toThrow('work failed');
    expect(observer.isDisposed).toBe(true);
    expect(errorSpy).toHaveBeenCalledWith(
      '[status-relay] observer dispose failed after work error:',
      disposeError
    );
    errorSpy.mockRestore();
  });
});
