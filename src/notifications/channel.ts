import { z } from 'zod';

export type EventName = string;
export type PayloadKey = string;

export type NotificationPayload = Readonly<Partial<Record<PayloadKey, string>>>;

export const NotificationNames = {
  networkConnection: 'networkConnection',
  batteryStatus: 'batteryStatus',
  locationChange: 'locationChange'
} as const satisfies Record<string, EventName>;

export const StatusKeys = {
  networkStatusKey: 'networkStatusKey'
} as const satisfies Record<string, PayloadKey>;

/**
 * An event name, the payload key its notifications carry, and the closed set
 * of status values both sides of the channel agree on.
 */
export interface NotificationChannel<TStatus extends string = string> {
  readonly event: EventName;
  readonly statusKey: PayloadKey;
  readonly statuses: z.ZodType<TStatus>;
}

export function defineChannel<TStatus extends string>(
  event: EventName,
  statusKey: PayloadKey,
  statuses: z.ZodType<TStatus>
): NotificationChannel<TStatus> {
  if (event.trim().length === 0) {
    throw new Error('Notification event name must not be empty.');
  }

  if (statusKey.trim().length === 0) {
    throw new Error(`Payload key for "${event}" must not be empty.`);
  }

  return { event, statusKey, statuses };
}

// Channels whose values are not a closed set.
export function defineOpenChannel(
  event: EventName,
  statusKey: PayloadKey
): NotificationChannel<string> {
  return defineChannel(event, statusKey, z.string());
}

export const NetworkConnectionStatusSchema = z.enum([
  'connected',
  'disconnected',
  'connecting',
  'disconnecting',
  'error'
]);

export type NetworkConnectionStatus = z.infer<typeof NetworkConnectionStatusSchema>;

export const networkConnectionChannel = defineChannel(
  NotificationNames.networkConnection,
  StatusKeys.networkStatusKey,
  NetworkConnectionStatusSchema
);
