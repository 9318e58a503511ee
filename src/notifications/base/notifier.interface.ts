/**
 * Notifier Interface
 * Defines the contract for notification channels
 */

import type { Listing } from '../../adapters/base/feed-client.interface.js';

// ============================================================================
// Notification Channel Types
// ============================================================================

export type NotificationChannel = 'discord';

// ============================================================================
// Alert Payload Types
// ============================================================================

export enum AlertType {
  /** A listing passed the filter and was admitted */
  LISTING_FOUND = 'listing_found',

  /** The monitor started polling */
  MONITOR_STARTED = 'monitor_started',

  /** The monitor stopped, gracefully or on a fatal error */
  MONITOR_STOPPED = 'monitor_stopped',

  /** Consecutive failures reached the escalation threshold */
  MONITOR_DEGRADED = 'monitor_degraded',
}

export interface ListingFoundAlert {
  alertType: AlertType.LISTING_FOUND;
  eventId: string;
  listing: Listing;
}

export interface MonitorStartedAlert {
  alertType: AlertType.MONITOR_STARTED;
  eventId: string;
  eventUrl: string;
}

export interface MonitorStoppedAlert {
  alertType: AlertType.MONITOR_STOPPED;
  eventId: string;
  reason: string;
  fatal: boolean;
}

export interface MonitorDegradedAlert {
  alertType: AlertType.MONITOR_DEGRADED;
  eventId: string;
  consecutiveFailures: number;
  lastError: string;
}

export type AlertPayload =
  | ListingFoundAlert
  | MonitorStartedAlert
  | MonitorStoppedAlert
  | MonitorDegradedAlert;

// ============================================================================
// Notification Result Types
// ============================================================================

export type DeliveryStatus = 'delivered' | 'failed';

export interface NotificationResult {
  success: boolean;
  channel: NotificationChannel;
  messageId?: string;
  error?: string;
  timestamp: Date;
  deliveryStatus: DeliveryStatus;
}

// ============================================================================
// Notifier Interface
// ============================================================================

export interface INotifier {
  /** The notification channel this notifier handles */
  readonly channel: NotificationChannel;

  /**
   * Validate configuration before the first alert
   * @throws Error if the channel cannot be used
   */
  initialize(): Promise<void>;

  /**
   * Send an alert. Delivery failures are reported in the result, not thrown.
   */
  sendAlert(payload: AlertPayload): Promise<NotificationResult>;
}
