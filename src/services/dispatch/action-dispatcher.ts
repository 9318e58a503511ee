/**
 * Action Dispatcher
 * Performs the side effects for a matched listing: notify every configured
 * channel and present the purchase link. Nothing is rolled back on failure.
 */

import type { Listing } from '../../adapters/base/feed-client.interface.js';
import {
  AlertType,
  type AlertPayload,
  type INotifier,
  type NotificationChannel,
  type NotificationResult,
} from '../../notifications/base/notifier.interface.js';
import type { IPurchaseAssist } from '../../purchase/purchase-assist.interface.js';
import { logger } from '../../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export type DispatchStage = 'notify' | 'present';

export class DispatchError extends Error {
  readonly listingId: string;
  readonly stage: DispatchStage;
  readonly channel?: NotificationChannel;

  constructor(
    stage: DispatchStage,
    listingId: string,
    message: string,
    options?: ErrorOptions & { channel?: NotificationChannel },
  ) {
    super(message, options);
    this.name = 'DispatchError';
    this.stage = stage;
    this.listingId = listingId;
    this.channel = options?.channel;
  }
}

export interface DispatchReport {
  listingId: string;
  purchaseUrl: string;
  notifications: NotificationResult[];
  presented: boolean;
  errors: DispatchError[];
}

export interface IActionDispatcher {
  dispatch(listing: Listing): Promise<DispatchReport>;

  /** Send a lifecycle alert to every channel; never rejects */
  broadcast(payload: AlertPayload): Promise<NotificationResult[]>;
}

// ============================================================================
// Action Dispatcher
// ============================================================================

export class ActionDispatcher implements IActionDispatcher {
  constructor(
    private readonly notifiers: Map<NotificationChannel, INotifier>,
    private readonly purchaseAssist: IPurchaseAssist,
    private readonly eventId: string,
  ) {}

  async dispatch(listing: Listing): Promise<DispatchReport> {
    const payload: AlertPayload = {
      alertType: AlertType.LISTING_FOUND,
      eventId: this.eventId,
      listing,
    };

    // Both side effects are started before either is awaited
    const notifyTasks = [...this.notifiers.values()].map(notifier =>
      this.notify(notifier, payload, listing.id),
    );
    const presentTask = this.present(listing);

    const [outcomes, presentError] = await Promise.all([Promise.all(notifyTasks), presentTask]);

    const errors: DispatchError[] = [];
    for (const outcome of outcomes) {
      if (outcome.error) errors.push(outcome.error);
    }
    if (presentError) errors.push(presentError);

    for (const error of errors) {
      logger.error(`[Dispatch] ${error.message}; purchase link: ${listing.purchaseUrl}`, {
        listingId: listing.id,
        stage: error.stage,
        channel: error.channel,
      });
    }

    return {
      listingId: listing.id,
      purchaseUrl: listing.purchaseUrl,
      notifications: outcomes.map(outcome => outcome.result),
      presented: presentError === null,
      errors,
    };
  }

  async broadcast(payload: AlertPayload): Promise<NotificationResult[]> {
    const outcomes = await Promise.all(
      [...this.notifiers.values()].map(notifier => this.notify(notifier, payload, null)),
    );

    for (const { error } of outcomes) {
      if (error) {
        logger.warn(`[Dispatch] ${error.message}`, { alertType: payload.alertType });
      }
    }

    return outcomes.map(outcome => outcome.result);
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  private async notify(
    notifier: INotifier,
    payload: AlertPayload,
    listingId: string | null,
  ): Promise<{ result: NotificationResult; error: DispatchError | null }> {
    const label = listingId ?? payload.alertType;
    let result: NotificationResult;

    try {
      result = await notifier.sendAlert(payload);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      result = {
        success: false,
        channel: notifier.channel,
        error: message,
        timestamp: new Date(),
        deliveryStatus: 'failed',
      };
    }

    if (result.success) {
      return { result, error: null };
    }

    return {
      result,
      error: new DispatchError(
        'notify',
        label,
        `Notification via ${notifier.channel} failed for ${label}: ${result.error ?? 'unknown error'}`,
        { channel: notifier.channel },
      ),
    };
  }

  private async present(listing: Listing): Promise<DispatchError | null> {
    try {
      await this.purchaseAssist.present(listing.purchaseUrl, listing);
      return null;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return new DispatchError(
        'present',
        listing.id,
        `Purchase link (${this.purchaseAssist.mode}) failed for ${listing.id}: ${message}`,
        { cause: error },
      );
    }
  }
}
