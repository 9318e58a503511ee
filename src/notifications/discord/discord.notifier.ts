/**
 * Discord Notifier
 * Sends alerts through a Discord webhook
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type {
  INotifier,
  AlertPayload,
  NotificationResult,
  NotificationChannel,
} from '../base/notifier.interface.js';
import { toFeedError } from '../../adapters/base/feed-errors.js';
import { DiscordFormatter } from './discord.formatter.js';
import { logger, logAlertDelivery } from '../../utils/logger.js';

const WEBHOOK_HOSTS = new Set(['discord.com', 'discordapp.com', 'canary.discord.com', 'ptb.discord.com']);

export interface DiscordNotifierConfig {
  webhookUrl: string;
  /** Request timeout in ms */
  timeout: number;
}

interface DiscordMessageResponse {
  id?: string;
}

/**
 * Check that a URL looks like https://discord.com/api/webhooks/{id}/{token}
 */
export function isDiscordWebhookUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return (
      url.protocol === 'https:' &&
      WEBHOOK_HOSTS.has(url.hostname) &&
      /^\/api(\/v\d+)?\/webhooks\/[^/]+\/[^/]+\/?$/.test(url.pathname)
    );
  } catch {
    return false;
  }
}

// ============================================================================
// Discord Notifier Implementation
// ============================================================================

export class DiscordNotifier implements INotifier {
  readonly channel: NotificationChannel = 'discord';

  private client: AxiosInstance;
  private formatter: DiscordFormatter;
  private isInitialized: boolean = false;

  constructor(private readonly config: DiscordNotifierConfig, adapter?: AxiosAdapter) {
    this.formatter = new DiscordFormatter();
    this.client = axios.create({
      timeout: config.timeout,
      adapter,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  // ==========================================================================
  // Initialization
  // ==========================================================================

  async initialize(): Promise<void> {
    if (this.isInitialized) return;

    if (!isDiscordWebhookUrl(this.config.webhookUrl)) {
      throw new Error('Discord webhook URL is not a valid https://discord.com/api/webhooks/ URL');
    }

    logger.info('[Discord] Webhook notifier initialized');
    this.isInitialized = true;
  }

  // ==========================================================================
  // Send Alert
  // ==========================================================================

  async sendAlert(payload: AlertPayload): Promise<NotificationResult> {
    const startTime = Date.now();

    try {
      await this.initialize();

      const message = this.formatter.formatAlert(payload);

      // wait=true makes Discord return the created message
      const response = await this.client.post<DiscordMessageResponse>(this.config.webhookUrl, message, {
        params: { wait: true },
      });

      const messageId = response.data?.id;
      logAlertDelivery('discord', payload.eventId, true, messageId);

      logger.debug(`[Discord] Alert sent`, {
        alertType: payload.alertType,
        messageId,
        latency: Date.now() - startTime,
      });

      return {
        success: true,
        channel: 'discord',
        messageId,
        timestamp: new Date(),
        deliveryStatus: 'delivered',
      };
    } catch (error) {
      const errorMessage = toFeedError(error, { platform: 'discord', operation: 'webhook' }).message;

      logAlertDelivery('discord', payload.eventId, false, undefined, errorMessage);

      logger.error(`[Discord] Failed to send alert`, {
        alertType: payload.alertType,
        error: errorMessage,
        latency: Date.now() - startTime,
      });

      return {
        success: false,
        channel: 'discord',
        error: errorMessage,
        timestamp: new Date(),
        deliveryStatus: 'failed',
      };
    }
  }
}
