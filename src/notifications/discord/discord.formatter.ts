/**
 * Discord Message Formatter
 * Formats alerts as Discord webhook embeds
 */

import type { DeliveryMethod, Listing } from '../../adapters/base/feed-client.interface.js';
import { AlertType, type AlertPayload } from '../base/notifier.interface.js';

// ============================================================================
// Discord Webhook Types
// ============================================================================

export interface DiscordEmbedField {
  name: string;
  value: string;
  inline?: boolean;
}

export interface DiscordEmbed {
  title: string;
  description?: string;
  url?: string;
  color: number;
  fields?: DiscordEmbedField[];
  timestamp?: string;
  footer?: { text: string };
}

export interface DiscordWebhookMessage {
  embeds: DiscordEmbed[];
}

// Discord rejects embeds over these sizes
const LIMITS = {
  title: 256,
  description: 4096,
  fieldName: 256,
  fieldValue: 1024,
} as const;

const COLORS = {
  found: 0x00ff00,
  started: 0x0099ff,
  fatal: 0xff0000,
  stopped: 0x808080,
  degraded: 0xffa500,
} as const;

const FOOTER = { text: 'ticket-sentinel' };

// ============================================================================
// Discord Formatter
// ============================================================================

export class DiscordFormatter {
  /**
   * Format a full webhook message for any alert type
   */
  formatAlert(payload: AlertPayload): DiscordWebhookMessage {
    return { embeds: [this.formatEmbed(payload)] };
  }

  private formatEmbed(payload: AlertPayload): DiscordEmbed {
    switch (payload.alertType) {
      case AlertType.LISTING_FOUND:
        return this.formatListing(payload.eventId, payload.listing);

      case AlertType.MONITOR_STARTED:
        return {
          title: '🚀 Monitor Started',
          description: this.truncate(`Watching event ${this.escapeMarkdown(payload.eventId)}`, LIMITS.description),
          url: payload.eventUrl,
          color: COLORS.started,
          footer: FOOTER,
        };

      case AlertType.MONITOR_STOPPED:
        return {
          title: payload.fatal ? '🛑 Monitor Stopped' : '⏹️ Monitor Stopped',
          description: this.truncate(this.escapeMarkdown(payload.reason), LIMITS.description),
          color: payload.fatal ? COLORS.fatal : COLORS.stopped,
          fields: [this.field('Event', payload.eventId, true)],
          footer: FOOTER,
        };

      case AlertType.MONITOR_DEGRADED:
        return {
          title: '⚠️ Monitor Degraded',
          description: `${payload.consecutiveFailures} consecutive failed polls`,
          color: COLORS.degraded,
          fields: [
            this.field('Event', payload.eventId, true),
            this.field('Last error', payload.lastError),
          ],
          footer: FOOTER,
        };
    }
  }

  /**
   * Format a matched listing
   */
  private formatListing(eventId: string, listing: Listing): DiscordEmbed {
    const fields: DiscordEmbedField[] = [
      this.field('Price', this.formatPrice(listing.price, listing.currency), true),
      this.field('Seats', listing.seatCount === null ? '?' : String(listing.seatCount), true),
      this.field('Delivery', this.formatDelivery(listing.deliveryMethod), true),
    ];

    const location = [listing.section, listing.row].filter(part => part.length > 0).join(' / ');
    if (location) {
      fields.push(this.field('Section/Row', location, true));
    }

    // Links are not escaped; Discord only parses them inside []()
    fields.push({ name: 'Link', value: this.truncate(`[Buy now](${listing.purchaseUrl})`, LIMITS.fieldValue) });

    const description = [listing.area, listing.ticketType].filter(part => part.length > 0).join(' · ');

    return {
      title: '🎯 Ticket Found!',
      description: this.truncate(
        this.escapeMarkdown(description ? `${description} (event ${eventId})` : `Event ${eventId}`),
        LIMITS.description,
      ),
      url: listing.purchaseUrl,
      color: COLORS.found,
      fields,
      timestamp: listing.capturedAt.toISOString(),
      footer: FOOTER,
    };
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  /**
   * Format a per-ticket price, e.g. £45.00
   */
  formatPrice(price: number | null, currency: string): string {
    if (price === null) return '?';

    try {
      return new Intl.NumberFormat('en-GB', { style: 'currency', currency }).format(price);
    } catch {
      // Unknown ISO code
      return `${price.toFixed(2)} ${currency}`;
    }
  }

  private formatDelivery(method: DeliveryMethod | null): string {
    switch (method) {
      case 'electronic':
        return 'Electronic';
      case 'meetup':
        return 'Meetup';
      case 'other':
        return 'Other';
      case null:
        return 'Unknown';
    }
  }

  private field(name: string, value: string, inline = false): DiscordEmbedField {
    return {
      name: this.truncate(name, LIMITS.fieldName),
      value: this.truncate(this.escapeMarkdown(value) || '-', LIMITS.fieldValue),
      inline,
    };
  }

  /**
   * Escape Discord markdown: \ * _ ~ ` | >
   */
  escapeMarkdown(text: string): string {
    return text.replace(/[\\*_~`|>]/g, '\\$&');
  }

  truncate(text: string, max: number): string {
    return text.length <= max ? text : `${text.slice(0, max - 1)}…`;
  }
}
