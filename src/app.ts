/**
 * Ticket Sentinel application
 * Wires configuration into the session, feed, filter, ledger, dispatcher
 * and monitor, and owns their lifecycle.
 */

import type { AxiosAdapter } from 'axios';
import type { AppConfig } from './config/index.js';
import { ConfigError } from './config/index.js';
import { TwicketsAuthClient, TwicketsFeedClient } from './adapters/twickets/index.js';
import { SessionProvider } from './services/session/session-provider.js';
import { DedupLedger } from './services/dedup/dedup-ledger.js';
import { ActionDispatcher } from './services/dispatch/action-dispatcher.js';
import {
  MonitorService,
  type MonitorOutcome,
  type MonitorStatus,
} from './services/monitoring/monitor.service.js';
import type { RandomFn } from './services/monitoring/backoff.js';
import type { INotifier, NotificationChannel } from './notifications/base/notifier.interface.js';
import { DiscordNotifier } from './notifications/discord/discord.notifier.js';
import {
  BrowserPurchaseAssist,
  ConsolePurchaseAssist,
  type BrowserLauncher,
  type IPurchaseAssist,
} from './purchase/index.js';
import type { SleepFn } from './utils/sleep.js';
import { logger } from './utils/logger.js';

export interface AppDeps {
  /** Transport for marketplace and webhook requests */
  httpAdapter?: AxiosAdapter;
  browserLauncher?: BrowserLauncher;
  sleep?: SleepFn;
  random?: RandomFn;
}

// ============================================================================
// Application Class
// ============================================================================

export class TicketSentinelApp {
  private feed: TwicketsFeedClient | null = null;
  private monitor: MonitorService | null = null;

  constructor(
    private readonly config: AppConfig,
    private readonly deps: AppDeps = {},
  ) {}

  // ==========================================================================
  // Initialization
  // ==========================================================================

  async initialize(): Promise<MonitorService> {
    if (this.monitor) return this.monitor;

    const { config, deps } = this;
    logger.info('Ticket Sentinel initializing...', {
      eventId: config.monitoring.eventId,
      configPath: config.app.configPath,
    });

    const notifiers = await this.initializeNotifiers();
    const purchaseAssist = this.createPurchaseAssist();

    const auth = new TwicketsAuthClient(config.marketplace, { adapter: deps.httpAdapter });
    this.feed = new TwicketsFeedClient(config.marketplace, { adapter: deps.httpAdapter });

    this.monitor = new MonitorService(config.monitoring, {
      session: new SessionProvider(auth, config.account),
      feed: this.feed,
      ledger: new DedupLedger(),
      dispatcher: new ActionDispatcher(notifiers, purchaseAssist, config.monitoring.eventId),
      filter: config.filter,
      sleep: deps.sleep,
      random: deps.random,
    });

    logger.info('Ticket Sentinel initialized', {
      notifiers: [...notifiers.keys()],
      purchaseAssist: purchaseAssist.mode,
      filter: config.filter,
    });

    return this.monitor;
  }

  private async initializeNotifiers(): Promise<Map<NotificationChannel, INotifier>> {
    const notifiers = new Map<NotificationChannel, INotifier>();
    const discordConfig = this.config.notifications.discord;

    if (!discordConfig) {
      logger.warn('No discord_webhook_url configured; matches will only be logged');
      return notifiers;
    }

    const discord = new DiscordNotifier(discordConfig, this.deps.httpAdapter);
    try {
      await discord.initialize();
    } catch (error) {
      throw new ConfigError([
        `discord_webhook_url: ${error instanceof Error ? error.message : String(error)}`,
      ]);
    }
    notifiers.set('discord', discord);

    return notifiers;
  }

  private createPurchaseAssist(): IPurchaseAssist {
    if (this.config.purchaseAssist.headless) {
      return new ConsolePurchaseAssist();
    }
    return new BrowserPurchaseAssist(this.config.marketplace.baseUrl, this.deps.browserLauncher);
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  async run(signal?: AbortSignal): Promise<MonitorOutcome> {
    const monitor = await this.initialize();

    try {
      return await monitor.run(signal);
    } finally {
      this.feed?.dispose();
    }
  }

  stop(): void {
    this.monitor?.stop();
  }

  getStatus(): MonitorStatus | null {
    return this.monitor?.getStatus() ?? null;
  }
}
