/**
 * Tiermind — process runtime.
 *
 * Loads configuration, initializes logging, builds the model provider and
 * the memory manager, optionally starts the gateway, and drives the daily
 * cleanup sweep on `memory.cleanup.intervalMs`. Shutdown stops the timer,
 * closes the gateway and aborts any cleanup still running.
 */

import type { Config } from '@tiermind/shared';
import { loadConfig, getSecret, type LoadConfigOptions } from './config/loader.js';
import { initializeLogger, type SecureLogger } from './logging/logger.js';
import { createProvider } from './ai/factory.js';
import type { AIProvider } from './ai/providers/base.js';
import { MemoryManager } from './memory/manager.js';
import type { CleanupRunStats } from './memory/types.js';
import { createGatewayServer, type GatewayServer } from './gateway/server.js';

export interface TiermindOptions {
  config?: LoadConfigOptions;
  /** Start the HTTP gateway after initialization. */
  enableGateway?: boolean;
  /** Use this logger instead of initializing one from config. */
  logger?: SecureLogger;
  /**
   * Model provider for the memory oracles. `null` forces rule-based
   * fallbacks; when omitted a provider is built if the API key is set.
   */
  provider?: AIProvider | null;
  env?: NodeJS.ProcessEnv;
}

export class Tiermind {
  private config: Config | null = null;
  private logger: SecureLogger | null = null;
  private memoryManager: MemoryManager | null = null;
  private gateway: GatewayServer | null = null;
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;
  private shutdownPromise: Promise<void> | null = null;
  private initialized = false;

  constructor(private readonly options: TiermindOptions = {}) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      throw new Error('Tiermind is already initialized');
    }

    const env = this.options.env ?? process.env;
    const config = loadConfig({ env, ...this.options.config });
    const logger = this.options.logger ?? initializeLogger(config.logging);
    this.config = config;
    this.logger = logger;
    logger.info('Tiermind initializing', {
      environment: config.core.environment,
      dataDir: config.core.dataDir,
    });

    const provider = this.resolveProvider(config, logger, env);
    this.memoryManager = new MemoryManager({
      dataDir: config.core.dataDir,
      config: config.memory,
      contextWindowTokens: config.model.contextWindowTokens,
      provider,
      model: config.model.model,
      logger: logger.child({ component: 'memory' }),
    });

    this.initialized = true;

    if (this.options.enableGateway) {
      await this.startGateway();
    }
    this.startCleanupTimer();
    logger.info('Tiermind initialized', { oracles: provider ? 'llm' : 'rules' });
  }

  private resolveProvider(config: Config, logger: SecureLogger, env: NodeJS.ProcessEnv): AIProvider | undefined {
    if (this.options.provider !== undefined) {
      return this.options.provider ?? undefined;
    }
    if (!getSecret(config.model.apiKeyEnv, env)) {
      logger.warn('Model API key not set; memory oracles use rule-based fallbacks', {
        apiKeyEnv: config.model.apiKeyEnv,
      });
      return undefined;
    }
    return createProvider(config.model, logger, env);
  }

  private startCleanupTimer(): void {
    const intervalMs = this.getConfig().memory.cleanup.intervalMs;
    this.cleanupTimer = setInterval(() => {
      void this.runScheduledCleanup();
    }, intervalMs);
    this.cleanupTimer.unref();
  }

  /**
   * One daily sweep over every user. Failures are logged; the next tick
   * tries again.
   */
  async runScheduledCleanup(): Promise<CleanupRunStats | null> {
    const logger = this.getLogger();
    try {
      const stats = await this.getMemoryManager().runDailyCleanup();
      logger.info('Scheduled cleanup finished', {
        processedUsers: stats.processedUsers,
        weekly: stats.weeklySummaries,
        monthly: stats.monthlySummaries,
        yearly: stats.yearlySummaries,
        archived: stats.archived,
        compressed: stats.compressed,
        errors: stats.errors.length,
      });
      return stats;
    } catch (error) {
      logger.error('Scheduled cleanup failed', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      return null;
    }
  }

  getConfig(): Config {
    if (!this.config) {
      throw new Error('Tiermind is not initialized. Call initialize() first.');
    }
    return this.config;
  }

  getMemoryManager(): MemoryManager {
    if (!this.memoryManager) {
      throw new Error('Tiermind is not initialized. Call initialize() first.');
    }
    return this.memoryManager;
  }

  getGateway(): GatewayServer | null {
    return this.gateway;
  }

  async startGateway(): Promise<void> {
    this.ensureInitialized();
    if (this.gateway) {
      throw new Error('Gateway is already running');
    }

    const gateway = createGatewayServer({
      config: this.getConfig().gateway,
      memoryManager: this.getMemoryManager(),
      logger: this.getLogger().child({ component: 'Gateway' }),
    });
    await gateway.start();
    this.gateway = gateway;
  }

  /**
   * Stop everything. Safe to call more than once; later calls share the
   * first shutdown.
   */
  shutdown(): Promise<void> {
    this.shutdownPromise ??= this.performShutdown();
    return this.shutdownPromise;
  }

  private async performShutdown(): Promise<void> {
    if (!this.initialized) {
      return;
    }
    const logger = this.getLogger();
    logger.info('Tiermind shutting down');

    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    if (this.gateway) {
      await this.gateway.stop();
      this.gateway = null;
    }
    await this.getMemoryManager().shutdown();

    logger.info('Tiermind shutdown complete');
  }

  private getLogger(): SecureLogger {
    if (!this.logger) {
      throw new Error('Tiermind is not initialized. Call initialize() first.');
    }
    return this.logger;
  }

  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error('Tiermind is not initialized. Call initialize() first.');
    }
  }
}

/**
 * Create and initialize a Tiermind instance
 */
export async function createTiermind(options?: TiermindOptions): Promise<Tiermind> {
  const tiermind = new Tiermind(options);
  await tiermind.initialize();
  return tiermind;
}
