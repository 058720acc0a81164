/**
 * Gateway Server for Tiermind
 *
 * Serves the memory operations API over HTTP.
 *
 * Security considerations:
 * - Local network only by default
 * - Bodies are capped and validated per route
 */

import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import type { GatewayConfig } from '@tiermind/shared';
import { getLogger, createNoopLogger, type SecureLogger } from '../logging/logger.js';
import type { MemoryManager } from '../memory/manager.js';
import { registerMemoryRoutes } from '../memory/memory-routes.js';
import { sendError } from '../utils/errors.js';
import { VERSION } from '../version.js';

/**
 * Check whether an IP is loopback or in a private range (RFC 1918).
 */
export function isPrivateIP(ip: string): boolean {
  const addr = ip.startsWith('::ffff:') ? ip.slice(7) : ip;
  if (addr === '127.0.0.1' || addr === '::1' || addr === 'localhost') return true;
  if (addr.startsWith('10.') || addr.startsWith('192.168.')) return true;

  // 172.16.0.0/12 → second octet 16–31
  if (addr.startsWith('172.')) {
    const secondOctet = Number(addr.split('.')[1]);
    if (secondOctet >= 16 && secondOctet <= 31) return true;
  }

  return false;
}

export interface GatewayServerOptions {
  config: GatewayConfig;
  memoryManager: MemoryManager;
  logger?: SecureLogger;
  /** Accept requests from any address, not only local ones. */
  allowRemote?: boolean;
  clock?: () => number;
}

export class GatewayServer {
  private readonly config: GatewayConfig;
  private readonly memoryManager: MemoryManager;
  private readonly allowRemote: boolean;
  private readonly clock: () => number;
  private readonly app: FastifyInstance;
  private logger: SecureLogger | null;
  private startedAt: number | null = null;
  private initialized = false;

  constructor(options: GatewayServerOptions) {
    this.config = options.config;
    this.memoryManager = options.memoryManager;
    this.allowRemote = options.allowRemote ?? false;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? null;

    this.app = Fastify({
      logger: false, // We use our own logger
      trustProxy: false,
      bodyLimit: 1_048_576,
    });
  }

  private getLogger(): SecureLogger {
    if (!this.logger) {
      try {
        this.logger = getLogger().child({ component: 'Gateway' });
      } catch {
        return createNoopLogger();
      }
    }
    return this.logger;
  }

  /**
   * Register hooks and routes. Runs once; `start()` calls it, tests may call
   * it directly and use `inject()`.
   */
  async init(): Promise<FastifyInstance> {
    if (this.initialized) return this.app;
    this.initialized = true;
    this.setupMiddleware();
    this.setupRoutes();
    await this.app.ready();
    return this.app;
  }

  private setupMiddleware(): void {
    if (!this.allowRemote) {
      this.app.addHook('onRequest', async (request, reply) => {
        if (!isPrivateIP(request.ip)) {
          this.getLogger().warn('Access denied from non-local IP', { ip: request.ip });
          return sendError(reply, 403, 'Memory API is only accessible from the local network');
        }
      });
    }

    this.app.addHook('onRequest', async (_request, reply) => {
      reply.header('X-Content-Type-Options', 'nosniff');
      reply.header('X-Frame-Options', 'DENY');
      reply.header('Referrer-Policy', 'no-referrer');
    });

    this.app.addHook('onResponse', async (request, reply) => {
      this.getLogger().debug('Request completed', {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      });
    });

    this.app.setNotFoundHandler((request, reply) =>
      sendError(reply, 404, `Route ${request.method} ${request.url} not found`)
    );

    this.app.setErrorHandler<FastifyError>((error, request, reply) => {
      const status = error.statusCode ?? 500;
      if (status >= 500) {
        this.getLogger().error('Unhandled request error', { url: request.url, error: error.message });
        return sendError(reply, status, 'Internal server error');
      }
      return sendError(reply, status, error.message);
    });
  }

  private setupRoutes(): void {
    this.app.get('/health', async () => ({
      status: 'ok',
      version: VERSION,
      uptime: this.startedAt !== null ? this.clock() - this.startedAt : 0,
      cleanupRunning: this.memoryManager.isCleanupRunning(),
    }));

    registerMemoryRoutes(this.app, { memoryManager: this.memoryManager });
  }

  /**
   * Start the server
   */
  async start(): Promise<void> {
    await this.init();

    const { host, port } = this.config;
    try {
      await this.app.listen({ host, port });
      this.startedAt = this.clock();
      this.getLogger().info('Gateway server started', { host, port, url: `http://${host}:${String(port)}` });
    } catch (error) {
      this.getLogger().error('Failed to start gateway server', {
        error: error instanceof Error ? error.message : 'Unknown',
      });
      throw error;
    }
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    await this.app.close();
    this.getLogger().info('Gateway server stopped');
  }

  /** Address the server is bound to, once started. */
  getAddress(): string | null {
    const address = this.app.server.address();
    if (!address || typeof address === 'string') return address;
    return `${address.address}:${String(address.port)}`;
  }
}

/**
 * Create a gateway server
 */
export function createGatewayServer(options: GatewayServerOptions): GatewayServer {
  return new GatewayServer(options);
}
