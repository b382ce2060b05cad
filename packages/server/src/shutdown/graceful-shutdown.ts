/**
 * Graceful shutdown
 *
 * Stops accepting connections, waits for the HTTP server to drain, then
 * releases registered resources (ledger store, Redis) in priority order.
 */

import type { Server } from 'node:http';
import { logger } from '../logging';

export interface ShutdownConfig {
  drainTimeoutMs: number;
  resourceTimeoutMs: number;
}

export interface ShutdownResource {
  name: string;
  priority: number; // Higher number = shutdown earlier
  cleanup: () => Promise<void>;
  timeoutMs?: number;
  required?: boolean; // If true, shutdown fails if this resource fails
}

const DEFAULT_CONFIG: ShutdownConfig = {
  drainTimeoutMs: 10_000,
  resourceTimeoutMs: 5_000,
};

function withTimeout<T>(p: Promise<T>, ms: number, tag: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const t = setTimeout(() => reject(new Error(tag)), ms);
    p.then(
      (v) => {
        clearTimeout(t);
        resolve(v);
      },
      (e) => {
        clearTimeout(t);
        reject(e);
      },
    );
  });
}

export class GracefulShutdownManager {
  private server?: Server;
  private readonly resources = new Map<string, ShutdownResource>();
  private inFlight?: Promise<void>;
  private readonly config: ShutdownConfig;

  constructor(config: Partial<ShutdownConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  registerServer(server: Server): void {
    this.server = server;
  }

  registerResource(resource: ShutdownResource): void {
    if (this.resources.has(resource.name)) {
      logger.warn({ resourceName: resource.name }, 'Overwriting existing shutdown resource');
    }
    this.resources.set(resource.name, resource);
  }

  /**
   * Idempotent: a second call returns the shutdown already in progress.
   */
  shutdown(signal?: string): Promise<void> {
    if (!this.inFlight) {
      this.inFlight = this.run(signal);
    }
    return this.inFlight;
  }

  /**
   * Exit the process on SIGTERM/SIGINT once shutdown finishes.
   */
  installSignalHandlers(): void {
    for (const signal of ['SIGTERM', 'SIGINT'] as const) {
      process.once(signal, () => {
        this.shutdown(signal).then(
          () => process.exit(0),
          (err: unknown) => {
            logger.error({ err }, 'Graceful shutdown failed');
            process.exit(1);
          },
        );
      });
    }
  }

  private async run(signal?: string): Promise<void> {
    logger.info(
      { signal: signal || 'manual', registeredResources: this.resources.size },
      'Starting graceful shutdown',
    );

    await this.drainConnections();
    await this.cleanupResources();

    logger.info('Graceful shutdown completed successfully');
  }

  private async drainConnections(): Promise<void> {
    const server = this.server;
    if (!server) {
      logger.debug('No HTTP server registered, skipping connection draining');
      return;
    }

    const closed = new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    try {
      await withTimeout(closed, this.config.drainTimeoutMs, 'drain_timeout');
    } catch (err) {
      logger.warn({ err, drainTimeout: this.config.drainTimeoutMs }, 'Drain incomplete, closing connections');
      server.closeAllConnections();
    }
  }

  private async cleanupResources(): Promise<void> {
    const ordered = Array.from(this.resources.values()).sort((a, b) => b.priority - a.priority);
    const failures: string[] = [];

    for (const resource of ordered) {
      try {
        await withTimeout(
          resource.cleanup(),
          resource.timeoutMs || this.config.resourceTimeoutMs,
          `cleanup_timeout:${resource.name}`,
        );
        logger.debug({ resourceName: resource.name }, 'Resource cleaned up');
      } catch (err) {
        logger.error({ err, resourceName: resource.name }, 'Resource cleanup failed');
        if (resource.required) {
          failures.push(resource.name);
        }
      }
    }

    if (failures.length > 0) {
      throw new Error(`shutdown_failed: ${failures.join(', ')}`);
    }
  }
}
