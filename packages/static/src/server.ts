import cors from "@fastify/cors";
import Fastify, {
  type FastifyInstance,
  type InjectOptions,
  type LightMyRequestResponse,
} from "fastify";

import {
  resolveConfig,
  type StaticServerConfig,
  type StaticServerConfigInput,
} from "./config.js";
import { handlersFromDirs } from "./handlers.js";
import type { Logger, ResourceTransformer } from "./types.js";

export type StaticServerOptions = StaticServerConfigInput & {
  logger?: Logger;
  transformers?: ReadonlyMap<string, ResourceTransformer>;
};

/**
 * Fastify route paths treat ":" as a parameter marker
 */
function toRoutePattern(path: string): string {
  return path.replaceAll(":", "::");
}

export class HtlStaticServer {
  private readonly fastify: FastifyInstance;
  private readonly config: StaticServerConfig;
  private readonly logger: Logger;
  private readonly transformers?: ReadonlyMap<string, ResourceTransformer>;
  private initializing: Promise<readonly string[]> | undefined;

  constructor(options: StaticServerOptions = {}) {
    const { logger, transformers, ...config } = options;
    this.config = resolveConfig(config);
    this.logger = logger ?? console;
    this.transformers = transformers;
    this.fastify = Fastify();
  }

  /**
   * Load every resource and register its route. Concurrent and later
   * calls share the first run; a failed run can be retried.
   */
  initialize(): Promise<readonly string[]> {
    this.initializing ??= this.setupRoutes().catch((error: unknown) => {
      this.initializing = undefined;
      throw error;
    });
    return this.initializing;
  }

  private async setupRoutes(): Promise<readonly string[]> {
    // Resources load before the instance is touched
    const handlers = await handlersFromDirs(this.config.dirs, {
      dev: this.config.dev,
      logger: this.logger,
      transformers: this.transformers,
    });

    if (this.config.cors) {
      await this.fastify.register(cors);
    }

    for (const [path, handler] of handlers) {
      this.logger.info(`[htl-serve] registered path: ${path}`);
      this.fastify.get(toRoutePattern(path), handler);
      if (path === this.config.index) {
        this.fastify.get("/", handler);
      }
    }

    return [...handlers.keys()];
  }

  /**
   * Run a request against the server without opening a socket
   */
  async inject(
    options: InjectOptions | string
  ): Promise<LightMyRequestResponse> {
    await this.initialize();
    return this.fastify.inject(options);
  }

  /**
   * Initialize and listen. Failures are left to the caller to report.
   */
  async start(): Promise<void> {
    await this.initialize();
    await this.fastify.listen({
      port: this.config.port,
      host: this.config.host,
    });
    this.logger.info(
      `[htl-serve] listening on http://${this.config.host}:${this.config.port}${this.config.dev ? " (dev)" : ""}`
    );
  }

  async stop(): Promise<void> {
    try {
      await this.fastify.close();
      this.logger.info("[htl-serve] server stopped");
    } catch (error) {
      this.logger.error("[htl-serve] Error stopping server:", error);
    }
  }
}
