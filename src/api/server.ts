import Fastify, { type FastifyInstance } from 'fastify';
import type { SystemConfig } from '../types/config.js';
import type { MergePolicy } from '../types/rule.js';
import { ConfigService, StaticConfigSource } from '../config/config-service.js';
import type { PersistenceGateway } from '../persistence/gateway.js';
import type { StrategyRegistry } from '../strategies/registry.js';
import { buildRegistry } from '../strategies/registry.js';
import { version as packageVersion } from '../version.js';
import {
  resolveConfig,
  resolveLoggerOption,
  type ServerConfig,
  type ServerConfigInput
} from './config.js';
import { errorHandler } from './middleware/error-handler.js';
import { registerRoutes } from './routes/index.js';

export interface ServerOptions {
  /** Konfigurace HTTP serveru */
  server?: ServerConfigInput;

  /** Konfigurace konzumentů: služba s cache, nebo pevný dokument */
  config: ConfigService | SystemConfig;

  /** Persistence; bez ní se entity pouze sestavují */
  gateway?: PersistenceGateway;

  /** Registr strategií (výchozí: nový registr s výchozími strategiemi) */
  registry?: StrategyRegistry;

  mergePolicy?: MergePolicy;

  /** Uzavřít gateway při stop() (výchozí: true) */
  closeGateway?: boolean;
}

export class RulepathServer {
  private readonly fastify: FastifyInstance;
  private readonly config: ServerConfig;
  private readonly gateway: PersistenceGateway | undefined;
  private readonly closeGateway: boolean;
  private listening = false;

  private constructor(
    fastify: FastifyInstance,
    config: ServerConfig,
    gateway: PersistenceGateway | undefined,
    closeGateway: boolean,
  ) {
    this.fastify = fastify;
    this.config = config;
    this.gateway = gateway;
    this.closeGateway = closeGateway;
  }

  /** Builds the application without binding a port. */
  static async create(options: ServerOptions): Promise<RulepathServer> {
    const config = resolveConfig(options.server);

    const fastify = Fastify({
      logger: resolveLoggerOption(config.logger),
      bodyLimit: config.bodyLimit,
      ajv: {
        customOptions: {
          coerceTypes: false,
          removeAdditional: false,
          useDefaults: true,
          allErrors: true
        }
      },
      ...config.fastifyOptions
    });

    fastify.setErrorHandler(errorHandler);

    const configService = options.config instanceof ConfigService
      ? options.config
      : new ConfigService({ source: new StaticConfigSource(options.config), logger: fastify.log });

    const routeContext = {
      configService,
      gateway: options.gateway,
      pipeline: {
        registry: options.registry ?? buildRegistry({ logger: fastify.log }),
        ...(options.mergePolicy !== undefined && { mergePolicy: options.mergePolicy }),
      },
      version: packageVersion,
    };

    await fastify.register(
      async (instance) => {
        await registerRoutes(instance, routeContext);
      },
      { prefix: config.apiPrefix }
    );

    await fastify.ready();

    return new RulepathServer(fastify, config, options.gateway, options.closeGateway ?? true);
  }

  /** Builds the application and starts listening. */
  static async start(options: ServerOptions): Promise<RulepathServer> {
    const server = await RulepathServer.create(options);
    await server.fastify.listen({ port: server.config.port, host: server.config.host });
    server.listening = true;
    return server;
  }

  /** Underlying fastify instance (`inject` in tests). */
  get app(): FastifyInstance {
    return this.fastify;
  }

  get address(): string {
    if (!this.listening) {
      return '';
    }
    const addr = this.fastify.server.address();
    if (typeof addr === 'string') {
      return addr;
    }
    if (addr) {
      return `http://${addr.address === '::' || addr.address === '0.0.0.0' ? 'localhost' : addr.address}:${addr.port}`;
    }
    return '';
  }

  get port(): number {
    return this.config.port;
  }

  async stop(): Promise<void> {
    await this.fastify.close();
    this.listening = false;

    if (this.closeGateway && this.gateway !== undefined) {
      await this.gateway.close();
    }
  }
}
