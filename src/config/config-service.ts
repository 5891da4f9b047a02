import type { Rule } from '../types/rule.js';
import type { ConsumerConfig, ServiceConfig, SystemConfig } from '../types/config.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { TtlCache } from './cache.js';
import { loadConfigFromFile } from './loader.js';

/** Where consumer configuration comes from. */
export interface ConfigSource {
  readonly name: string;
  load(): Promise<SystemConfig>;
}

export class FileConfigSource implements ConfigSource {
  readonly name: string;
  private readonly logger: Logger;

  constructor(private readonly filePath: string, logger: Logger = silentLogger) {
    this.name = `file:${filePath}`;
    this.logger = logger;
  }

  async load(): Promise<SystemConfig> {
    const { config, warnings } = await loadConfigFromFile(this.filePath);
    for (const warning of warnings) {
      this.logger.warn({ path: warning.path, source: this.name }, warning.message);
    }
    return config;
  }
}

/** Fixed in-memory configuration (tests, embedding). */
export class StaticConfigSource implements ConfigSource {
  readonly name = 'static';

  constructor(private readonly config: SystemConfig) {}

  async load(): Promise<SystemConfig> {
    return this.config;
  }
}

export interface ConfigServiceOptions {
  source: ConfigSource;
  ttlMs?: number;
  logger?: Logger;
  clock?: () => number;
}

const CACHE_KEY = 'config';

/**
 * Cached access to consumer configuration. Concurrent callers during a
 * reload share one pending load.
 */
export class ConfigService {
  private readonly source: ConfigSource;
  private readonly ttlMs: number;
  private readonly logger: Logger;
  private readonly cache: TtlCache<SystemConfig>;
  private pending: Promise<SystemConfig> | undefined;

  constructor(options: ConfigServiceOptions) {
    this.source = options.source;
    this.ttlMs = options.ttlMs ?? 60_000;
    this.logger = options.logger ?? silentLogger;
    this.cache = new TtlCache<SystemConfig>(options.clock);
  }

  async getConfig(forceRefresh = false): Promise<SystemConfig> {
    if (!forceRefresh) {
      const cached = this.cache.get(CACHE_KEY);
      if (cached !== undefined) return cached;
    }

    if (this.pending === undefined) {
      this.pending = this.reload().finally(() => {
        this.pending = undefined;
      });
    }
    return this.pending;
  }

  async getConsumer(consumerId: string): Promise<ConsumerConfig | undefined> {
    const config = await this.getConfig();
    return config.consumers.find((consumer) => consumer.id === consumerId);
  }

  async getServiceConfig(consumerId: string, idService: string): Promise<ServiceConfig | undefined> {
    const consumer = await this.getConsumer(consumerId);
    return consumer?.services.find((service) => service.idService === idService);
  }

  /** Rules of every consumer entry with that id whose event type is the service. */
  async getRulesForService(consumerId: string, idService: string): Promise<Rule[]> {
    const config = await this.getConfig();
    return config.consumers
      .filter((consumer) => consumer.id === consumerId)
      .flatMap((consumer) => consumer.rules)
      .filter((rule) => rule.eventType === idService);
  }

  invalidate(): void {
    this.cache.clear();
  }

  private async reload(): Promise<SystemConfig> {
    const config = await this.source.load();
    this.cache.set(CACHE_KEY, config, this.ttlMs);
    this.logger.info(
      { source: this.source.name, consumers: config.consumers.length },
      'Configuration loaded',
    );
    return config;
  }
}
