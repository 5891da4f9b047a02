import type { JsonValue } from './json.js';
import type { Rule } from './rule.js';
import type { QueryConfig, QueryKind } from './parameter.js';

/** Konfigurovaná extrakce pole */
export interface FieldSpec {
  path: string;
  enabled: boolean;
}

export interface ServiceConfig {
  idService: string;
  paths: FieldSpec[];
  entity: string[];
}

/** Konfigurace jednoho konzumenta (appConsumer) */
export interface ConsumerConfig {
  id: string;
  services: ServiceConfig[];
  rules: Rule[];
  queries: Partial<Record<QueryKind, QueryConfig>>;
}

/** Celý konfigurační dokument */
export interface SystemConfig {
  version?: string;
  consumers: ConsumerConfig[];
  extensions: Record<string, JsonValue>;   // Pomocné datasety pro extract_value
}
