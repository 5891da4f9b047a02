export { InMemoryPersistenceGateway } from './gateway.js';
export type { PersistenceGateway, Row, RecordedStatement } from './gateway.js';
export { PgPersistenceGateway, toPgPlaceholders } from './pg-gateway.js';
export type { PgGatewayOptions } from './pg-gateway.js';
export { EntityRepository } from './entity-repository.js';
