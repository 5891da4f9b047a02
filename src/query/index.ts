export { ParameterExtractionService, orderParameters, toSqlValue } from './parameter-extraction-service.js';
export type { SqlValue, ParameterExtractionOptions } from './parameter-extraction-service.js';
export {
  QueryBuilder,
  SaveQueryBuilder,
  FindQueryBuilder,
  QueryBuilderFactory,
} from './query-builder.js';
export type { BuiltQuery, QueryBuilderOptions } from './query-builder.js';
export { SqlQueryService } from './sql-query-service.js';
export type { SqlQueryServiceOptions } from './sql-query-service.js';
