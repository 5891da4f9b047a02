export { RulepathServer, type ServerOptions } from './server.js';
export { resolveConfig, type ServerConfig, type ServerConfigInput } from './config.js';
export {
  errorHandler,
  BadRequestError,
  type ApiError
} from './middleware/error-handler.js';
export type { RouteContext } from './routes/index.js';
