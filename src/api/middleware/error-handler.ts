import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { RulepathError } from '../../errors/index.js';

export interface ApiError {
  statusCode: number;
  error: string;
  message: string;
  code?: string;
  details?: unknown;
}

export class BadRequestError extends RulepathError {
  override readonly statusCode = 400;
  override readonly code = 'BAD_REQUEST';

  constructor(message: string, details?: unknown) {
    super(message, details);
    this.name = 'BadRequestError';
  }
}

const FASTIFY_VALIDATION_CODE = 'FST_ERR_VALIDATION';
const JSON_PARSE_ERROR_CODES = [
  'FST_ERR_CTP_INVALID_CONTENT_LENGTH',
  'FST_ERR_CTP_INVALID_MEDIA_TYPE',
  'FST_ERR_CTP_BODY_TOO_LARGE',
  'FST_ERR_CTP_EMPTY_JSON_BODY',
  'FST_ERR_CTP_INVALID_JSON_BODY'
];

function isFastifyValidationError(error: FastifyError): boolean {
  return error.code === FASTIFY_VALIDATION_CODE || error.validation !== undefined;
}

function isJsonParseError(error: FastifyError): boolean {
  return error instanceof SyntaxError || JSON_PARSE_ERROR_CODES.includes(error.code);
}

function extractValidationDetails(error: FastifyError): unknown {
  return error.validation?.map((v) => ({
    field: v.instancePath || v.params['missingProperty'] || 'unknown',
    message: v.message,
    keyword: v.keyword
  }));
}

function formatValidationMessage(error: FastifyError): string {
  if (!error.validation) {
    return 'Request validation failed';
  }

  const messages = error.validation.map((v) => {
    // /path/to/field -> path.to.field
    const parentPath = v.instancePath.replace(/^\//, '').replace(/\//g, '.');
    const missing = v.params['missingProperty'];

    if (v.keyword === 'required' && typeof missing === 'string') {
      return `Missing required field: ${parentPath ? `${parentPath}.${missing}` : missing}`;
    }
    if (v.keyword === 'type' || v.keyword === 'minLength') {
      return `Field ${parentPath || '(body)'} ${v.message ?? 'is invalid'}`;
    }
    return v.message ?? 'Validation error';
  });

  return messages.join('; ');
}

/** Status and code for an error raised anywhere under a route. */
function classify(error: FastifyError | RulepathError): { statusCode: number; code: string | undefined; details: unknown; message: string } {
  if (error instanceof RulepathError) {
    return { statusCode: error.statusCode, code: error.code, details: error.details, message: error.message };
  }
  if (isFastifyValidationError(error)) {
    return {
      statusCode: 400,
      code: 'VALIDATION_ERROR',
      details: extractValidationDetails(error),
      message: formatValidationMessage(error)
    };
  }
  if (isJsonParseError(error)) {
    return { statusCode: 400, code: 'INVALID_JSON', details: undefined, message: 'Invalid JSON in request body' };
  }
  return { statusCode: error.statusCode ?? 500, code: error.code, details: undefined, message: error.message };
}

export function errorHandler(
  error: FastifyError | RulepathError,
  request: FastifyRequest,
  reply: FastifyReply
): void {
  const { statusCode, code, details, message } = classify(error);

  const response: ApiError = {
    statusCode,
    error: getErrorName(statusCode),
    message
  };

  if (code) {
    response.code = code;
  }

  if (details !== undefined) {
    response.details = details;
  }

  if (statusCode >= 500) {
    request.log.error({
      err: error,
      method: request.method,
      url: request.url,
      statusCode
    }, 'Internal server error');
  } else if (statusCode >= 400) {
    request.log.warn({
      method: request.method,
      url: request.url,
      statusCode,
      code
    }, error.message);
  }

  void reply.status(statusCode).send(response);
}

function getErrorName(statusCode: number): string {
  const names: Record<number, string> = {
    400: 'Bad Request',
    404: 'Not Found',
    413: 'Payload Too Large',
    415: 'Unsupported Media Type',
    422: 'Unprocessable Entity',
    500: 'Internal Server Error',
    502: 'Bad Gateway',
    503: 'Service Unavailable'
  };
  return names[statusCode] ?? 'Error';
}
