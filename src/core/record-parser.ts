import type { JsonValue } from '../types/json.js';
import { isJsonObject, toJsonValue } from '../types/json.js';
import { RecordParseError } from '../errors/index.js';

/** Inbound queue record after decoding. */
export interface ParsedRecord {
  messageId: string | undefined;
  event: JsonValue;
}

function decodeJson(text: string): JsonValue | undefined {
  try {
    return toJsonValue(JSON.parse(text));
  } catch {
    return undefined;
  }
}

/**
 * Accepts a queue record (`{ messageId, body }`), the JSON text of one, or a
 * bare event. A string body is decoded repeatedly while it still parses, so
 * double-encoded payloads come out as objects.
 */
export function parseRecord(input: unknown): ParsedRecord {
  let record: JsonValue | undefined;
  if (typeof input === 'string') {
    record = decodeJson(input);
    if (record === undefined) {
      throw new RecordParseError('Record is not valid JSON');
    }
  } else {
    record = toJsonValue(input);
  }

  if (!isJsonObject(record)) {
    throw new RecordParseError('Record must be a JSON object');
  }

  if (!Object.hasOwn(record, 'body')) {
    return { messageId: undefined, event: record };
  }

  let body: JsonValue = record['body'] ?? null;
  while (typeof body === 'string') {
    const decoded = decodeJson(body);
    if (decoded === undefined) break;
    body = decoded;
  }

  if (!isJsonObject(body)) {
    throw new RecordParseError('Record body must decode to a JSON object');
  }

  const messageId = record['messageId'];
  return {
    messageId: typeof messageId === 'string' ? messageId : undefined,
    event: body,
  };
}
