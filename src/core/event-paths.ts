/** Where the envelope carries its identifiers. */
export const EVENT_PATHS = {
  appConsumerId: 'jsonPayload.dataObject.consumer.appConsumer.id',
  sessionId: 'jsonPayload.dataObject.consumer.appConsumer.sessionId',
  idService: 'jsonPayload.dataObject.messages.idService',
  transactionName: 'jsonPayload.dataObject.messages.transaction.transactionName',
  timestamp: 'timestamp',
} as const;

/** Document blocks that carry `type`/`number` for the correlation id, in order of preference. */
export const CORRELATION_DOCUMENT_PATHS = [
  'jsonPayload.dataObject.documento',
  'jsonPayload.dataObject.client.documentClient',
] as const;
