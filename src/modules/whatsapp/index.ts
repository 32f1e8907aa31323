// WhatsApp module exports
export { getGraphApiConfig, graphUrl, testConfiguration } from './client.js';
export type { FetchFn, GraphApiConfig } from './client.js';
export { WhatsAppMessenger } from './messaging.js';
export { isValidSignature } from './signature.js';
export { verifyWebhook, extractMessages, processWebhookMessage } from './webhook.js';
export type { WebhookResult, MessageHandler } from './webhook.js';
