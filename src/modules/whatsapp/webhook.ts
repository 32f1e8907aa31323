import type { WhatsAppInboundMessage, WhatsAppWebhookBody } from '../../types.js';

// Types for return values
export type WebhookResult = { success: boolean; response: string; statusCode: number };

export type MessageHandler = (message: WhatsAppInboundMessage) => Promise<void>;

/**
 * Verify WhatsApp webhook request
 */
export const verifyWebhook = (
  mode: string,
  token: string,
  challenge: string,
  verificationToken: string
): WebhookResult => {
  console.log('Webhook verification request received');

  // Check if a token and mode were sent
  if (mode && token) {
    // Check the mode and token sent are correct
    if (mode === 'subscribe' && verificationToken !== '' && token === verificationToken) {
      console.log('Webhook verified successfully!');
      return { success: true, response: challenge, statusCode: 200 };
    }
    console.log('Webhook verification failed - invalid token');
    return { success: false, response: 'Forbidden', statusCode: 403 };
  }

  console.log('Webhook verification failed - missing parameters');
  return { success: false, response: 'Bad Request', statusCode: 400 };
};

/**
 * Collect every inbound message of every "messages" change in a delivery
 */
export const extractMessages = (body: WhatsAppWebhookBody): WhatsAppInboundMessage[] =>
  (body.entry ?? []).flatMap((entry) =>
    (entry.changes ?? [])
      .filter((change) => change.field === 'messages')
      .flatMap((change) => change.value.messages ?? [])
  );

/**
 * Process incoming webhook messages
 */
export const processWebhookMessage = async (
  body: WhatsAppWebhookBody | null | undefined,
  handleMessage: MessageHandler
): Promise<WebhookResult> => {
  if (!body?.object) {
    return { success: false, response: 'Not Found', statusCode: 404 };
  }

  const messages = extractMessages(body);
  if (messages.length > 0) {
    console.log(`🔄 Processing ${messages.length} incoming message(s)`);
  }

  for (const message of messages) {
    await handleMessage(message);
  }

  // Status updates are acknowledged and ignored
  return { success: true, response: 'EVENT_RECEIVED', statusCode: 200 };
};
