import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { WhatsAppWebhookBody } from './types.js';
import type { SessionBackendMode } from './modules/session/index.js';
import { isValidSignature, processWebhookMessage, verifyWebhook } from './modules/whatsapp/index.js';
import type { MessageHandler } from './modules/whatsapp/index.js';

declare module 'fastify' {
  interface FastifyRequest {
    rawBody?: string;
  }
}

export interface RouteOptions {
  webhookEndpoint: string;
  verificationToken: string;
  appSecret: string;
  sessionBackend: SessionBackendMode;
  handleMessage: MessageHandler;
}

type VerificationQuery = { 'hub.mode'?: string; 'hub.verify_token'?: string; 'hub.challenge'?: string };

/**
 * ROUTES
 */
export const registerRoutes = (fastify: FastifyInstance, options: RouteOptions) => {
  // Keep the raw body around for the signature check
  const parseJson = fastify.getDefaultJsonParser('error', 'ignore');
  fastify.removeContentTypeParser('application/json');
  fastify.addContentTypeParser<string>('application/json', { parseAs: 'string' }, (request, body, done) => {
    request.rawBody = body;
    if (body.length === 0) {
      done(null, {});
      return;
    }
    parseJson(request, body, done);
  });

  /**
   * HANDLERS
   */
  const healthHandler = async (request: FastifyRequest, reply: FastifyReply) => {
    return reply.send({ status: 'ok', sessionBackend: options.sessionBackend });
  };

  // WhatsApp webhook verification handler (GET request)
  const webhookVerificationHandler = async (
    request: FastifyRequest<{ Querystring: VerificationQuery }>,
    reply: FastifyReply
  ) => {
    const mode = request.query['hub.mode'] || '';
    const token = request.query['hub.verify_token'] || '';
    const challenge = request.query['hub.challenge'] || '';

    const result = verifyWebhook(mode, token, challenge, options.verificationToken);
    return reply.status(result.statusCode).send(result.response);
  };

  // WhatsApp webhook message handler (POST request)
  const webhookMessageHandler = async (
    request: FastifyRequest<{ Body: WhatsAppWebhookBody | null }>,
    reply: FastifyReply
  ) => {
    if (options.appSecret) {
      const signature = request.headers['x-hub-signature-256'];
      const header = Array.isArray(signature) ? signature[0] : signature;

      if (!isValidSignature(request.rawBody ?? '', header, options.appSecret)) {
        request.log.warn('Rejected webhook delivery with invalid signature');
        return reply.status(401).send('Unauthorized');
      }
    }

    const result = await processWebhookMessage(request.body, options.handleMessage);
    return reply.status(result.statusCode).send(result.response);
  };

  fastify.get('/health', healthHandler);

  // WhatsApp webhook endpoints
  fastify.get(`/${options.webhookEndpoint}`, webhookVerificationHandler);
  fastify.post(`/${options.webhookEndpoint}`, webhookMessageHandler);

  return fastify;
};
