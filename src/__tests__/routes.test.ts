import { createHmac } from 'node:crypto';
import Fastify, { type FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { registerRoutes } from '../routes.js';
import type { WhatsAppInboundMessage } from '../types.js';

const SECRET = 'test-secret';

const sign = (payload: string): string =>
  `sha256=${createHmac('sha256', SECRET).update(payload).digest('hex')}`;

const deliveryBody = JSON.stringify({
  object: 'whatsapp_business_account',
  entry: [
    {
      id: 'entry-1',
      changes: [
        {
          field: 'messages',
          value: {
            messaging_product: 'whatsapp',
            metadata: { display_phone_number: '15550009999', phone_number_id: 'pn-1' },
            messages: [{ from: '15550001111', id: 'wamid.1', timestamp: '1760868000', type: 'text', text: { body: 'help' } }]
          }
        }
      ]
    }
  ]
});

describe('routes', () => {
  let app: FastifyInstance;
  let handled: WhatsAppInboundMessage[];

  const build = (appSecret: string): FastifyInstance => {
    const instance = Fastify();
    registerRoutes(instance, {
      webhookEndpoint: 'webhook',
      verificationToken: 'verify-me',
      appSecret,
      sessionBackend: 'memory',
      handleMessage: async (message) => {
        handled.push(message);
      }
    });
    return instance;
  };

  beforeEach(() => {
    handled = [];
    vi.spyOn(console, 'log').mockImplementation(() => {});
    app = build(SECRET);
  });

  afterEach(async () => {
    await app.close();
    vi.restoreAllMocks();
  });

  it('reports health with the session backend', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok', sessionBackend: 'memory' });
  });

  it('completes the verification handshake', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/webhook',
      query: { 'hub.mode': 'subscribe', 'hub.verify_token': 'verify-me', 'hub.challenge': '1158201444' }
    });

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe('1158201444');
  });

  it('refuses verification with the wrong token', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/webhook',
      query: { 'hub.mode': 'subscribe', 'hub.verify_token': 'wrong', 'hub.challenge': '1' }
    });

    expect(response.statusCode).toBe(403);
  });

  it('accepts a signed delivery and hands over its messages', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/webhook',
      headers: { 'content-type': 'application/json', 'x-hub-signature-256': sign(deliveryBody) },
      payload: deliveryBody
    });

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe('EVENT_RECEIVED');
    expect(handled.map((message) => message.id)).toEqual(['wamid.1']);
  });

  it('rejects a delivery with a bad signature', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/webhook',
      headers: { 'content-type': 'application/json', 'x-hub-signature-256': sign('{}') },
      payload: deliveryBody
    });

    expect(response.statusCode).toBe(401);
    expect(handled).toEqual([]);
  });

  it('rejects an unsigned delivery', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/webhook',
      headers: { 'content-type': 'application/json' },
      payload: deliveryBody
    });

    expect(response.statusCode).toBe(401);
  });

  it('skips the signature check when no app secret is set', async () => {
    await app.close();
    app = build('');

    const response = await app.inject({
      method: 'POST',
      url: '/webhook',
      headers: { 'content-type': 'application/json' },
      payload: deliveryBody
    });

    expect(response.statusCode).toBe(200);
    expect(handled).toHaveLength(1);
  });

  it('answers 404 for payloads without an object', async () => {
    const payload = JSON.stringify({ hello: 'world' });
    const response = await app.inject({
      method: 'POST',
      url: '/webhook',
      headers: { 'content-type': 'application/json', 'x-hub-signature-256': sign(payload) },
      payload
    });

    expect(response.statusCode).toBe(404);
    expect(response.body).toBe('Not Found');
  });

  it('answers 404 for a null body', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/webhook',
      headers: { 'content-type': 'application/json', 'x-hub-signature-256': sign('null') },
      payload: 'null'
    });

    expect(response.statusCode).toBe(404);
    expect(handled).toEqual([]);
  });

  it('rejects a body carrying a __proto__ key', async () => {
    const payload = '{"object":"whatsapp_business_account","__proto__":{"polluted":true}}';
    const response = await app.inject({
      method: 'POST',
      url: '/webhook',
      headers: { 'content-type': 'application/json', 'x-hub-signature-256': sign(payload) },
      payload
    });

    expect(response.statusCode).toBe(400);
    expect(handled).toEqual([]);
  });
});
