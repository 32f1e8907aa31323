import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { WhatsAppMessenger } from '../messaging.js';
import type { FetchFn, GraphApiConfig } from '../client.js';
import { MediaDownloadError } from '../../../errors.js';

const graph: GraphApiConfig = { phoneNumberId: 'pn-1', accessToken: 'test-token', apiVersion: 'v21.0' };

interface RecordedCall {
  url: string;
  init?: RequestInit;
}

const fakeFetch = (responses: Response[]) => {
  const calls: RecordedCall[] = [];
  const fetchFn: FetchFn = async (url, init) => {
    calls.push({ url, init });
    const next = responses.shift();
    if (!next) {
      throw new Error(`unexpected request to ${url}`);
    }
    return next;
  };
  return { calls, fetchFn };
};

describe('WhatsAppMessenger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('sendText', () => {
    it('posts a text message to the Graph API', async () => {
      const { calls, fetchFn } = fakeFetch([new Response('{}', { status: 200 })]);
      const messenger = new WhatsAppMessenger(graph, fetchFn);

      expect(await messenger.sendText('15550001111', 'hello')).toBe(true);

      expect(calls[0]?.url).toBe('https://graph.facebook.com/v21.0/pn-1/messages');
      expect(calls[0]?.init?.method).toBe('POST');
      expect(calls[0]?.init?.headers).toEqual({
        'Authorization': 'Bearer test-token',
        'Content-Type': 'application/json'
      });
      expect(JSON.parse(String(calls[0]?.init?.body))).toEqual({
        messaging_product: 'whatsapp',
        recipient_type: 'individual',
        to: '15550001111',
        type: 'text',
        text: { body: 'hello' }
      });
    });

    it('returns false on an error response', async () => {
      const { fetchFn } = fakeFetch([new Response('bad token', { status: 401 })]);
      expect(await new WhatsAppMessenger(graph, fetchFn).sendText('1', 'hi')).toBe(false);
    });

    it('returns false when the request fails', async () => {
      const { fetchFn } = fakeFetch([]);
      expect(await new WhatsAppMessenger(graph, fetchFn).sendText('1', 'hi')).toBe(false);
    });
  });

  describe('sendTypingIndicator', () => {
    it('marks the message read with a typing indicator', async () => {
      const { calls, fetchFn } = fakeFetch([new Response('{}', { status: 200 })]);

      expect(await new WhatsAppMessenger(graph, fetchFn).sendTypingIndicator('1', 'wamid.in')).toBe(true);
      expect(JSON.parse(String(calls[0]?.init?.body))).toEqual({
        messaging_product: 'whatsapp',
        status: 'read',
        message_id: 'wamid.in',
        typing_indicator: { type: 'text' }
      });
    });
  });

  describe('downloadMedia', () => {
    it('resolves the media url and downloads the bytes', async () => {
      const { calls, fetchFn } = fakeFetch([
        new Response(JSON.stringify({ url: 'https://lookaside.example.test/media/abc' }), { status: 200 }),
        new Response(new Uint8Array([0xff, 0xd8, 0xff]), { status: 200 })
      ]);

      const data = await new WhatsAppMessenger(graph, fetchFn).downloadMedia('media-1');

      expect(Array.from(data)).toEqual([0xff, 0xd8, 0xff]);
      expect(calls.map((call) => call.url)).toEqual([
        'https://graph.facebook.com/v21.0/media-1',
        'https://lookaside.example.test/media/abc'
      ]);
      expect(calls[1]?.init?.headers).toEqual({ 'Authorization': 'Bearer test-token' });
    });

    it('fails when the media lookup is rejected', async () => {
      const { fetchFn } = fakeFetch([new Response('', { status: 404 })]);

      await expect(new WhatsAppMessenger(graph, fetchFn).downloadMedia('media-1')).rejects.toThrow(
        'Failed to download media media-1 (HTTP 404)'
      );
    });

    it('fails when the lookup has no url', async () => {
      const { fetchFn } = fakeFetch([new Response('{}', { status: 200 })]);

      await expect(new WhatsAppMessenger(graph, fetchFn).downloadMedia('media-1')).rejects.toBeInstanceOf(
        MediaDownloadError
      );
    });

    it('fails when the download itself is rejected', async () => {
      const { fetchFn } = fakeFetch([
        new Response(JSON.stringify({ url: 'https://lookaside.example.test/media/abc' }), { status: 200 }),
        new Response('', { status: 500 })
      ]);

      await expect(new WhatsAppMessenger(graph, fetchFn).downloadMedia('media-1')).rejects.toThrow('(HTTP 500)');
    });
  });
});
