import type { Messenger } from '../../types.js';
import { MediaDownloadError } from '../../errors.js';
import { type FetchFn, type GraphApiConfig, getGraphApiConfig, graphUrl } from './client.js';

/**
 * Outbound WhatsApp Cloud API calls
 */
export class WhatsAppMessenger implements Messenger {
  constructor(
    private readonly graph: GraphApiConfig = getGraphApiConfig(),
    private readonly fetchFn: FetchFn = fetch
  ) {}

  private get headers(): Record<string, string> {
    return {
      'Authorization': `Bearer ${this.graph.accessToken}`,
      'Content-Type': 'application/json'
    };
  }

  /**
   * Send a text message
   */
  async sendText(to: string, body: string): Promise<boolean> {
    try {
      const response = await this.fetchFn(graphUrl(this.graph, `${this.graph.phoneNumberId}/messages`), {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify({
          messaging_product: 'whatsapp',
          recipient_type: 'individual',
          to,
          type: 'text',
          text: { body }
        })
      });

      if (!response.ok) {
        const errorData = await response.text();
        console.error(`Failed to send message to ${to}:`, response.status, errorData);
        return false;
      }

      return true;
    } catch (error) {
      console.error('Error sending message:', error);
      return false;
    }
  }

  /**
   * Send typing indicator to show bot is processing
   */
  async sendTypingIndicator(to: string, messageId: string): Promise<boolean> {
    try {
      const response = await this.fetchFn(graphUrl(this.graph, `${this.graph.phoneNumberId}/messages`), {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify({
          messaging_product: 'whatsapp',
          status: 'read',
          message_id: messageId,
          typing_indicator: {
            type: 'text'
          }
        })
      });

      if (!response.ok) {
        const errorData = await response.text();
        console.error(`Failed to send typing indicator to ${to}:`, response.statusText, errorData);
        return false;
      }

      return true;
    } catch (error) {
      console.error('Error sending typing indicator:', error);
      return false;
    }
  }

  /**
   * Resolve a media id to its short-lived URL, then download the bytes
   */
  async downloadMedia(mediaId: string): Promise<Uint8Array> {
    const auth = { 'Authorization': `Bearer ${this.graph.accessToken}` };

    const metaResponse = await this.fetchFn(graphUrl(this.graph, mediaId), { headers: auth });
    if (!metaResponse.ok) {
      throw new MediaDownloadError(mediaId, metaResponse.status);
    }

    const meta: unknown = await metaResponse.json();
    const url = typeof meta === 'object' && meta !== null && 'url' in meta ? meta.url : undefined;
    if (typeof url !== 'string') {
      throw new MediaDownloadError(mediaId);
    }

    const mediaResponse = await this.fetchFn(url, { headers: auth });
    if (!mediaResponse.ok) {
      throw new MediaDownloadError(mediaId, mediaResponse.status);
    }

    return new Uint8Array(await mediaResponse.arrayBuffer());
  }
}
