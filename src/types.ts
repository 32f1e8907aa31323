export interface ServerConfig {
  port: number;
  host: string;
  logger: boolean;
}

// Business card types
export interface BusinessCard {
  name: string | null;
  company: string | null;
  title: string | null;
  department: string | null;
  phone: string | null;
  mobile: string | null;
  email: string | null;
  address: string | null;
  website: string | null;
  fax: string | null;
  confidenceScore: number;
  qualityScore: number;
  extractedAt: Date;
  userId: string;
  processed: boolean;
  reference: string | null; // Row id once persisted
}

// Session management types
export interface BatchResult {
  userId: string;
  startedAt: Date;
  completedAt: Date | null;
  cards: BusinessCard[];
  totalCards: number;
  successfulCards: number;
  failedCards: number;
  errors: string[];
}

export interface ProcessingStatus {
  userId: string;
  dailyUsage: number;
  usageResetDate: Date;
  lastActivity: Date;
  isBatchMode: boolean;
  currentBatch: BatchResult | null;
}

export interface RedisOptions {
  url?: string;
  username?: string;
  password?: string;
  socket?: {
    host?: string;
    port: number;
    connectTimeout: number;
    reconnectStrategy?: (retries: number) => number | Error;
  };
}

export interface SessionConfig {
  dailyLimit: number;
  inactivityHorizonMs: number;
  keyPrefix: string;
  redisOptions?: RedisOptions;
}

/**
 * Shared, TTL-capable key-value storage. Redis in production.
 */
export interface KeyValueBackend {
  get(key: string): Promise<string | null>;
  setEx(key: string, ttlSeconds: number, value: string): Promise<void>;
  scan(prefix: string): AsyncIterable<string>;
  del(key: string): Promise<void>;
}

// Collaborators of the card pipeline
export interface CardExtractor {
  extract(image: Uint8Array, userId: string): Promise<BusinessCard[]>;
}

export interface CardRepository {
  saveCard(card: BusinessCard): Promise<string | null>;
}

export interface Messenger {
  sendText(to: string, body: string): Promise<boolean>;
  sendTypingIndicator(to: string, messageId: string): Promise<boolean>;
  downloadMedia(mediaId: string): Promise<Uint8Array>;
}

export type Intent =
  | 'start_batch'
  | 'end_batch'
  | 'query_status'
  | 'help'
  | 'unknown';

// WhatsApp webhook types
export interface WhatsAppInboundMessage {
  from: string;
  id: string;
  timestamp: string;
  type: string;
  text?: {
    body: string;
  };
  image?: {
    id: string;
    mime_type?: string;
    sha256?: string;
    caption?: string;
  };
}

export interface WhatsAppWebhookBody {
  object?: string;
  entry?: Array<{
    id: string;
    changes?: Array<{
      value: {
        messaging_product: string;
        metadata: {
          display_phone_number: string;
          phone_number_id: string;
        };
        contacts?: Array<{
          wa_id: string;
          profile?: { name: string };
        }>;
        messages?: WhatsAppInboundMessage[];
        statuses?: Array<{
          id: string;
          status: string;
          timestamp: string;
          recipient_id: string;
        }>;
      };
      field: string;
    }>;
  }>;
}
