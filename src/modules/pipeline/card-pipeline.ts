import type {
  CardExtractor,
  CardRepository,
  Intent,
  Messenger,
  WhatsAppInboundMessage
} from '../../types.js';
import { getUserFriendlyMessage } from '../../errors.js';
import { BatchCoordinator, RateLimiter, SessionStore, checkRateLimit } from '../session/index.js';
import { validateImage } from './image-validation.js';
import { parseIntent } from './intents.js';
import {
  batchStartedText,
  batchSummaryText,
  helpText,
  noCardsText,
  notInBatchText,
  processingResultText,
  quotaExceededText,
  unknownCommandText,
  usageStatusText
} from './replies.js';

export interface CardPipelineDeps {
  sessions: SessionStore;
  rateLimiter: RateLimiter;
  batches: BatchCoordinator;
  extractor: CardExtractor;
  repository: CardRepository;
  messenger: Messenger;
  maxImageBytes: number;
}

/**
 * Turns inbound WhatsApp messages into session, extraction and persistence
 * calls and replies with the outcome.
 */
export class CardPipeline {
  constructor(private readonly deps: CardPipelineDeps) {}

  /**
   * Handle one inbound message and send the reply
   */
  async handleMessage(message: WhatsAppInboundMessage): Promise<void> {
    const userId = message.from;
    console.log(`💬 ${message.type} message ${message.id} from ${userId}`);

    let reply: string | null;
    try {
      if (message.type === 'text' && message.text) {
        reply = await this.handleIntent(userId, parseIntent(message.text.body));
      } else if (message.type === 'image' && message.image) {
        reply = await this.handleImageMessage(userId, message.id, message.image.id);
      } else {
        console.log(`Ignoring unsupported message type ${message.type} from ${userId}`);
        reply = null;
      }
    } catch (error) {
      console.error(`❌ Error handling message ${message.id} from ${userId}:`, error);
      reply = getUserFriendlyMessage(error);
    }

    if (reply) {
      await this.deps.messenger.sendText(userId, reply);
    }
  }

  /**
   * Apply a text command and return the reply text
   */
  async handleIntent(userId: string, intent: Intent): Promise<string> {
    const { batches, sessions, rateLimiter } = this.deps;

    switch (intent) {
      case 'start_batch':
        await batches.start(userId);
        return batchStartedText();

      case 'end_batch': {
        const batch = await batches.end(userId);
        return batch ? batchSummaryText(batch) : notInBatchText();
      }

      case 'query_status': {
        const batchStatus = await batches.statusText(userId);
        if (batchStatus) {
          return batchStatus;
        }
        const status = await sessions.getOrCreate(userId);
        return usageStatusText(status, rateLimiter.dailyLimit);
      }

      case 'help':
        return helpText(rateLimiter.dailyLimit);

      case 'unknown':
        return unknownCommandText();
    }
  }

  private async handleImageMessage(userId: string, messageId: string, mediaId: string): Promise<string> {
    const { sessions, rateLimiter, messenger } = this.deps;

    const status = await sessions.getOrCreate(userId);
    if (!checkRateLimit(status, rateLimiter.dailyLimit)) {
      return quotaExceededText(status.dailyUsage, rateLimiter.dailyLimit);
    }

    await messenger.sendTypingIndicator(userId, messageId);
    const image = await messenger.downloadMedia(mediaId);
    return this.processImage(userId, image);
  }

  /**
   * Extract, persist and batch the cards in one image and return the reply
   * text. Usage is counted once per image that yielded at least one card.
   */
  async processImage(userId: string, image: Uint8Array): Promise<string> {
    const { extractor, repository, batches, rateLimiter, sessions } = this.deps;

    validateImage(image, this.deps.maxImageBytes);

    const cards = await extractor.extract(image, userId);
    if (cards.length === 0) {
      return noCardsText();
    }

    let savedCount = 0;
    let failedCount = 0;

    for (const card of cards) {
      const reference = await repository.saveCard(card);
      card.reference = reference;
      card.processed = reference !== null;

      if (card.processed) {
        savedCount += 1;
      } else {
        failedCount += 1;
        await batches.recordError(userId, `Could not save card for ${card.name ?? card.company ?? 'unknown contact'}`);
      }

      await batches.addCard(userId, card);
    }

    await rateLimiter.increment(userId);

    const status = await sessions.getOrCreate(userId);
    return processingResultText({ cards, savedCount, failedCount, batch: status.currentBatch });
  }
}
