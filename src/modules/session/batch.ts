import { BatchResult, BusinessCard } from '../../types.js';
import { SessionStore } from './store.js';

export const successRate = (batch: BatchResult): number =>
  batch.totalCards === 0 ? 0 : batch.successfulCards / batch.totalCards;

const createBatchResult = (userId: string): BatchResult => ({
  userId,
  startedAt: new Date(),
  completedAt: null,
  cards: [],
  totalCards: 0,
  successfulCards: 0,
  failedCards: 0,
  errors: []
});

/**
 * Batch mode state machine layered on the session store.
 *
 * "No batch open" is reported through null / false returns, never thrown.
 */
export class BatchCoordinator {
  constructor(private readonly store: SessionStore) {}

  /**
   * Open a new batch. An already open batch is closed and discarded first;
   * its cards are not carried over.
   */
  async start(userId: string): Promise<BatchResult> {
    const status = await this.store.getOrCreate(userId);
    const now = new Date();

    if (status.isBatchMode && status.currentBatch) {
      const discarded = status.currentBatch;
      discarded.completedAt = now;
      console.warn(
        `⚠️  Batch restarted for ${userId}: discarding open batch from ${discarded.startedAt.toISOString()} ` +
        `(${discarded.totalCards} cards, ${discarded.successfulCards} ok, ${discarded.failedCards} failed)`
      );
    }

    const batch = createBatchResult(userId);
    status.isBatchMode = true;
    status.currentBatch = batch;
    status.lastActivity = now;
    await this.store.save(status);

    console.log(`📦 Batch mode started for ${userId}`);
    return batch;
  }

  /**
   * Close the open batch and hand it to the caller, or null when none is open
   */
  async end(userId: string): Promise<BatchResult | null> {
    const status = await this.store.getOrCreate(userId);

    if (!status.isBatchMode || !status.currentBatch) {
      return null;
    }

    const batch = status.currentBatch;
    batch.completedAt = new Date();

    status.isBatchMode = false;
    status.currentBatch = null;
    status.lastActivity = batch.completedAt;
    await this.store.save(status);

    console.log(`🏁 Batch mode ended for ${userId}: ${batch.totalCards} cards, success rate ${successRate(batch).toFixed(2)}`);
    return batch;
  }

  async addCard(userId: string, card: BusinessCard): Promise<boolean> {
    const status = await this.store.getOrCreate(userId);

    if (!status.isBatchMode || !status.currentBatch) {
      return false;
    }

    const batch = status.currentBatch;
    batch.cards.push(card);
    batch.totalCards += 1;

    if (card.processed) {
      batch.successfulCards += 1;
    } else {
      batch.failedCards += 1;
    }

    status.lastActivity = new Date();
    await this.store.save(status);
    return true;
  }

  async recordError(userId: string, message: string): Promise<boolean> {
    const status = await this.store.getOrCreate(userId);

    if (!status.isBatchMode || !status.currentBatch) {
      return false;
    }

    status.currentBatch.errors.push(message);
    status.lastActivity = new Date();
    await this.store.save(status);
    return true;
  }

  /**
   * Progress snapshot of the open batch, or null when none is open
   */
  async statusText(userId: string): Promise<string | null> {
    const status = await this.store.getOrCreate(userId);

    if (!status.isBatchMode || !status.currentBatch) {
      return null;
    }

    const batch = status.currentBatch;
    const elapsedMinutes = Math.floor((Date.now() - batch.startedAt.getTime()) / 60000);

    return [
      `📊 Batch progress: ${batch.totalCards} cards`,
      `✅ Succeeded: ${batch.successfulCards}`,
      `❌ Failed: ${batch.failedCards}`,
      `⏱️ Elapsed: ${elapsedMinutes} min`
    ].join('\n');
  }
}
