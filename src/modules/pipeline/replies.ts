import type { BatchResult, BusinessCard, ProcessingStatus } from '../../types.js';
import { successRate } from '../session/batch.js';

const orUnknown = (value: string | null): string => value ?? 'not found';

export const helpText = (dailyLimit: number): string => [
  '🎯 Business card scanner',
  '',
  '📱 Send a photo of a business card → it is read and saved automatically',
  '📦 Send "batch" → start batch mode',
  '🏁 Send "end batch" → finish the batch and get a summary',
  '📊 Send "status" → check your progress',
  '',
  '⚡ Several cards in one photo are supported',
  `📋 Daily limit: ${dailyLimit} photos`
].join('\n');

export const unknownCommandText = (): string =>
  '❓ Unknown command\nSend "help" to see what I can do';

export const quotaExceededText = (usage: number, limit: number): string =>
  `⚠️ Daily limit reached (${usage}/${limit})\nPlease try again tomorrow`;

export const batchStartedText = (): string =>
  '📦 Batch mode started\n\nSend your business card photos one after another.\nSend "end batch" when you are done.';

export const notInBatchText = (): string => '⚠️ No batch is open';

export const noCardsText = (): string =>
  '🔍 No business card found in this photo.\n💡 Tip: good light and a flat card work best.';

const formatDuration = (ms: number): string => {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}:${seconds.toString().padStart(2, '0')}`;
};

export const batchSummaryText = (batch: BatchResult): string => {
  const completedAt = batch.completedAt ?? new Date();
  const lines = [
    '📊 Batch complete!',
    '',
    `Total: ${batch.totalCards}`,
    `Saved: ${batch.successfulCards} (${Math.round(successRate(batch) * 100)}%)`,
    `Failed: ${batch.failedCards}`,
    `Time: ${formatDuration(completedAt.getTime() - batch.startedAt.getTime())}`
  ];

  if (batch.errors.length > 0) {
    lines.push('', `⚠️ ${batch.errors[0].slice(0, 50)}`);
  }

  return lines.join('\n');
};

export const usageStatusText = (status: ProcessingStatus, dailyLimit: number): string => [
  '📊 Usage',
  '',
  `Today: ${status.dailyUsage} / ${dailyLimit} photos`,
  `Batch mode: ${status.isBatchMode ? 'on' : 'off'}`
].join('\n');

export interface ProcessingOutcome {
  cards: BusinessCard[];
  savedCount: number;
  failedCount: number;
  batch: BatchResult | null;
}

export const processingResultText = ({ cards, savedCount, failedCount, batch }: ProcessingOutcome): string => {
  if (savedCount === 0) {
    return '❌ Could not save your card, please try again later';
  }

  let text: string;
  if (cards.length === 1) {
    const card = cards[0];
    text = [
      '✅ Card saved!',
      '',
      `Name: ${orUnknown(card.name)}`,
      `Company: ${orUnknown(card.company)}`,
      `Title: ${orUnknown(card.title)}`,
      `Phone: ${orUnknown(card.phone)}`,
      `Email: ${orUnknown(card.email)}`
    ].join('\n');
  } else {
    text = [
      '✅ Done!',
      '',
      `Saved: ${savedCount}`,
      `Failed: ${failedCount}`,
      `Total: ${cards.length}`
    ].join('\n');
  }

  if (batch) {
    text += `\n\n📦 Batch progress: ${batch.totalCards} cards`;
  }

  return text;
};
