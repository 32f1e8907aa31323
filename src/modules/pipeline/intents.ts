import type { Intent } from '../../types.js';

const COMMANDS: Array<[Intent, string[]]> = [
  ['start_batch', ['batch', 'start batch']],
  ['end_batch', ['end batch', 'done', 'finish batch']],
  ['query_status', ['status', 'progress']],
  ['help', ['help', '?']]
];

/**
 * Map an inbound text message to an intent
 */
export const parseIntent = (text: string): Intent => {
  const normalized = text.trim().toLowerCase().replace(/\s+/g, ' ');
  const match = COMMANDS.find(([, keywords]) => keywords.includes(normalized));
  return match ? match[0] : 'unknown';
};
