import { z } from 'zod';
import type { BusinessCard } from '../types.js';
import { cleanName, normalizePhone, validateAndFormatEmail } from '../utils/validation.js';

const MIN_CONFIDENCE = 0.3;

/**
 * Shape the vision model is asked to return for each card in the photo
 */
export const extractedCardSchema = z.object({
  name: z.string().nullable().describe('Full name of the person'),
  company: z.string().nullable().describe('Company or organisation name'),
  title: z.string().nullable().describe('Job title'),
  department: z.string().nullable().describe('Department or division'),
  phone: z.string().nullable().describe('Office phone number as printed'),
  mobile: z.string().nullable().describe('Mobile phone number as printed'),
  email: z.string().nullable(),
  address: z.string().nullable().describe('Full postal address'),
  website: z.string().nullable(),
  fax: z.string().nullable(),
  confidence_score: z.number().min(0).max(1).describe('Confidence that the fields were read correctly'),
  quality_score: z.number().min(0).max(1).describe('Image quality of this card')
});

export const extractionResultSchema = z.object({
  cards: z.array(extractedCardSchema),
  processing_notes: z.string().nullable().describe('Why cards could not be read, if any')
});

export type ExtractedCard = z.infer<typeof extractedCardSchema>;

const trimmed = (value: string | null): string | null => {
  const result = value?.trim();
  return result ? result : null;
};

/**
 * Build a normalised BusinessCard from raw model output
 */
export const buildBusinessCard = (raw: ExtractedCard, userId: string): BusinessCard => ({
  name: cleanName(raw.name),
  company: cleanName(raw.company),
  title: trimmed(raw.title),
  department: trimmed(raw.department),
  phone: normalizePhone(raw.phone),
  mobile: normalizePhone(raw.mobile),
  email: validateAndFormatEmail(raw.email),
  address: trimmed(raw.address),
  website: trimmed(raw.website),
  fax: normalizePhone(raw.fax),
  confidenceScore: raw.confidence_score,
  qualityScore: raw.quality_score,
  extractedAt: new Date(),
  userId,
  processed: false,
  reference: null
});

/**
 * A card is kept when it is confident enough, names someone and has a way to
 * reach them
 */
export const passesQualityGate = (card: BusinessCard): boolean => {
  if (card.confidenceScore < MIN_CONFIDENCE) {
    return false;
  }

  if (!card.name && !card.company) {
    return false;
  }

  return Boolean(card.phone || card.email || card.address);
};

export const toBusinessCards = (rawCards: ExtractedCard[], userId: string): BusinessCard[] =>
  rawCards
    .map((raw) => buildBusinessCard(raw, userId))
    .filter((card) => {
      const keep = passesQualityGate(card);
      if (!keep) {
        console.warn(`⚠️  Card quality too low, skipped (confidence ${card.confidenceScore})`);
      }
      return keep;
    });
