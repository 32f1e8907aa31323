import { createAnthropic } from '@ai-sdk/anthropic';
import { generateObject } from 'ai';
import { config } from '../config.js';
import { CardExtractionError } from '../errors.js';
import type { BusinessCard, CardExtractor } from '../types.js';
import { extractionResultSchema, toBusinessCards } from './cards.js';

const CARD_PROMPT = `
You are a business card OCR system. Analyse the photo and extract every business card in it.

Rules:
- The photo may contain several cards; return one entry per card.
- Use null for any field that is not printed on the card.
- Keep phone numbers exactly as printed.
- Addresses must be complete.
- confidence_score rates how sure you are the fields were read correctly (0-1).
- quality_score rates the image quality of that card (0-1).
- If no card can be read, return an empty list and explain why in processing_notes.
`;

const detectMediaType = (image: Uint8Array): string =>
  image[0] === 0x89 && image[1] === 0x50 ? 'image/png' : 'image/jpeg';

/**
 * Vision-model card extractor on Anthropic through the ai SDK
 */
export class AnthropicCardExtractor implements CardExtractor {
  private readonly anthropic = createAnthropic({ apiKey: config.ANTHROPIC_API_KEY });

  constructor(private readonly modelId: string = config.AI_MODEL) {}

  async extract(image: Uint8Array, userId: string): Promise<BusinessCard[]> {
    console.log(`🤖 Extracting cards for ${userId} (${image.byteLength} bytes)`);

    const result = await generateObject({
      model: this.anthropic(this.modelId),
      schema: extractionResultSchema,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: CARD_PROMPT },
            { type: 'image', image, mediaType: detectMediaType(image) }
          ]
        }
      ]
    }).catch((error: unknown) => {
      console.error(`❌ Card extraction failed for ${userId}:`, error);
      throw new CardExtractionError(
        `AI extraction failed: ${error instanceof Error ? error.message : String(error)}`,
        { userId }
      );
    });

    const { cards: rawCards, processing_notes: notes } = result.object;
    const cards = toBusinessCards(rawCards, userId);

    console.log(`✅ Extraction completed for ${userId}: ${cards.length}/${rawCards.length} cards kept`, notes ?? '');
    return cards;
  }
}

/**
 * Test AI configuration
 */
export const testAIConfiguration = (): boolean => {
  if (!config.ANTHROPIC_API_KEY) {
    console.error('❌ ANTHROPIC_API_KEY is not set, card extraction will fail');
    return false;
  }
  console.log(`✅ AI configuration is valid (model ${config.AI_MODEL})`);
  return true;
};
