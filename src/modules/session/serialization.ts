import { z } from 'zod';
import { ProcessingStatus } from '../../types.js';

const isoDate = z.string().datetime().transform((value) => new Date(value));

const businessCardSchema = z.object({
  name: z.string().nullable(),
  company: z.string().nullable(),
  title: z.string().nullable(),
  department: z.string().nullable(),
  phone: z.string().nullable(),
  mobile: z.string().nullable(),
  email: z.string().nullable(),
  address: z.string().nullable(),
  website: z.string().nullable(),
  fax: z.string().nullable(),
  confidenceScore: z.number().min(0).max(1),
  qualityScore: z.number().min(0).max(1),
  extractedAt: isoDate,
  userId: z.string(),
  processed: z.boolean(),
  reference: z.string().nullable()
});

const batchResultSchema = z
  .object({
    userId: z.string(),
    startedAt: isoDate,
    completedAt: isoDate.nullable(),
    cards: z.array(businessCardSchema),
    totalCards: z.number().int().nonnegative(),
    successfulCards: z.number().int().nonnegative(),
    failedCards: z.number().int().nonnegative(),
    errors: z.array(z.string())
  })
  .refine((batch) => batch.totalCards === batch.successfulCards + batch.failedCards, {
    message: 'totalCards must equal successfulCards + failedCards'
  });

const processingStatusSchema = z
  .object({
    userId: z.string().min(1),
    dailyUsage: z.number().int().nonnegative(),
    usageResetDate: isoDate,
    lastActivity: isoDate,
    isBatchMode: z.boolean(),
    currentBatch: batchResultSchema.nullable()
  })
  .refine((status) => status.isBatchMode === (status.currentBatch !== null), {
    message: 'currentBatch must be present exactly when isBatchMode is set'
  });

export class SerializationFault extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'SerializationFault';
  }
}

export const serializeStatus = (status: ProcessingStatus): string => JSON.stringify(status);

/**
 * Parse a stored status record. Throws SerializationFault on corrupt JSON or a
 * payload that does not match the current record shape.
 */
export const deserializeStatus = (raw: string): ProcessingStatus => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new SerializationFault(`Stored status is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = processingStatusSchema.safeParse(json);
  if (!result.success) {
    throw new SerializationFault(
      'Stored status does not match the expected schema',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return result.data;
};
