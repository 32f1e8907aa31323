import type { QueryResultRow } from 'pg';
import type { BusinessCard, CardRepository } from '../../types.js';
import { executeQuery } from './client.js';

export type QueryFn = (text: string, params?: unknown[]) => Promise<QueryResultRow[]>;

const INSERT_CARD_SQL = `
  INSERT INTO business_cards (
    user_id, name, company, title, department, phone, mobile, email,
    address, website, fax, confidence_score, quality_score, extracted_at
  )
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)
  RETURNING id
`;

/**
 * Persists extracted cards to the business_cards table
 */
export class PostgresCardRepository implements CardRepository {
  constructor(private readonly query: QueryFn = executeQuery) {}

  /**
   * Insert a card. Returns the new row id, or null when the insert failed.
   */
  async saveCard(card: BusinessCard): Promise<string | null> {
    try {
      const rows = await this.query(INSERT_CARD_SQL, [
        card.userId,
        card.name,
        card.company,
        card.title,
        card.department,
        card.phone,
        card.mobile,
        card.email,
        card.address,
        card.website,
        card.fax,
        card.confidenceScore,
        card.qualityScore,
        card.extractedAt
      ]);

      const id: unknown = rows[0]?.id;
      if (id === undefined || id === null) {
        console.error(`❌ Card insert for ${card.userId} returned no id`);
        return null;
      }

      console.log(`💾 Saved business card ${String(id)} for ${card.userId} (${card.name ?? card.company ?? 'unnamed'})`);
      return String(id);
    } catch (error) {
      console.error(`❌ Failed to save business card for ${card.userId}:`, error);
      return null;
    }
  }
}
