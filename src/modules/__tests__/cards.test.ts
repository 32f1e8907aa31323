import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { type ExtractedCard, buildBusinessCard, passesQualityGate, toBusinessCards } from '../cards.js';
import { makeCard } from '../../__tests__/fakes.js';

const rawCard = (overrides: Partial<ExtractedCard> = {}): ExtractedCard => ({
  name: '  Jane   Doe ',
  company: 'Acme  Ltd',
  title: ' Head of Sales ',
  department: '',
  phone: '+44 20 7946 0000',
  mobile: '12 34',
  email: ' jane@example.com ',
  address: null,
  website: ' example.com ',
  fax: null,
  confidence_score: 0.92,
  quality_score: 0.7,
  ...overrides
});

describe('buildBusinessCard', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date(2026, 9, 19, 10, 0, 0));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('normalises every field', () => {
    expect(buildBusinessCard(rawCard(), 'u1')).toEqual({
      name: 'Jane Doe',
      company: 'Acme Ltd',
      title: 'Head of Sales',
      department: null,
      phone: '+442079460000',
      mobile: null,
      email: 'jane@example.com',
      address: null,
      website: 'example.com',
      fax: null,
      confidenceScore: 0.92,
      qualityScore: 0.7,
      extractedAt: new Date(2026, 9, 19, 10, 0, 0),
      userId: 'u1',
      processed: false,
      reference: null
    });
  });
});

describe('passesQualityGate', () => {
  it('keeps a confident card with a name and a contact', () => {
    expect(passesQualityGate(makeCard())).toBe(true);
  });

  it('drops low confidence cards', () => {
    expect(passesQualityGate(makeCard({ confidenceScore: 0.29 }))).toBe(false);
    expect(passesQualityGate(makeCard({ confidenceScore: 0.3 }))).toBe(true);
  });

  it('needs a name or a company', () => {
    expect(passesQualityGate(makeCard({ name: null, company: null }))).toBe(false);
    expect(passesQualityGate(makeCard({ name: null }))).toBe(true);
  });

  it('needs a phone, email or address', () => {
    expect(passesQualityGate(makeCard({ phone: null, email: null, address: null }))).toBe(false);
    expect(passesQualityGate(makeCard({ phone: null, email: null, address: '1 Main St' }))).toBe(true);
  });
});

describe('toBusinessCards', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('filters out cards that fail the quality gate', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const cards = toBusinessCards(
      [rawCard(), rawCard({ name: 'Blurry', confidence_score: 0.1 }), rawCard({ name: 'Bob', email: null, phone: 'n/a' })],
      'u7'
    );

    expect(cards.map((card) => card.name)).toEqual(['Jane Doe']);
    expect(cards[0]?.userId).toBe('u7');
    expect(warn).toHaveBeenCalledTimes(2);
  });
});
