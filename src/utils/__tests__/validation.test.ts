import { describe, expect, it } from 'vitest';
import { cleanName, isValidEmail, normalizePhone, validateAndFormatEmail } from '../validation.js';

describe('isValidEmail', () => {
  it('accepts ordinary addresses', () => {
    expect(isValidEmail('jane.doe+cards@example.co.uk')).toBe(true);
  });

  it('rejects malformed addresses', () => {
    expect(isValidEmail('')).toBe(false);
    expect(isValidEmail('jane@')).toBe(false);
    expect(isValidEmail('jane@example')).toBe(false);
    expect(isValidEmail('jane doe@example.com')).toBe(false);
  });
});

describe('validateAndFormatEmail', () => {
  it('trims a valid address', () => {
    expect(validateAndFormatEmail('  jane@example.com ')).toBe('jane@example.com');
  });

  it('returns null for missing or invalid input', () => {
    expect(validateAndFormatEmail(null)).toBeNull();
    expect(validateAndFormatEmail(undefined)).toBeNull();
    expect(validateAndFormatEmail('not-an-email')).toBeNull();
  });
});

describe('normalizePhone', () => {
  it('strips formatting and keeps the leading plus', () => {
    expect(normalizePhone('+886 2 2345-6789')).toBe('+886223456789');
    expect(normalizePhone('+1 (555) 010-9999 +')).toBe('+15550109999');
  });

  it('turns a leading 00 into a plus', () => {
    expect(normalizePhone('0044 20 7946 0000')).toBe('+442079460000');
  });

  it('keeps national numbers without a prefix', () => {
    expect(normalizePhone('02-2345 6789')).toBe('0223456789');
  });

  it('rejects too short or too long numbers', () => {
    expect(normalizePhone('(02) 1234')).toBeNull();
    expect(normalizePhone('1234567890123456')).toBeNull();
    expect(normalizePhone('')).toBeNull();
    expect(normalizePhone(null)).toBeNull();
  });
});

describe('cleanName', () => {
  it('collapses whitespace', () => {
    expect(cleanName('  Jane \n  Doe ')).toBe('Jane Doe');
  });

  it('returns null for blank names', () => {
    expect(cleanName('   ')).toBeNull();
    expect(cleanName(null)).toBeNull();
  });
});
