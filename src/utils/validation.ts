/**
 * Contact field validation utilities
 */

/**
 * Validates if a string is a properly formatted email address
 * @param email - The email string to validate
 * @returns boolean - true if valid email format, false otherwise
 */
export function isValidEmail(email: string): boolean {
  if (!email) {
    return false;
  }

  const emailRegex = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

  return emailRegex.test(email.trim());
}

/**
 * Validates and trims an email address
 * @returns string | null - Trimmed email if valid, null if invalid
 */
export function validateAndFormatEmail(email: string | null | undefined): string | null {
  if (!email) {
    return null;
  }

  const trimmedEmail = email.trim();
  return isValidEmail(trimmedEmail) ? trimmedEmail : null;
}

/**
 * Normalizes a phone or fax number to digits with an optional leading "+".
 * A leading international "00" becomes "+".
 * @returns string | null - null when fewer than 8 or more than 15 digits remain
 */
export function normalizePhone(phone: string | null | undefined): string | null {
  if (!phone) {
    return null;
  }

  let cleaned = phone.trim().replace(/[^\d+]/g, '');
  // Only a leading plus is meaningful
  cleaned = cleaned.charAt(0) + cleaned.slice(1).replace(/\+/g, '');

  if (cleaned.startsWith('00')) {
    cleaned = `+${cleaned.slice(2)}`;
  }

  const digits = cleaned.replace(/\D/g, '');
  if (digits.length < 8 || digits.length > 15) {
    return null;
  }

  return cleaned;
}

/**
 * Collapses repeated whitespace in a person or company name
 */
export function cleanName(name: string | null | undefined): string | null {
  if (!name) {
    return null;
  }

  const cleaned = name.replace(/\s+/g, ' ').trim();
  return cleaned.length > 0 ? cleaned : null;
}
