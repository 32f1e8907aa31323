import { describe, expect, it } from 'vitest';
import { validateImage } from '../image-validation.js';
import { InvalidImageError } from '../../../errors.js';

const PNG = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00]);
const JPEG = new Uint8Array([0xff, 0xd8, 0xff, 0xdb]);

describe('validateImage', () => {
  it('detects JPEG and PNG data', () => {
    expect(validateImage(JPEG, 1024)).toBe('jpeg');
    expect(validateImage(PNG, 1024)).toBe('png');
  });

  it('rejects empty data', () => {
    expect(() => validateImage(new Uint8Array(), 1024)).toThrow('Rejected image: empty image');
  });

  it('rejects data over the size limit', () => {
    expect(() => validateImage(JPEG, 3)).toThrow('Rejected image: image is 4 bytes, limit is 3');
  });

  it('rejects other formats with a user facing message', () => {
    const gif = new Uint8Array([0x47, 0x49, 0x46, 0x38, 0x39, 0x61]);

    try {
      validateImage(gif, 5 * 1024 * 1024);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidImageError);
      expect(error instanceof InvalidImageError && error.userMessage).toBe(
        '❌ Unsupported image.\nPlease send a JPG or PNG photo under 5 MB.'
      );
    }
  });

  it('rejects a truncated PNG header', () => {
    expect(() => validateImage(PNG.slice(0, 4), 1024)).toThrow(InvalidImageError);
  });
});
