import { InvalidImageError } from '../../errors.js';

const JPEG_MAGIC = [0xff, 0xd8, 0xff];
const PNG_MAGIC = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

const startsWith = (data: Uint8Array, magic: number[]): boolean =>
  data.length >= magic.length && magic.every((byte, index) => data[index] === byte);

export type ImageFormat = 'jpeg' | 'png';

/**
 * Accept only non-empty JPEG or PNG data within the size limit
 */
export const validateImage = (data: Uint8Array, maxBytes: number): ImageFormat => {
  if (data.byteLength === 0) {
    throw new InvalidImageError('empty image', maxBytes);
  }

  if (data.byteLength > maxBytes) {
    throw new InvalidImageError(`image is ${data.byteLength} bytes, limit is ${maxBytes}`, maxBytes);
  }

  if (startsWith(data, JPEG_MAGIC)) {
    return 'jpeg';
  }

  if (startsWith(data, PNG_MAGIC)) {
    return 'png';
  }

  throw new InvalidImageError('not a JPEG or PNG image', maxBytes);
};
