/**
 * Image Decoder
 *
 * Decodes the raster images embedded in schemas as data: URIs.
 * Only the bytes and the pixel size are of interest.
 */

import sharp from 'sharp';

export interface DecodedImage {
  width: number;
  height: number;
}

/**
 * Extract the payload of a base64 data URI. Null if the href is anything else.
 */
export function decodeDataUri(href: string): Uint8Array | null {
  const match = /^data:image\/[\w.+-]+;base64,([\s\S]*)$/.exec(href.trim());
  if (!match) return null;
  const payload = match[1].replace(/\s+/g, '');
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(payload)) return null;
  return new Uint8Array(Buffer.from(payload, 'base64'));
}

/**
 * Read the pixel size of an encoded image. Rejects when the codec cannot
 * make sense of the bytes.
 */
export async function decodeImage(bytes: Uint8Array): Promise<DecodedImage> {
  const metadata = await sharp(bytes).metadata();
  if (!metadata.width || !metadata.height) {
    throw new Error('Image has no dimensions');
  }
  return { width: metadata.width, height: metadata.height };
}
