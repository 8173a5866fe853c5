// packages/node-runtime/src/image.ts
import { promises as fsp } from 'node:fs';
import sharp from 'sharp';
import { PixelBuffer } from '../../core/src/carrier/PixelBuffer.js';
import { FilesystemError, ImageFormatError } from '../../core/src/errors/index.js';
import { decodePng, isPng } from './png.js';

/**
 * Decode any image sharp understands (JPEG, WebP, GIF, TIFF, AVIF, ...)
 * into an 8-bit RGBA carrier. PNG goes through pngjs, which hands back the
 * stored bytes untouched, so a previously encoded image always decodes.
 */
export async function decodeImage(buf: Uint8Array, label = '<buffer>'): Promise<PixelBuffer> {
  if (isPng(buf)) return decodePng(buf, label);

  let raw: { data: Buffer; info: sharp.OutputInfo };
  try {
    raw = await sharp(buf)
      .toColourspace('srgb')
      .ensureAlpha()
      .raw({ depth: 'uchar' })
      .toBuffer({ resolveWithObject: true });
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ImageFormatError(`File '${label}' is not an image or has the wrong format: ${msg}`);
  }

  const { data, info } = raw;
  if (info.channels !== 4) {
    throw new ImageFormatError(`File '${label}' decoded to ${info.channels} channels, expected RGBA`);
  }
  return new PixelBuffer(info.width, info.height, new Uint8Array(data), 4);
}

export async function readImageCarrier(path: string, label = path): Promise<PixelBuffer> {
  let buf: Buffer;
  try {
    buf = await fsp.readFile(path);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new FilesystemError(`Error reading file '${label}': ${msg}`);
  }
  return decodeImage(buf, label);
}
