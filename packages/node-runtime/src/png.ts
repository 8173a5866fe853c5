// packages/node-runtime/src/png.ts
import { promises as fsp } from 'node:fs';
import { PNG } from 'pngjs';
import { PixelBuffer } from '../../core/src/carrier/PixelBuffer.js';
import { ImageFormatError } from '../../core/src/errors/index.js';

const PNG_SIGNATURE = Uint8Array.of(0x89, 0x50, 0x4E, 0x47, 0x0D, 0x0A, 0x1A, 0x0A);

export function isPng(buf: Uint8Array): boolean {
  return buf.byteLength >= PNG_SIGNATURE.length &&
         PNG_SIGNATURE.every((b, i) => buf[i] === b);
}

/**
 * Decode PNG bytes into an RGBA carrier. pngjs expands every color type to
 * 8-bit RGBA, so palette and grayscale images become ordinary carriers.
 */
export function decodePng(buf: Uint8Array, label = '<buffer>'): PixelBuffer {
  if (!isPng(buf)) {
    throw new ImageFormatError(`File '${label}' is not an image or has the wrong format: missing PNG signature`);
  }
  try {
    const png = PNG.sync.read(Buffer.from(buf.buffer, buf.byteOffset, buf.byteLength));
    return new PixelBuffer(png.width, png.height, new Uint8Array(png.data), 4);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ImageFormatError(`File '${label}' is not an image or has the wrong format: ${msg}`);
  }
}

/** Lossless RGBA PNG; an RGB carrier gets an opaque alpha channel. */
export function encodePng(carrier: PixelBuffer): Buffer {
  const { width, height } = carrier;
  const png = new PNG({ width, height });

  if (carrier.channels === 4) {
    png.data = Buffer.from(carrier.data);
  } else {
    const rgba = Buffer.alloc(width * height * 4, 0xFF);
    for (let p = 0; p < width * height; p++) {
      rgba[p * 4]     = carrier.data[p * 3];
      rgba[p * 4 + 1] = carrier.data[p * 3 + 1];
      rgba[p * 4 + 2] = carrier.data[p * 3 + 2];
    }
    png.data = rgba;
  }
  return PNG.sync.write(png, { colorType: 6 });
}

export async function writePngCarrier(path: string, carrier: PixelBuffer): Promise<void> {
  await fsp.writeFile(path, encodePng(carrier));
}
