import { PixelBuffer } from '../../core/src/carrier/PixelBuffer.js';
import { ImageFormatError } from '../../core/src/errors/index.js';
import { createPixstash, decodePng, encodePng, isPng } from '../src/index.js';

const pattern = (w: number, h: number) => {
  const data = new Uint8Array(w * h * 4);
  for (let i = 0; i < data.length; i++) data[i] = (i * 31 + 7) & 0xFF;
  return new PixelBuffer(w, h, data);
};

describe('PNG carrier I/O', () => {
  it('writes and reads RGBA pixels byte for byte', () => {
    const img  = pattern(5, 3);
    const back = decodePng(encodePng(img));

    expect(back.dimensions()).toEqual({ width: 5, height: 3 });
    expect(back.channels).toBe(4);
    expect(Array.from(back.data)).toEqual(Array.from(img.data));
  });

  it('gives RGB carriers an opaque alpha channel', () => {
    const img  = new PixelBuffer(2, 1, Uint8Array.of(1, 2, 3, 4, 5, 6), 3);
    const back = decodePng(encodePng(img));
    expect(Array.from(back.data)).toEqual([1, 2, 3, 255, 4, 5, 6, 255]);
  });

  it('keeps the hidden bits through a PNG round trip', () => {
    const stash   = createPixstash({ verbose: 0 });
    const encoded = stash.encode(pattern(12, 12), 'secret.txt', 'over the wire');
    const { filename, payload } = stash.decode(decodePng(encodePng(encoded)));

    expect(filename).toBe('secret.txt');
    expect(new TextDecoder().decode(payload)).toBe('over the wire');
  });

  it('recognises the PNG signature', () => {
    expect(isPng(encodePng(pattern(1, 1)))).toBe(true);
    expect(isPng(Uint8Array.of(0xFF, 0xD8, 0xFF))).toBe(false);
  });

  it('rejects non-PNG input with ImageFormatError', () => {
    const jpegish = Uint8Array.of(0xFF, 0xD8, 0xFF, 0xE0, 0, 0x10, 0x4A, 0x46, 0x49, 0x46);
    expect(() => decodePng(jpegish, 'photo.jpg')).toThrow(ImageFormatError);
    expect(() => decodePng(jpegish, 'photo.jpg'))
      .toThrow("File 'photo.jpg' is not an image or has the wrong format: missing PNG signature");
  });

  it('rejects a PNG with a corrupt body', () => {
    const broken = encodePng(pattern(4, 4)).subarray(0, 30);
    expect(() => decodePng(broken, 'cut.png')).toThrow(ImageFormatError);
  });
});
