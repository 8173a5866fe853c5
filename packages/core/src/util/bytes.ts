import { FilenameTooLongError } from '../errors/index.js';
import { MAX_FILENAME_BYTES } from '../config/defaults.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: false, ignoreBOM: true });

/* ------------------------------------------------------------------ */

/** UTF-8 encode; lone surrogates come out as U+FFFD. */
export function utf8Encode(s: string): Uint8Array {
  return encoder.encode(s);
}

/** UTF-8 decode; invalid sequences become U+FFFD instead of throwing. */
export function utf8DecodeLossy(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

/**
 * Filename bytes as they go into the header. Raw bytes are passed through
 * a lossy decode first, so both ends see the same substituted string.
 */
export function filenameBytes(name: string | Uint8Array): Uint8Array {
  const text  = typeof name === 'string' ? name : utf8DecodeLossy(name);
  const bytes = utf8Encode(text);
  if (bytes.byteLength > MAX_FILENAME_BYTES) {
    throw new FilenameTooLongError(bytes.byteLength, MAX_FILENAME_BYTES);
  }
  return bytes;
}

export function toPayloadBytes(payload: string | Uint8Array): Uint8Array {
  return typeof payload === 'string' ? utf8Encode(payload) : payload;
}
