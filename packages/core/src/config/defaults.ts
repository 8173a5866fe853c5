// packages/core/src/config/defaults.ts

/* ---------------------------- Frame layout --------------------------- */
export const FILENAME_LENGTH_BITS = 16 as const;
export const PAYLOAD_LENGTH_BITS  = 64 as const;
export const BITS_PER_BYTE        = 8  as const;

export const MAX_FILENAME_BYTES   = 0xFFFF;

/** Bits taken by the two length fields alone (empty filename, empty payload). */
export const FRAME_FIXED_BITS     = FILENAME_LENGTH_BITS + PAYLOAD_LENGTH_BITS;

/** Color channels per pixel that carry data (R, G, B). Alpha never does. */
export const COLOR_CHANNELS       = 3 as const;

/* ------------------------------ CLI ---------------------------------- */
export const LITERAL_PAYLOAD_FILENAME = 'output.txt';
export const DEFAULT_ENCODED_OUTPUT   = 'encoded.png';
export const FALLBACK_DECODED_NAME    = 'decoded.bin';
export const VERBOSE_ENV              = 'PIXSTASH_VERBOSE';
