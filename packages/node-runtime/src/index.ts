// packages/node-runtime/src/index.ts
import { Pixstash, type PixstashOptions } from '../../core/src/index.js';

export function createPixstash(cfg?: PixstashOptions): Pixstash {
  return new Pixstash(cfg);
}

export { Pixstash } from '../../core/src/index.js';
export { decodePng, encodePng, isPng, writePngCarrier } from './png.js';
export { decodeImage, readImageCarrier } from './image.js';
export { loadPayload, type Payload } from './payload.js';
export { createProgram, type CliIO } from './program.js';
