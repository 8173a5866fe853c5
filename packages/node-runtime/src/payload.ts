// packages/node-runtime/src/payload.ts
import { promises as fsp } from 'node:fs';
import { basename } from 'node:path';
import { LITERAL_PAYLOAD_FILENAME } from '../../core/src/config/defaults.js';
import { FilesystemError } from '../../core/src/errors/index.js';
import { utf8Encode } from '../../core/src/util/bytes.js';

export interface Payload {
  filename : string;
  bytes    : Uint8Array;
}

/** Errors meaning "this argument is not a file", not "the file is broken". */
const NOT_A_FILE = new Set(['ENOENT', 'ENOTDIR', 'EISDIR', 'ENAMETOOLONG']);

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

/**
 * A payload argument names a file when one can be read at `path`;
 * otherwise the argument itself is the message.
 */
export async function loadPayload(arg: string, path: string = arg): Promise<Payload> {
  try {
    const bytes = await fsp.readFile(path);
    return { filename: basename(arg), bytes: new Uint8Array(bytes) };
  } catch (err) {
    const code = errorCode(err);
    if (code !== undefined && NOT_A_FILE.has(code)) {
      return { filename: LITERAL_PAYLOAD_FILENAME, bytes: utf8Encode(arg) };
    }
    const msg = err instanceof Error ? err.message : String(err);
    throw new FilesystemError(`Error reading payload file '${arg}': ${msg}`);
  }
}
