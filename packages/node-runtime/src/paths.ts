// packages/node-runtime/src/paths.ts
import { existsSync, accessSync, constants as fsConstants, realpathSync } from 'node:fs';
import { dirname, extname, resolve, sep } from 'node:path';
import { FALLBACK_DECODED_NAME } from '../../core/src/config/defaults.js';
import { FilesystemError } from '../../core/src/errors/index.js';

/** Encoded images are always PNG. */
export function encodedOutputPath(out: string): string {
  return out.endsWith('.png') ? out : `${out}.png`;
}

/**
 * The stored filename comes out of an untrusted image: keep only its last
 * path segment.
 */
export function safeFilename(name: string): string {
  const base = name.split(/[\\/]/).pop() ?? '';
  if (base === '' || base === '.' || base === '..' || base.includes('\0')) {
    return FALLBACK_DECODED_NAME;
  }
  return base;
}

/**
 * Where a decoded payload goes: `out` plus the original extension, or the
 * original name in the working directory.
 */
export function decodedOutputPath(originalName: string, out?: string): string {
  const name = safeFilename(originalName);
  if (out === undefined) return `./${name}`;
  return `${out}${extname(name)}`;
}

/**
 * Resolve `out` against `root` and make sure it lands inside `root`, in an
 * existing, writeable directory.
 */
export function assertWritable(out: string, root: string): string {
  const absRoot   = realpathSync(root);
  const absOut    = resolve(absRoot, out);
  const targetDir = dirname(absOut);

  if (!existsSync(targetDir)) {
    throw new FilesystemError(`Output directory does not exist: ${targetDir}`);
  }

  const realTarget = realpathSync(targetDir);
  if (realTarget !== absRoot && !realTarget.startsWith(absRoot + sep)) {
    throw new FilesystemError('Refusing to write outside of root directory.');
  }

  try {
    accessSync(targetDir, fsConstants.W_OK);
  } catch {
    throw new FilesystemError('Output directory is not writeable');
  }

  return absOut;
}
