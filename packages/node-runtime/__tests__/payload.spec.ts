import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { loadPayload } from '../src/payload.js';

describe('loadPayload', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'pixstash-payload-'));
    await fs.writeFile(join(dir, 'data.bin'), Uint8Array.of(0, 1, 2, 254));
  });

  afterAll(() => fs.rm(dir, { recursive: true, force: true }));

  it('reads a file and keeps its base name', async () => {
    const p = await loadPayload(join(dir, 'data.bin'));
    expect(p.filename).toBe('data.bin');
    expect(Array.from(p.bytes)).toEqual([0, 1, 2, 254]);
  });

  it('treats anything that is not a file as a literal message', async () => {
    const p = await loadPayload('meet at noon');
    expect(p).toEqual({
      filename : 'output.txt',
      bytes    : new TextEncoder().encode('meet at noon'),
    });
  });

  it('treats a directory argument as a literal', async () => {
    const p = await loadPayload(dir);
    expect(p.filename).toBe('output.txt');
  });

  it('resolves the file at a separate path but names it after the argument', async () => {
    const p = await loadPayload('data.bin', join(dir, 'data.bin'));
    expect(p.filename).toBe('data.bin');
    expect(p.bytes.byteLength).toBe(4);
  });
});
