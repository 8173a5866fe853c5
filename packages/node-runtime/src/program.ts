// packages/node-runtime/src/program.ts
import { Command, Option } from 'commander';
import { promises as fsp } from 'node:fs';
import { basename, resolve } from 'node:path';
import { Pixstash } from '../../core/src/index.js';
import { toVerbosity, type Verbosity } from '../../core/src/util/logger.js';
import { DEFAULT_ENCODED_OUTPUT, VERBOSE_ENV } from '../../core/src/config/defaults.js';
import { readImageCarrier } from './image.js';
import { writePngCarrier } from './png.js';
import { loadPayload } from './payload.js';
import { assertWritable, decodedOutputPath, encodedOutputPath } from './paths.js';

const PKG_VERSION = '1.0.0'; // sync with root package.json

export interface CliIO {
  stdout : (s: string) => void;
  stderr : (s: string) => void;
  cwd    : string;
  env    : Record<string, string | undefined>;
}

type GlobalOptions = {
  verbose : number;
  root?   : string;
};

const defaultIO: CliIO = {
  stdout : s => { process.stdout.write(s); },
  stderr : s => { process.stderr.write(s); },
  cwd    : process.cwd(),
  env    : process.env,
};

export function createProgram(io: CliIO = defaultIO): Command {
  const program = new Command();
  const baseVerbosity = toVerbosity(Number(io.env[VERBOSE_ENV] ?? 0));

  program
    .name('pixstash')
    .version(PKG_VERSION)
    .description(
      'Hide a file or a message in the least-significant bits of an image.\n' +
      'Nothing is encrypted: anyone who suspects steganography can read it back.',
    )
    .configureOutput({
      writeOut: str => io.stdout(str),
      writeErr: str => io.stderr(str),
    })

    // verbosity (repeatable)
    .addOption(
      new Option('-v, --verbose', 'increase verbosity (use multiple times)')
        .default(baseVerbosity)
        .argParser((_: string, previous: number) => previous + 1)
    )

    .addOption(
      new Option('--root <dir>', 'refuse to write outside this directory (default: cwd)')
    );

  /* -------------------------------------------------------------- */
  /*  Helpers                                                       */
  /* -------------------------------------------------------------- */
  const at = (p: string) => resolve(io.cwd, p);

  function setup(): { stash: Pixstash; root: string } {
    const opts = program.opts<GlobalOptions>();
    const verbose: Verbosity = toVerbosity(opts.verbose);
    return {
      stash : new Pixstash({ verbose, logger: msg => io.stderr(msg + '\n') }),
      root  : opts.root === undefined ? io.cwd : at(opts.root),
    };
  }

  program
    .command('encode')
    .alias('e')
    .description('Encode payload in image')
    .argument('<target_image>', 'target image to encode the payload into')
    .argument('<payload>', 'payload (file or string) to hide in the image')
    .argument('[output]', 'output file name (always saved as PNG)', DEFAULT_ENCODED_OUTPUT)
    .action(async (targetImage: string, payloadArg: string, output: string) => {
      const { stash, root } = setup();
      const carrier = await readImageCarrier(at(targetImage), targetImage);
      const payload = await loadPayload(payloadArg, at(payloadArg));

      const outPath = encodedOutputPath(output);
      const absOut  = assertWritable(at(outPath), root);

      const encoded = stash.encode(carrier, payload.filename, payload.bytes);
      await writePngCarrier(absOut, encoded);
      io.stdout(`Encoded image saved to '${outPath}'\n`);
    });

  program
    .command('decode')
    .alias('d')
    .description('Decode payload from an image')
    .argument('<encoded_image>', 'encoded image to extract the payload from')
    .argument('[output]', 'output file name; the original file extension is preserved')
    .action(async (encodedImage: string, output: string | undefined) => {
      const { stash, root } = setup();
      const carrier = await readImageCarrier(at(encodedImage), encodedImage);
      const { filename, payload } = stash.decode(carrier);

      const outPath = decodedOutputPath(filename, output);
      const absOut  = assertWritable(at(outPath), root);
      await fsp.writeFile(absOut, payload);

      io.stdout(`Decoded payload saved to '${outPath}'\n`);
      if (output !== undefined) io.stdout(`Original file name was '${filename}'\n`);
    });

  program
    .command('inspect')
    .description('Show the hidden header (filename, payload size) as JSON')
    .argument('<image>', 'encoded image')
    .action(async (image: string) => {
      const { stash } = setup();
      const carrier = await readImageCarrier(at(image), image);
      const meta = { width: carrier.width, height: carrier.height, ...stash.inspect(carrier) };
      io.stdout(JSON.stringify(meta, null, 2) + '\n');
    });

  program
    .command('capacity')
    .description('Show how many payload bytes an image can hold, as JSON')
    .argument('<image>', 'carrier image')
    .argument('[filename]', 'payload file whose name will be stored (directories are dropped)', '')
    .action(async (image: string, filename: string) => {
      const { stash } = setup();
      const carrier = await readImageCarrier(at(image), image);
      const meta = { width: carrier.width, height: carrier.height, ...stash.capacity(carrier, basename(filename)) };
      io.stdout(JSON.stringify(meta, null, 2) + '\n');
    });

  return program;
}
