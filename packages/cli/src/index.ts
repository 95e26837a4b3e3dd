#!/usr/bin/env tsx
// bandstamp — fuse, classify and stamp observations from the command line
//
//   bandstamp demo [--pretty]
//   bandstamp record --value '{"temperature_K":279.9}' --a_raw '[-0.6,-0.64]' [--weights ..] [--prev HEX]
//   bandstamp manifest validate|card|dump <path>|template <path>
//   bandstamp examples <path> [--count N] [--seed S]
//   bandstamp convert <in.jsonl> <out.jsonl>
//   bandstamp verify <records.jsonl>
//   bandstamp check
//
// Every command takes --manifest-from "<json or path>"; BANDSTAMP_MANIFEST is
// the fallback. verify checks bands and manifest_id only when one of them is set.

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { AlignEngine, demoRecords, formatBandCard, manifestFromSources, resolveManifest } from '@bandstamp/core';
import type { Manifest } from '@bandstamp/core';
import {
  convertFile,
  formatJson,
  manifestDump,
  manifestValidate,
  manifestWriteTemplate,
  runChecks,
  singleRecord,
  verifyFile,
  writeExamples,
} from './commands.js';

function manifestFor(manifestFrom: string | undefined): Manifest {
  return resolveManifest(manifestFrom, process.env);
}

function engineFor(manifestFrom: string | undefined): AlignEngine {
  return new AlignEngine({ manifest: manifestFor(manifestFrom) });
}

function finish(text: string, exitCode = 0): void {
  console.log(text);
  process.exitCode = exitCode;
}

const cli = yargs(hideBin(process.argv))
  .scriptName('bandstamp')
  .usage('$0 <command> [options]')
  .option('manifest-from', {
    type: 'string',
    description: 'Manifest JSON string or path (default: BANDSTAMP_MANIFEST, then built-in).',
  })
  .command(
    'demo',
    'Print three chained example records.',
    (cmd) => cmd.option('pretty', { type: 'boolean', default: false }),
    (argv) => {
      const records = demoRecords(engineFor(argv['manifest-from']));
      finish(records.map((r) => formatJson(r, argv.pretty)).join('\n'));
    },
  )
  .command(
    'record',
    'Build a single record.',
    (cmd) =>
      cmd
        .option('value', { type: 'string', demandOption: true, description: 'JSON object payload.' })
        .option('a_raw', { type: 'string', demandOption: true, description: 'JSON list of raw observations.' })
        .option('weights', { type: 'string', description: 'JSON list of weights, same length as a_raw.' })
        .option('prev', { type: 'string', description: 'Digest of the previous stamp to chain from.' })
        .option('pretty', { type: 'boolean', default: false }),
    (argv) => {
      const record = singleRecord(engineFor(argv['manifest-from']), {
        value: argv.value,
        aRaw: argv.a_raw,
        weights: argv.weights,
        prev: argv.prev,
      });
      finish(formatJson(record, argv.pretty));
    },
  )
  .command('manifest', 'Inspect or author manifests.', (cmd) =>
    cmd
      .command(
        'validate',
        'Validate the effective manifest (exit 2 on failure).',
        (sub) => sub,
        (argv) => {
          const { text, exitCode } = manifestValidate(manifestFor(argv['manifest-from']));
          finish(text, exitCode);
        },
      )
      .command(
        'card',
        'Print a compact band table.',
        (sub) => sub,
        (argv) => finish(formatBandCard(manifestFor(argv['manifest-from']))),
      )
      .command(
        'dump <path>',
        'Write the normalized effective manifest.',
        (sub) => sub.positional('path', { type: 'string', demandOption: true }),
        async (argv) => finish(await manifestDump(argv.path, manifestFor(argv['manifest-from']))),
      )
      .command(
        'template <path>',
        'Write an annotated manifest template.',
        (sub) => sub.positional('path', { type: 'string', demandOption: true }),
        async (argv) => finish(await manifestWriteTemplate(argv.path)),
      )
      .demandCommand(1),
  )
  .command(
    'examples <path>',
    'Write chained example records as JSONL.',
    (cmd) =>
      cmd
        .positional('path', { type: 'string', demandOption: true })
        .option('count', { type: 'number', default: 10 })
        .option('seed', { type: 'number', description: 'Seed for reproducible jitter.' }),
    async (argv) => {
      const engine = engineFor(argv['manifest-from']);
      finish(await writeExamples(argv.path, engine, { count: argv.count, seed: argv.seed }));
    },
  )
  .command(
    'convert <input> <output>',
    'Convert {value, a_raw, prev?} JSONL into chained records.',
    (cmd) =>
      cmd
        .positional('input', { type: 'string', demandOption: true })
        .positional('output', { type: 'string', demandOption: true }),
    async (argv) => finish(await convertFile(argv.input, argv.output, engineFor(argv['manifest-from']))),
  )
  .command(
    'verify <path>',
    'Verify stamps, digests and prev links of a record JSONL file.',
    (cmd) =>
      cmd
        .positional('path', { type: 'string', demandOption: true })
        .option('continuity', { type: 'boolean', default: true, description: 'Check prev links.' }),
    async (argv) => {
      // No built-in default here: without a manifest only digests and links are checked
      const manifest = manifestFromSources(argv['manifest-from'], process.env);
      const { text, exitCode } = await verifyFile(argv.path, manifest, argv.continuity);
      finish(text, exitCode);
    },
  )
  .command(
    'check',
    'Run the built-in invariant checks.',
    (sub) => sub,
    (argv) => {
      const { text, exitCode } = runChecks(manifestFor(argv['manifest-from']));
      finish(text, exitCode);
    },
  )
  .demandCommand(1)
  .strict()
  .fail(false)
  .help();

try {
  await cli.parseAsync();
} catch (err) {
  console.error('[cli]', err instanceof Error ? err.message : err);
  process.exitCode = 1;
}
