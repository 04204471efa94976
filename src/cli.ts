#!/usr/bin/env node
/**
 * photo-batcher CLI
 *
 *  • peek: dimensions, camera, date and GPS flag per image
 *  • process: resize, redact, rename and pack into a ZIP, with a CSV/JSON report
 */

import { readFileSync, realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join, resolve } from 'node:path';
import { ActivityLog, describeEvent } from './activity-log.js';
import { InvalidOptionsError, describeError } from './errors.js';
import { loadAssets, writeBatchResult } from './node.js';
import { processBatch } from './operations/batch.js';
import { peek } from './operations/peek.js';
import { formatReportTable } from './operations/report.js';
import { resolveFailurePolicy } from './options.js';
import type { OutputPolicyInput, ResizeSpecInput } from './options.js';
import type { BatchEvent, PreviewRow, ResizeMode } from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// ─── Helpers ──────────────────────────────────────────────────────────────────

function getVersion(): string {
  const pkgPath = join(__dirname, '..', 'package.json');
  const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return 'unknown';
}

const RESIZE_MODES = ['Percent', 'Width', 'Height'] as const;

function isResizeMode(value: string): value is ResizeMode {
  return RESIZE_MODES.some(mode => mode === value);
}

function formatPreview(row: PreviewRow): string {
  if ('error' in row) return `  ✗ ${row.file}: ${row.error}`;
  const parts = [`${row.width}×${row.height}`, row.camera || '-', row.date || '-', `GPS: ${row.gps}`];
  return `  ✓ ${row.file}  ${parts.join('  ')}`;
}

// ─── Help text ────────────────────────────────────────────────────────────────

const HELP = `
photo-batcher <command> <file|dir...> [options]

Resize photos, strip identifying EXIF, rename by pattern and pack into a ZIP.

COMMANDS
  peek                        Show size, camera, date and GPS presence
  process                     Process images into a ZIP archive

OUTPUT
  -o, --output <file.zip>     Archive to write (required for process)
  --report <file>             Write the report as CSV, or JSON for a .json path
  -q, --quiet                 Suppress output
  -h, --help                  Show this help
  -v, --version               Show version

RESIZE
  --resize-mode <mode>        Percent | Width | Height (default: Percent)
  --resize-value <n>          1-10000 (default: 50)

ENCODING
  --format <fmt>              jpg | png | webp (default: jpg)
  --quality <n>               1-100, JPEG and WEBP only (default: 85)

PRIVACY
  --keep-gps                  Keep GPS data in JPEG output
  --keep-serials              Keep body/lens serials and owner name

NAMING
  --pattern <template>        Tokens: {index} {index:03d} {name} {date}
                              (default: "img_{index}_{date}")

ERRORS
  --on-error <policy>         fail-fast | isolate (default: fail-fast)
`.trim();

// ─── Argument parser ──────────────────────────────────────────────────────────

type Command = 'peek' | 'process';

interface CliArgs {
  command: Command;
  files: string[];
  output?: string;
  report?: string;
  quiet: boolean;
  resize: ResizeSpecInput;
  policy: OutputPolicyInput;
  onError?: string;
}

export function parseArgs(raw: readonly string[]): CliArgs {
  const [command, ...rest] = raw;
  if (command !== 'peek' && command !== 'process') {
    throw new InvalidOptionsError([`unknown command "${command ?? ''}", expected peek or process`]);
  }

  const args: CliArgs = { command, files: [], quiet: false, resize: {}, policy: {} };

  const take = (i: number, flag: string): [number, string] => {
    const val = rest[i + 1];
    if (val === undefined || val.startsWith('-')) {
      throw new InvalidOptionsError([`${flag} requires a value`]);
    }
    return [i + 1, val];
  };

  for (let i = 0; i < rest.length; i++) {
    const a = rest[i] ?? '';
    switch (a) {
      case '-q': case '--quiet':      args.quiet = true; break;
      case '--keep-gps':              args.policy.stripGps = false; break;
      case '--keep-serials':          args.policy.stripSerials = false; break;

      case '-o': case '--output': {
        const [ni, v] = take(i, a); i = ni; args.output = v; break;
      }
      case '--report': {
        const [ni, v] = take(i, a); i = ni; args.report = v; break;
      }
      case '--resize-mode': {
        const [ni, v] = take(i, a); i = ni;
        if (!isResizeMode(v)) {
          throw new InvalidOptionsError([`--resize-mode must be one of: ${RESIZE_MODES.join(', ')}`]);
        }
        args.resize.mode = v;
        break;
      }
      case '--resize-value': {
        const [ni, v] = take(i, a); i = ni; args.resize.value = Number(v); break;
      }
      case '--format': {
        const [ni, v] = take(i, a); i = ni; args.policy.format = v; break;
      }
      case '--quality': {
        const [ni, v] = take(i, a); i = ni; args.policy.quality = Number(v); break;
      }
      case '--pattern': {
        // Patterns may legitimately start with '-'
        const v = rest[i + 1];
        if (v === undefined) throw new InvalidOptionsError([`${a} requires a value`]);
        i++;
        args.policy.namePattern = v;
        break;
      }
      case '--on-error': {
        const [ni, v] = take(i, a); i = ni; args.onError = v; break;
      }
      default:
        if (a.startsWith('-')) {
          throw new InvalidOptionsError([`unknown option ${a}`]);
        }
        args.files.push(a);
    }
  }

  if (args.files.length === 0) {
    throw new InvalidOptionsError(['no input files or directories specified']);
  }
  return args;
}

// ─── Commands ─────────────────────────────────────────────────────────────────

async function runPeek(a: CliArgs): Promise<number> {
  const rows = await peek(await loadAssets(a.files));
  if (!a.quiet) {
    for (const row of rows) {
      if ('error' in row) console.error(formatPreview(row));
      else console.log(formatPreview(row));
    }
  }
  return rows.some(row => 'error' in row) ? 1 : 0;
}

function printEvent(event: BatchEvent): void {
  switch (event.type) {
    case 'processed':
      console.log(`  ✓ ${describeEvent(event)}`);
      break;
    case 'metadata-dropped':
    case 'failed':
      console.error(`  ✗ ${describeEvent(event)}`);
      break;
    default:
      console.log(describeEvent(event));
  }
}

async function runProcess(a: CliArgs): Promise<number> {
  const output = a.output;
  if (output === undefined) {
    throw new InvalidOptionsError(['process requires -o <file.zip>']);
  }
  const onError = resolveFailurePolicy(a.onError);
  const log = new ActivityLog();
  const assets = await loadAssets(a.files);

  try {
    const result = await processBatch(assets, a.resize, a.policy, {
      onError,
      onEvent: event => {
        log.record(event);
        if (!a.quiet) printEvent(event);
      },
    });

    const written = await writeBatchResult(result, output, a.report);
    if (!a.quiet) {
      console.log(`\n${formatReportTable(result.report)}\n`);
      console.log(`  Archive written to ${written.zipPath}`);
      if (written.reportPath) console.log(`  Report written to ${written.reportPath}`);
    }
    return result.failures.length > 0 ? 1 : 0;
  } catch (err) {
    if (log.size > 0) {
      console.error('Recent activity:');
      for (const entry of log.entries()) console.error(`  ${entry}`);
    }
    throw err;
  }
}

// ─── Main ─────────────────────────────────────────────────────────────────────

/**
 * Run the CLI against `argv` (without the node and script entries).
 * Resolves to the process exit code.
 */
export async function runCli(argv: readonly string[]): Promise<number> {
  if (argv.length === 0 || argv.includes('-h') || argv.includes('--help')) {
    console.log(HELP);
    return 0;
  }
  if (argv.includes('-v') || argv.includes('--version')) {
    console.log(getVersion());
    return 0;
  }

  try {
    const a = parseArgs(argv);
    if (a.command === 'peek') return await runPeek(a);
    return await runProcess(a);
  } catch (err) {
    console.error(`✗ ${describeError(err)}`);
    return 1;
  }
}

// ─── Entry ────────────────────────────────────────────────────────────────────

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (script === undefined) return false;
  try {
    return realpathSync(resolve(script)) === realpathSync(__filename);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  runCli(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(describeError(err));
      process.exitCode = 1;
    },
  );
}
