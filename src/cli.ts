#!/usr/bin/env node
import { mkdir, writeFile } from 'node:fs/promises';
import { existsSync, readFileSync, realpathSync } from 'node:fs';
import { basename, dirname, extname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compileFile } from './compile.js';
import type { Diagnostic } from './diagnostics/types.js';
import { hasErrors } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact } from './formats/types.js';
import { ARTIFACT_EXTENSIONS } from './formats/types.js';

type CliExit = { code: number };

/** An artifact after {@link writeArtifacts} put it on disk. */
export type WrittenArtifact = Artifact & { path: string };

type CliOptions = {
  entryFile: string;
  outDir?: string;
  emitListings: boolean;
  optimize: boolean;
  run: boolean;
  log: boolean;
  maxCallDepth?: number;
  maxInstructions?: number;
};

function usage(): string {
  return [
    'minicc [options] <entry.mc>',
    '',
    'Options:',
    '  -o, --out-dir <dir>   Write stage listings to <dir>/<stem>.<ext>',
    '  -n, --nolist          Do not produce stage listings',
    '      --no-opt          Skip the IR and peephole optimizers',
    '      --no-run          Compile only; do not execute',
    '      --log             Print the stage log to stderr',
    '      --max-depth <n>   Call depth limit (default 1024)',
    '      --max-steps <n>   Executed-instruction limit (default 5000000)',
    '  -V, --version         Print version',
    '  -h, --help            Show help',
    '',
    'Notes:',
    '  - <entry.mc> must be the last argument.',
    '  - Program output goes to stdout, one printed value per line.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

/**
 * Version from the nearest package.json above this file (works from `src/` and `dist/src/`).
 */
function readVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 3; i++) {
    dir = dirname(dir);
    const candidate = join(dir, 'package.json');
    if (!existsSync(candidate)) continue;
    const pkg: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  }
  return '0.0.0';
}

function positiveInt(flag: string, value: string | undefined): number {
  if (!value) fail(`${flag} expects a value`);
  if (!/^[0-9]+$/.test(value) || Number(value) < 1) {
    fail(`${flag} expects a positive integer, got "${value}"`);
  }
  return Number(value);
}

/**
 * Value of `--flag=value`, or of the next argument for `--flag value`.
 */
function optionValue(argv: string[], i: number, flag: string): { value: string | undefined; next: number } {
  const a = argv[i] ?? '';
  if (a.startsWith(`${flag}=`)) return { value: a.slice(flag.length + 1), next: i };
  return { value: argv[i + 1], next: i + 1 };
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let outDir: string | undefined;
  let emitListings = true;
  let optimize = true;
  let run = true;
  let log = false;
  let maxCallDepth: number | undefined;
  let maxInstructions: number | undefined;
  let entryFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${readVersion()}\n`);
      return { code: 0 };
    }
    if (a === '-o' || a === '--out-dir' || a.startsWith('--out-dir=')) {
      const { value, next } = optionValue(argv, i, a === '-o' ? '-o' : '--out-dir');
      if (!value) fail(`${a.split('=')[0] ?? a} expects a value`);
      outDir = value;
      i = next;
      continue;
    }
    if (a === '-n' || a === '--nolist') {
      emitListings = false;
      continue;
    }
    if (a === '--no-opt') {
      optimize = false;
      continue;
    }
    if (a === '--no-run') {
      run = false;
      continue;
    }
    if (a === '--log') {
      log = true;
      continue;
    }
    if (a === '--max-depth' || a.startsWith('--max-depth=')) {
      const { value, next } = optionValue(argv, i, '--max-depth');
      maxCallDepth = positiveInt('--max-depth', value);
      i = next;
      continue;
    }
    if (a === '--max-steps' || a.startsWith('--max-steps=')) {
      const { value, next } = optionValue(argv, i, '--max-steps');
      maxInstructions = positiveInt('--max-steps', value);
      i = next;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (entryFile !== undefined || i !== argv.length - 1) {
      fail(`Expected exactly one <entry.mc> argument (and it must be last)`);
    }
    entryFile = a;
  }

  if (!entryFile) {
    fail(`Expected exactly one <entry.mc> argument (and it must be last)`);
  }

  return {
    entryFile,
    ...(outDir ? { outDir } : {}),
    emitListings,
    optimize,
    run,
    log,
    ...(maxCallDepth !== undefined ? { maxCallDepth } : {}),
    ...(maxInstructions !== undefined ? { maxInstructions } : {}),
  };
}

function artifactStem(entryFile: string): string {
  const base = basename(entryFile);
  const ext = extname(base);
  return ext.length > 0 ? base.slice(0, -ext.length) : base;
}

function artifactText(a: Artifact): string {
  if (a.kind === 'ast' || a.kind === 'typed-ast') return JSON.stringify(a.json, null, 2) + '\n';
  return a.text;
}

/**
 * Write each artifact to `<outDir>/<stem><ext>` and return them with `path` set.
 */
export async function writeArtifacts(
  outDir: string,
  stem: string,
  artifacts: Artifact[],
): Promise<WrittenArtifact[]> {
  const dir = resolve(outDir);
  await mkdir(dir, { recursive: true });
  const written = artifacts.map(
    (a): WrittenArtifact => ({ ...a, path: join(dir, `${stem}${ARTIFACT_EXTENSIONS[a.kind]}`) }),
  );
  await Promise.all(written.map((a) => writeFile(a.path, artifactText(a), 'utf8')));
  return written;
}

function normalizeDiagnosticPath(file: string): string {
  const normalized = file.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = normalizeDiagnosticPath(a.file).localeCompare(normalizeDiagnosticPath(b.file));
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0) return lineCmp;

  const colCmp = (a.column ?? Number.POSITIVE_INFINITY) - (b.column ?? Number.POSITIVE_INFINITY);
  if (colCmp !== 0) return colCmp;

  const sevRank = (severity: Diagnostic['severity']): number => {
    if (severity === 'error') return 0;
    if (severity === 'warning') return 1;
    return 2;
  };
  const sevCmp = sevRank(a.severity) - sevRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

export function formatDiagnostic(d: Diagnostic): string {
  const loc =
    d.line !== undefined && d.column !== undefined
      ? `${d.file}:${d.line}:${d.column}`
      : d.line !== undefined
        ? `${d.file}:${d.line}`
        : d.file;
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}`;
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const res = await compileFile(
      parsed.entryFile,
      {
        optimize: parsed.optimize,
        run: parsed.run,
        emitListings: parsed.emitListings && parsed.outDir !== undefined,
        ...(parsed.maxCallDepth !== undefined ? { maxCallDepth: parsed.maxCallDepth } : {}),
        ...(parsed.maxInstructions !== undefined ? { maxInstructions: parsed.maxInstructions } : {}),
      },
      { formats: defaultFormatWriters },
    );

    for (const line of res.output) process.stdout.write(`${line}\n`);

    if (parsed.log) {
      for (const line of res.log) process.stderr.write(`${line}\n`);
    }

    const sortedDiagnostics = [...res.diagnostics].sort(compareDiagnosticsForCli);
    for (const d of sortedDiagnostics) {
      process.stderr.write(`${formatDiagnostic(d)}\n`);
    }

    if (parsed.outDir !== undefined && res.artifacts.length > 0) {
      const written = await writeArtifacts(parsed.outDir, artifactStem(parsed.entryFile), res.artifacts);
      if (parsed.log) {
        for (const a of written) process.stderr.write(`wrote ${a.path}\n`);
      }
    }

    return hasErrors(sortedDiagnostics) ? 1 : 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`minicc: ${msg}\n`);
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function stripExtendedWindowsPrefix(path: string): string {
  if (path.startsWith('\\\\?\\UNC\\')) return `\\\\${path.slice(8)}`;
  if (path.startsWith('\\\\?\\')) return path.slice(4);
  return path;
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = (() => {
    try {
      return realpathSync.native(resolved);
    } catch {
      return resolved;
    }
  })();
  const stripped = stripExtendedWindowsPrefix(real);
  const normalized = stripped.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const self = fileURLToPath(import.meta.url);
  if (normalizePathForCompare(invokedAs) === normalizePathForCompare(self)) return true;

  // Windows CI can surface different canonical path spellings for the same file.
  // Fall back to stable suffix matching for the built CLI entry path.
  const invoked = normalizePathForCompare(invokedAs);
  return invoked.endsWith('/dist/src/cli.js') && normalizePathForCompare(self).endsWith('/dist/src/cli.js');
}

if (isDirectCliInvocation(process.argv[1])) {
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
