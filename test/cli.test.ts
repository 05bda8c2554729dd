import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { runCli, writeArtifacts } from '../src/cli.js';
import { compileSource } from '../src/compile.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const fixture = (name: string): string => join(__dirname, 'fixtures', name);

const text = (chunk: string | Uint8Array): string =>
  typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8');

async function run(args: string[]): Promise<{ code: number; stdout: string; stderr: string }> {
  let stdout = '';
  let stderr = '';
  const out = vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
    stdout += text(chunk);
    return true;
  });
  const err = vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
    stderr += text(chunk);
    return true;
  });
  try {
    const code = await runCli(args);
    return { code, stdout, stderr };
  } finally {
    out.mockRestore();
    err.mockRestore();
  }
}

describe('cli', () => {
  let work = '';

  beforeEach(async () => {
    work = await mkdtemp(join(tmpdir(), 'minicc-cli-'));
  });

  afterEach(async () => {
    await rm(work, { recursive: true, force: true });
  });

  it('prints usage and version', async () => {
    const help = await run(['--help']);
    expect(help.code).toBe(0);
    expect(help.stdout.split('\n')[0]).toBe('minicc [options] <entry.mc>');

    const version = await run(['-V']);
    expect(version).toEqual({ code: 0, stdout: '0.1.0\n', stderr: '' });
  });

  it('prints program output on stdout and exits 0', async () => {
    expect(await run([fixture('factorial.mc')])).toEqual({ code: 0, stdout: '120\n', stderr: '' });
  });

  it('reports a run-time error on stderr after the partial output', async () => {
    const entry = fixture('div_zero.mc');
    expect(await run([entry])).toEqual({
      code: 1,
      stdout: '1\n',
      stderr: `${entry}:2: error: [MCC400] Runtime error (division-by-zero): Division by zero\n`,
    });
  });

  it('reports compile errors with line and column', async () => {
    const entry = fixture('syntax_error.mc');
    expect(await run([entry])).toEqual({
      code: 1,
      stdout: '',
      stderr: `${entry}:1:9: error: [MCC200] Expected expression here, found ";"\n`,
    });
  });

  it('exits 2 on bad usage', async () => {
    const unknown = await run(['--bogus', fixture('factorial.mc')]);
    expect(unknown.code).toBe(2);
    expect(unknown.stderr.split('\n')[0]).toBe('minicc: Unknown option "--bogus"');

    const missing = await run([]);
    expect(missing.code).toBe(2);
    expect(missing.stderr.split('\n')[0]).toBe(
      'minicc: Expected exactly one <entry.mc> argument (and it must be last)',
    );

    const depth = await run(['--max-depth', '0', fixture('factorial.mc')]);
    expect(depth.code).toBe(2);
    expect(depth.stderr.split('\n')[0]).toBe('minicc: --max-depth expects a positive integer, got "0"');
  });

  it('writes every stage listing next to the entry stem', async () => {
    const res = await run(['-o', work, fixture('counting.mc')]);
    expect(res.code).toBe(0);
    expect((await readdir(work)).sort()).toEqual([
      'counting.ast.json',
      'counting.bc',
      'counting.ir',
      'counting.opt.bc',
      'counting.opt.ir',
      'counting.symbols.txt',
      'counting.tokens.txt',
      'counting.typed.json',
    ]);
    const ast: unknown = JSON.parse(await readFile(join(work, 'counting.ast.json'), 'utf8'));
    expect(ast).toMatchObject({ kind: 'Program' });
    expect((await readFile(join(work, 'counting.opt.ir'), 'utf8')).split('\n')[0]).toBe('; optimized IR');
  });

  it('reports each written listing path under --log', async () => {
    const res = await run(['-o', work, '--log', fixture('factorial.mc')]);
    expect(res.code).toBe(0);
    expect(res.stderr.trimEnd().split('\n').slice(-8)).toEqual(
      [
        'factorial.tokens.txt',
        'factorial.ast.json',
        'factorial.typed.json',
        'factorial.symbols.txt',
        'factorial.ir',
        'factorial.opt.ir',
        'factorial.bc',
        'factorial.opt.bc',
      ].map((name) => `wrote ${join(work, name)}`),
    );
  });

  it('returns artifacts carrying the path they were written to', async () => {
    const { artifacts } = compileSource('print(1);');
    const written = await writeArtifacts(work, 'demo', artifacts);
    expect(written.map((a) => a.kind)).toEqual(artifacts.map((a) => a.kind));
    expect(written[0]?.path).toBe(join(work, 'demo.tokens.txt'));
    expect(written[7]?.path).toBe(join(work, 'demo.opt.bc'));
    const tokens = artifacts[0];
    if (tokens?.kind !== 'tokens') throw new Error('tokens listing missing');
    expect(await readFile(join(work, 'demo.tokens.txt'), 'utf8')).toBe(tokens.text);
    expect(artifacts[0]).not.toHaveProperty('path');
  });

  it('writes nothing with --nolist', async () => {
    const res = await run(['-o', work, '-n', fixture('counting.mc')]);
    expect(res.code).toBe(0);
    expect(await readdir(work)).toEqual([]);
  });

  it('honours --no-run, --no-opt and --log', async () => {
    expect(await run(['--no-run', fixture('factorial.mc')])).toEqual({ code: 0, stdout: '', stderr: '' });

    const logged = await run(['--no-opt', '--log', fixture('factorial.mc')]);
    expect(logged.stdout).toBe('120\n');
    const lines = logged.stderr.trimEnd().split('\n');
    expect(lines[0]?.startsWith('01. Lexical analysis produced ')).toBe(true);
    expect(lines).toContain('05. IR optimization skipped');
    expect(lines[lines.length - 1]?.startsWith('08. Execution printed 1 value in ')).toBe(true);
  });

  it('stops a runaway program at the step limit', async () => {
    const res = await run(['--max-steps=50', fixture('counting.mc')]);
    expect(res.code).toBe(1);
    expect(res.stderr).toContain('[MCC403] Runtime error (instruction-limit-exceeded): Instruction limit of 50 exceeded');
  });
});
