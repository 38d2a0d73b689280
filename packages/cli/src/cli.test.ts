import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { mkdtemp, writeFile, rm, access } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createProgram, readVersion } from './index.js';

// --- Program Setup Tests ---

describe('CLI program setup', () => {
  const program = createProgram('0.1.0');
  const optionsOf = (name: string): (string | undefined)[] =>
    program.commands.find((command) => command.name() === name)?.options.map((option) => option.long) ?? [];

  it('should create program with correct name and version', () => {
    expect(program.name()).toBe('fusekit');
    expect(program.version()).toBe('0.1.0');
  });

  it('should register the five commands', () => {
    expect(program.commands.map((command) => command.name())).toEqual(['chunk', 'strategy', 'ingest', 'search', 'stats']);
  });

  it('should require --user for ingest and search', () => {
    for (const name of ['ingest', 'search']) {
      const user = program.commands.find((command) => command.name() === name)?.options.find((o) => o.long === '--user');
      expect(user?.mandatory).toBe(true);
    }
  });

  it('search command should have --top-k, --mode, --ranking and --diversify options', () => {
    expect(optionsOf('search')).toEqual(
      expect.arrayContaining(['--top-k', '--mode', '--ranking', '--diversify', '--json', '--root']),
    );
  });

  it('chunk command should have --strategy, --chunk-size and --chunk-overlap options', () => {
    expect(optionsOf('chunk')).toEqual(expect.arrayContaining(['--strategy', '--chunk-size', '--chunk-overlap']));
  });

  it('should read the package version', () => {
    expect(readVersion()).toBe('0.1.0');
  });
});

// --- End-to-end Tests ---

/** Ollama stand-in: texts mentioning "cat" point one way, everything else the other. */
function fakeOllamaFetch(): typeof globalThis.fetch {
  return async (_input, init) => {
    const body: unknown = JSON.parse(typeof init?.body === 'string' ? init.body : '{}');
    const input = typeof body === 'object' && body !== null && 'input' in body && Array.isArray(body.input) ? body.input : [];
    const embeddings = input.map((text: unknown) => (String(text).includes('cat') ? [1, 0] : [0, 1]));
    return new Response(JSON.stringify({ embeddings }), { status: 200, headers: { 'Content-Type': 'application/json' } });
  };
}

describe('fusekit commands', () => {
  let tempDir: string;
  let output: string[];

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'fusekit-cli-'));
    output = [];
    vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
      output.push(String(line));
    });
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });
    vi.stubGlobal('fetch', vi.fn(fakeOllamaFetch()));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
    process.exitCode = undefined;
    await rm(tempDir, { recursive: true, force: true });
  });

  async function run(...args: string[]): Promise<void> {
    await createProgram('0.1.0').parseAsync([...args, '--root', tempDir], { from: 'user' });
  }

  it('chunk prints the chunks of a file as JSON', async () => {
    await writeFile(join(tempDir, 'notes.txt'), 'Hello world.');

    await run('chunk', 'notes.txt', '--strategy', 'recursive', '--json');

    const chunks: unknown = JSON.parse(output.join('\n'));
    expect(chunks).toEqual([
      expect.objectContaining({
        text: 'Hello world.',
        position: 0,
        startChar: 0,
        endChar: 12,
        metadata: expect.objectContaining({ strategy: 'recursive', content_type: 'plain', file_extension: '.txt' }),
      }),
    ]);
  });

  it('chunk exits when the file does not exist', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    await expect(run('chunk', 'missing.txt')).rejects.toThrow('exit 1');
    expect(error).toHaveBeenCalledWith(`Chunking failed: File not found: ${join(tempDir, 'missing.txt')}`);
  });

  it('ingest stores chunks that search and stats then see', async () => {
    await writeFile(join(tempDir, '.fusekit.yaml'), 'version: "1"\nembedding:\n  dimensions: 2\n');
    await writeFile(join(tempDir, 'cats.txt'), 'The cat sat on the mat.');
    await writeFile(join(tempDir, 'dogs.txt'), 'A dog dug a hole.');
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    await run('ingest', 'cats.txt', '--user', 'u1', '--strategy', 'recursive');
    await run('ingest', 'dogs.txt', '--user', 'u1', '--strategy', 'recursive');
    await expect(access(join(tempDir, '.fusekit', 'memory-store.json'))).resolves.toBeUndefined();

    await run('search', 'cat', '--user', 'u1', '--top-k', '1', '--json');
    const response: unknown = JSON.parse(output.join('\n'));
    expect(response).toMatchObject({
      success: true,
      method: 'local_fused',
      totalResults: 1,
      results: [expect.objectContaining({ text: 'The cat sat on the mat.' })],
    });

    output.length = 0;
    await run('stats', '--user', 'u2', '--json');
    const stats: unknown = JSON.parse(output.join('\n'));
    expect(stats).toMatchObject({
      health: 'ok',
      embeddingModel: 'nomic-embed-text',
      backend: { backend: 'memory', dimensions: 2, totalVectors: 2, userVectors: 0 },
    });
  });

  it('search finds nothing for another user', async () => {
    await writeFile(join(tempDir, '.fusekit.yaml'), 'version: "1"\nembedding:\n  dimensions: 2\n');
    await writeFile(join(tempDir, 'cats.txt'), 'The cat sat on the mat.');
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    await run('ingest', 'cats.txt', '--user', 'u1', '--strategy', 'recursive');
    await run('search', 'cat', '--user', 'u2');

    expect(output).toEqual(['No results found.']);
  });
});
