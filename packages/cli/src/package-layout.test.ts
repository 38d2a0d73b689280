import { describe, it, expect } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { readVersion } from './index.js';

interface Manifest {
  version: string;
  bin?: Record<string, string>;
  exports: Record<string, { source: string; types: string; default: string }>;
}

interface BuildConfig {
  compilerOptions: { rootDir: string; outDir: string };
}

const packagesDir = new URL('../../', import.meta.url);

function readManifest(url: URL): Manifest {
  return JSON.parse(readFileSync(url, 'utf-8'));
}

function readBuildConfig(url: URL): BuildConfig {
  return JSON.parse(readFileSync(url, 'utf-8'));
}

/** Source file `tsc -p tsconfig.build.json` compiles into `emitted`. */
function sourceOf(emitted: string, build: BuildConfig): string {
  const prefix = `./${build.compilerOptions.outDir}/`;
  expect(emitted.startsWith(prefix)).toBe(true);
  return `./${build.compilerOptions.rootDir}/${emitted.slice(prefix.length).replace(/\.d\.ts$|\.js$/, '.ts')}`;
}

describe.each(['core', 'cli'])('%s package layout', (name) => {
  const dir = new URL(`${name}/`, packagesDir);
  const manifest = readManifest(new URL('package.json', dir));
  const build = readBuildConfig(new URL('tsconfig.build.json', dir));

  it('should compile src into dist', () => {
    expect(build.compilerOptions).toMatchObject({ rootDir: 'src', outDir: 'dist' });
  });

  it('should export compiled JavaScript whose source exists', () => {
    const entry = manifest.exports['.'];
    expect(entry?.default.endsWith('.js')).toBe(true);
    expect(entry?.source).toBe(sourceOf(entry?.default ?? '', build));
    expect(sourceOf(entry?.types ?? '', build)).toBe(entry?.source);
    expect(existsSync(new URL(entry?.source ?? '', dir))).toBe(true);
  });

  it('should point every bin at compiled JavaScript whose source exists', () => {
    for (const target of Object.values(manifest.bin ?? {})) {
      expect(target.endsWith('.js')).toBe(true);
      expect(existsSync(new URL(sourceOf(target, build), dir))).toBe(true);
    }
  });
});

describe('readVersion', () => {
  it('should read the version of the cli package', () => {
    const manifest = readManifest(new URL('cli/package.json', packagesDir));
    expect(readVersion()).toBe(manifest.version);
    expect(readVersion()).toBe('0.1.0');
  });

  it('should fall back when the manifest is missing', () => {
    expect(readVersion(new URL('missing/package.json', packagesDir))).toBe('0.0.0');
  });
});
