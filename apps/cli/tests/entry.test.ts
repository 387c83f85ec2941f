import { describe, it, expect } from 'vitest';
import { readFileSync, existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

const rootManifest = fileURLToPath(new URL('../../../package.json', import.meta.url));

interface Manifest {
  bin?: unknown;
  scripts?: Record<string, string>;
}

function readManifest(): Manifest {
  const manifest: Manifest = JSON.parse(readFileSync(rootManifest, 'utf8'));
  return manifest;
}

describe('CLI entry point', () => {
  it('runs the TypeScript entry through tsx', () => {
    const start = readManifest().scripts?.['start'];
    expect(start).toBe('tsx apps/cli/src/index.ts');
    expect(existsSync(fileURLToPath(new URL('../src/index.ts', import.meta.url)))).toBe(true);
  });

  it('declares no bin pointing at built output', () => {
    expect(readManifest().bin).toBeUndefined();
  });
});
