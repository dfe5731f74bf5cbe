import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, afterEach } from 'vitest';
import { loadEnv } from './load-env';

const dirs: string[] = [];

const makeDir = (files: Record<string, string>): string => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'scores-env-'));
  dirs.push(dir);
  for (const [name, content] of Object.entries(files)) {
    fs.writeFileSync(path.join(dir, name), content);
  }
  return dir;
};

afterEach(() => {
  delete process.env.SCORES_ENV_PROBE;
  for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
});

describe('loadEnv', () => {
  it('prefers .env.local over .env', () => {
    const dir = makeDir({ '.env.local': 'SCORES_ENV_PROBE=local\n', '.env': 'SCORES_ENV_PROBE=default\n' });
    expect(loadEnv(dir)).toBe(path.join(dir, '.env.local'));
    expect(process.env.SCORES_ENV_PROBE).toBe('local');
  });

  it('falls back to .env', () => {
    const dir = makeDir({ '.env': 'SCORES_ENV_PROBE=default\n' });
    expect(loadEnv(dir)).toBe(path.join(dir, '.env'));
    expect(process.env.SCORES_ENV_PROBE).toBe('default');
  });

  it('returns null when neither file exists', () => {
    expect(loadEnv(makeDir({}))).toBeNull();
    expect(process.env.SCORES_ENV_PROBE).toBeUndefined();
  });
});
