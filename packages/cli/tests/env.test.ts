import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadDotenv } from '../src/env.js';

describe('loadDotenv', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'flowpulse-env-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads keys, strips quotes and skips comments', () => {
    fs.writeFileSync(
      path.join(dir, '.env'),
      ['# tracker', 'JIRA_SERVER="https://tracker.test"', "JIRA_USER='bot@example.com'", 'BROKEN LINE', 'PORT = 8080', ''].join('\n')
    );
    const env: NodeJS.ProcessEnv = {};

    const loaded = loadDotenv(dir, env);

    expect(loaded).toEqual(['JIRA_SERVER', 'JIRA_USER', 'PORT']);
    expect(env).toEqual({
      JIRA_SERVER: 'https://tracker.test',
      JIRA_USER: 'bot@example.com',
      PORT: '8080',
    });
  });

  it('never overrides variables already set', () => {
    fs.writeFileSync(path.join(dir, '.env'), 'PORT=8080\n');
    const env: NodeJS.ProcessEnv = { PORT: '9000' };

    expect(loadDotenv(dir, env)).toEqual([]);
    expect(env.PORT).toBe('9000');
  });

  it('does nothing without a .env file', () => {
    const env: NodeJS.ProcessEnv = {};
    expect(loadDotenv(dir, env)).toEqual([]);
    expect(env).toEqual({});
  });
});
