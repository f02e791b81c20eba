import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { main } from '../src/cli.js';

type FetchInput = Parameters<typeof fetch>[0];

const ENV_KEYS = ['GITHUB_REPOSITORY', 'GITHUB_REF', 'INPUT_REPO_TOKEN', 'INPUT_INTERNAL_PUBLISH_BASE_URL'] as const;

describe('scorecard-publish publish', () => {
  const saved = new Map<string, string | undefined>();
  let dir: string;
  let resultsFile: string;

  beforeEach(async () => {
    for (const key of ENV_KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
    process.env.INPUT_INTERNAL_PUBLISH_BASE_URL = 'https://api.example.test';
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'scorecard-cli-'));
    resultsFile = path.join(dir, 'results.json');
    await fs.writeFile(resultsFile, '{"score":9}', 'utf8');
  });

  afterEach(async () => {
    for (const key of ENV_KEYS) {
      const value = saved.get(key);
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    vi.unstubAllGlobals();
    process.exitCode = 0;
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('publishes a results file and exits 0', async () => {
    process.env.INPUT_REPO_TOKEN = 'test-token';
    const requests: Request[] = [];
    vi.stubGlobal(
      'fetch',
      vi.fn(async (input: FetchInput) => {
        if (input instanceof Request) requests.push(input);
        return new Response(null, { status: 201 });
      })
    );

    const code = await main([
      'node',
      'scorecard-publish',
      'publish',
      resultsFile,
      '--repo',
      'octo/repo',
      '--ref',
      'refs/heads/main'
    ]);

    expect(code).toBe(0);
    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe('https://api.example.test/projects/github.com/octo/repo');
    expect(await requests[0]?.json()).toEqual({
      result: '{"score":9}',
      branch: 'refs/heads/main',
      accessToken: 'test-token'
    });
  });

  it('exits 1 when the API rejects the upload', async () => {
    process.env.INPUT_REPO_TOKEN = 'test-token';
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('invalid token', { status: 401 }))
    );

    const code = await main(['node', 'scorecard-publish', 'publish', resultsFile, '--repo', 'octo/repo', '--ref', 'main']);

    expect(code).toBe(1);
  });

  it('exits 1 without calling the API when the token is missing', async () => {
    const fetchMock = vi.fn(async () => new Response(null, { status: 201 }));
    vi.stubGlobal('fetch', fetchMock);

    const code = await main(['node', 'scorecard-publish', 'publish', resultsFile, '--repo', 'octo/repo', '--ref', 'main']);

    expect(code).toBe(1);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
