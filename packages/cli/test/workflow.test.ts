import { describe, expect, it, vi } from 'vitest';

import { loadConfig } from '../src/config.js';
import { ActionError, WorkflowError } from '../src/errors.js';
import { runWorkflow } from '../src/lib/workflow.js';
import type { PublishTarget } from '../src/types.js';
import { FakeScanEngine, inTempCwd, writeFormatMarker } from './helpers/scan.js';

const PUBLISH_ENV = {
  INPUT_PUBLISH_RESULTS: 'true',
  GITHUB_REPOSITORY: 'octo/repo',
  GITHUB_REF: 'refs/heads/main',
  INPUT_REPO_TOKEN: 'test-token'
};

async function captureWorkflowError(run: Promise<unknown>): Promise<WorkflowError> {
  const err = await run.then(
    () => undefined,
    (e: unknown) => e
  );
  if (!(err instanceof WorkflowError)) throw new Error(`expected a WorkflowError, got ${String(err)}`);
  return err;
}

describe('runWorkflow', () => {
  it('stops after the primary scan when publishing is disabled', async () => {
    await inTempCwd(async () => {
      const engine = new FakeScanEngine();
      const sign = vi.fn(async (_file: string) => undefined);
      const publish = vi.fn(async (_payload: Buffer, _target: PublishTarget) => undefined);

      const report = await runWorkflow(loadConfig({ GITHUB_REPOSITORY: 'octo/repo' }), { engine, sign, publish });

      expect(report).toEqual({ resultsFile: 'results.sarif', published: false });
      expect(engine.requests.map((r) => r.output)).toEqual([{ file: 'results.sarif', format: 'sarif' }]);
      expect(sign).not.toHaveBeenCalled();
      expect(publish).not.toHaveBeenCalled();
    });
  });

  it('scans, re-scans as JSON, signs, then publishes', async () => {
    await inTempCwd(async () => {
      const events: string[] = [];
      const engine = new FakeScanEngine(async (request) => {
        events.push(`scan:${request.output.format}`);
        await writeFormatMarker(request);
      });
      const sign = vi.fn(async (file: string) => {
        events.push(`sign:${file}`);
      });
      const publish = vi.fn(async (_payload: Buffer, target: PublishTarget) => {
        events.push(`publish:${target.repository}`);
      });

      const report = await runWorkflow(loadConfig(PUBLISH_ENV), { engine, sign, publish });

      expect(report).toEqual({ resultsFile: 'results.sarif', published: true, jsonResultsFile: 'results.json' });
      expect(events).toEqual(['scan:sarif', 'scan:json', 'sign:results.json', 'publish:octo/repo']);
      const [payload, target] = publish.mock.calls[0] ?? [];
      expect(payload?.toString('utf8')).toBe('{"format":"json"}');
      expect(target).toEqual({ repository: 'octo/repo', ref: 'refs/heads/main', accessToken: 'test-token' });
    });
  });

  it('fails in the scan phase without going further', async () => {
    const engine = new FakeScanEngine(async () => {
      throw new ActionError('SCAN_EXECUTION_FAILED', 'scorecard failed with exit code 1');
    });
    const sign = vi.fn(async (_file: string) => undefined);

    const err = await captureWorkflowError(runWorkflow(loadConfig(PUBLISH_ENV), { engine, sign }));

    expect(err.phase).toBe('scan');
    expect(err.message).toBe('error during command execution: scorecard failed with exit code 1');
    expect(engine.requests).toHaveLength(1);
    expect(sign).not.toHaveBeenCalled();
  });

  it('does not sign or publish when the JSON re-run fails', async () => {
    await inTempCwd(async () => {
      const config = loadConfig(PUBLISH_ENV);
      const before = structuredClone(config);
      const engine = new FakeScanEngine(async (request) => {
        if (request.output.format === 'json') throw new Error('scanner crashed');
        await writeFormatMarker(request);
      });
      const sign = vi.fn(async (_file: string) => undefined);
      const publish = vi.fn(async (_payload: Buffer, _target: PublishTarget) => undefined);

      const err = await captureWorkflowError(runWorkflow(config, { engine, sign, publish }));

      expect(err.phase).toBe('json-scan');
      expect(err.reason).toBe('SCAN_EXECUTION_FAILED');
      expect(err.message).toBe('error generating json scorecard results: scanner crashed');
      expect(sign).not.toHaveBeenCalled();
      expect(publish).not.toHaveBeenCalled();
      expect(config).toEqual(before);
    });
  });

  it('does not publish when signing fails', async () => {
    await inTempCwd(async () => {
      const engine = new FakeScanEngine();
      const sign = vi.fn(async (_file: string) => {
        throw new ActionError('SIGNING_FAILED', 'error signing payload: fulcio unavailable');
      });
      const publish = vi.fn(async (_payload: Buffer, _target: PublishTarget) => undefined);

      const err = await captureWorkflowError(runWorkflow(loadConfig(PUBLISH_ENV), { engine, sign, publish }));

      expect(err.phase).toBe('sign');
      expect(err.reason).toBe('SIGNING_FAILED');
      expect(err.message).toBe('error signing scorecard json results: error signing payload: fulcio unavailable');
      expect(publish).not.toHaveBeenCalled();
    });
  });

  it('reports publish failures in the publish phase', async () => {
    await inTempCwd(async () => {
      const engine = new FakeScanEngine();
      const sign = vi.fn(async (_file: string) => undefined);
      const publish = vi.fn(async (_payload: Buffer, _target: PublishTarget) => {
        throw new ActionError('PUBLISH_REJECTED', 'publish request failed with 500: boom');
      });

      const err = await captureWorkflowError(runWorkflow(loadConfig(PUBLISH_ENV), { engine, sign, publish }));

      expect(err.phase).toBe('publish');
      expect(err.reason).toBe('PUBLISH_REJECTED');
      expect(err.message).toBe('error processing signature: publish request failed with 500: boom');
    });
  });

  it('checks publish settings before the JSON re-run', async () => {
    await inTempCwd(async () => {
      const engine = new FakeScanEngine();
      const sign = vi.fn(async (_file: string) => undefined);
      const config = loadConfig({ ...PUBLISH_ENV, INPUT_REPO_TOKEN: '' });

      const err = await captureWorkflowError(runWorkflow(config, { engine, sign }));

      expect(err.phase).toBe('publish');
      expect(err.reason).toBe('CONFIG_MISSING');
      expect(engine.requests).toHaveLength(1);
      expect(sign).not.toHaveBeenCalled();
    });
  });

  it('ignores an unusable publish base URL when publishing is disabled', async () => {
    await inTempCwd(async () => {
      const engine = new FakeScanEngine();
      const config = loadConfig({ GITHUB_REPOSITORY: 'octo/repo', INPUT_INTERNAL_PUBLISH_BASE_URL: 'not a url' });

      const report = await runWorkflow(config, { engine });

      expect(report).toEqual({ resultsFile: 'results.sarif', published: false });
      expect(engine.requests).toHaveLength(1);
    });
  });

  it('reports an unusable publish base URL as an endpoint error in the publish phase', async () => {
    await inTempCwd(async () => {
      const engine = new FakeScanEngine();
      const sign = vi.fn(async (_file: string) => undefined);
      const config = loadConfig({ ...PUBLISH_ENV, INPUT_INTERNAL_PUBLISH_BASE_URL: 'not a url' });

      const err = await captureWorkflowError(runWorkflow(config, { engine, sign }));

      expect(err.phase).toBe('publish');
      expect(err.reason).toBe('ENDPOINT_INVALID');
      expect(sign).toHaveBeenCalledWith('results.json');
    });
  });
});
