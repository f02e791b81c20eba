import * as core from '@actions/core';

import { JSON_RESULTS_FILE, requirePublishSettings } from '../config.js';
import { WorkflowError } from '../errors.js';
import type { ScanEngine } from '../scan/engine.js';
import { runJsonScan, runScan } from '../scan/invoker.js';
import type { ActionConfig, PublishTarget, WorkflowPhase, WorkflowReport } from '../types.js';
import { publishResults } from './publish.js';
import { signResults } from './sign.js';

export interface WorkflowDeps {
  engine: ScanEngine;
  sign?: (resultsFile: string) => Promise<void>;
  publish?: (payload: Buffer, target: PublishTarget) => Promise<void>;
}

async function phase<T>(name: WorkflowPhase, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err) {
    throw new WorkflowError(name, err);
  }
}

/**
 * scan -> (publish enabled) json-scan -> sign -> publish.
 *
 * The first failure throws a {@link WorkflowError}; nothing after it runs and nothing
 * before it is undone.
 */
export async function runWorkflow(config: ActionConfig, deps: WorkflowDeps): Promise<WorkflowReport> {
  const sign = deps.sign ?? ((resultsFile: string) => signResults(resultsFile));
  const publish =
    deps.publish ??
    ((payload: Buffer, target: PublishTarget) => publishResults(payload, target, { baseUrl: config.publishBaseUrl }));

  core.info(`Running scorecard for ${config.repository}`);
  const resultsFile = await phase('scan', () => runScan(deps.engine, config));
  core.info(`Results written to ${resultsFile}`);

  if (!config.publishResults) {
    return { resultsFile, published: false };
  }

  const target = await phase('publish', async () => requirePublishSettings(config));

  core.info('Generating JSON results for publishing');
  const jsonPayload = await phase('json-scan', () => runJsonScan(deps.engine, config));

  core.info(`Signing ${JSON_RESULTS_FILE}`);
  await phase('sign', () => sign(JSON_RESULTS_FILE));

  core.info(`Publishing results for ${target.repository}@${target.ref}`);
  await phase('publish', () => publish(jsonPayload, target));
  core.info('Results published');

  return { resultsFile, published: true, jsonResultsFile: JSON_RESULTS_FILE };
}
