import fs from 'node:fs/promises';
import * as core from '@actions/core';

import { withJsonOutput } from '../config.js';
import { ActionError, errorMessage } from '../errors.js';
import type { ActionConfig } from '../types.js';
import type { ScanEngine, ScanRequest } from './engine.js';

function scanRequest(config: ActionConfig): ScanRequest {
  return {
    repository: config.repository,
    output: config.output,
    ...(config.repoToken ? { repoToken: config.repoToken } : {}),
    ...(config.policyFile ? { policyFile: config.policyFile } : {})
  };
}

/** Runs the scanner with the configured output settings and returns the results path. */
export async function runScan(engine: ScanEngine, config: ActionConfig): Promise<string> {
  core.debug(`scanning ${config.repository} into ${config.output.file} (${config.output.format})`);
  try {
    await engine.run(scanRequest(config));
  } catch (err) {
    if (err instanceof ActionError) throw err;
    throw new ActionError('SCAN_EXECUTION_FAILED', errorMessage(err), { cause: err });
  }
  return config.output.file;
}

/**
 * Re-runs the scanner forced to JSON output and reads the results back.
 *
 * Runs against a derived copy of `config`; the caller's object is never modified.
 */
export async function runJsonScan(engine: ScanEngine, config: ActionConfig): Promise<Buffer> {
  const jsonConfig = withJsonOutput(config);
  const resultsFile = await runScan(engine, jsonConfig);

  try {
    return await fs.readFile(resultsFile);
  } catch (err) {
    throw new ActionError('RESULT_RETRIEVAL_FAILED', `reading scorecard json results from file: ${errorMessage(err)}`, {
      details: { file: resultsFile },
      cause: err
    });
  }
}
