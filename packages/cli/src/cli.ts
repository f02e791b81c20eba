#!/usr/bin/env node

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { fileURLToPath } from 'node:url';
import fs from 'node:fs/promises';
import * as core from '@actions/core';

import { ENV, loadConfig, requirePublishSettings } from './config.js';
import { errorMessage } from './errors.js';
import { publishResults } from './lib/publish.js';
import { signResults } from './lib/sign.js';
import { runWorkflow } from './lib/workflow.js';
import { CommandScanEngine } from './scan/engine.js';
import { runScan } from './scan/invoker.js';
import { RESULTS_FORMATS, type ActionConfig } from './types.js';

function engineFor(config: ActionConfig): CommandScanEngine {
  return new CommandScanEngine({ command: config.scorecardBin });
}

function maskToken(config: ActionConfig): void {
  if (config.repoToken) core.setSecret(config.repoToken);
}

// Failures end up in `process.exitCode` through setFailed instead of yargs' own fail handler.
async function reportFailure(run: () => Promise<void>): Promise<void> {
  try {
    await run();
  } catch (err) {
    core.setFailed(errorMessage(err));
  }
}

export async function main(argv = process.argv): Promise<number> {
  // `process.exitCode` persists across multiple `main()` calls in the same process (tests).
  process.exitCode = 0;

  const parser = yargs(hideBin(argv))
    .scriptName('scorecard-publish')
    .strict()
    .help()
    .command(
      ['run', '$0'],
      `Run scorecard; when ${ENV.publishResults}=true also sign and publish the JSON results`,
      (cmd) => cmd,
      async () =>
        reportFailure(async () => {
          const config = loadConfig();
          maskToken(config);
          const report = await runWorkflow(config, { engine: engineFor(config) });
          core.setOutput('results-file', report.resultsFile);
          core.setOutput('published', String(report.published));
        })
    )
    .command(
      'scan',
      'Run scorecard once with the configured output settings',
      (cmd) =>
        cmd
          .option('format', {
            choices: RESULTS_FORMATS,
            describe: `Results format (default: ${ENV.resultsFormat})`
          })
          .option('out', {
            type: 'string',
            describe: `Results file (default: ${ENV.resultsFile})`
          }),
      async (args) =>
        reportFailure(async () => {
          const base = loadConfig();
          maskToken(base);
          const config: ActionConfig = {
            ...base,
            output: {
              file: args.out ?? base.output.file,
              format: args.format ?? base.output.format
            }
          };
          const resultsFile = await runScan(engineFor(config), config);
          core.info(`Results written to ${resultsFile}`);
          core.setOutput('results-file', resultsFile);
        })
    )
    .command(
      'sign <file>',
      'Sign a results file with Sigstore and record it in the transparency log',
      (cmd) =>
        cmd.positional('file', {
          type: 'string',
          describe: 'Results file to sign',
          demandOption: true
        }),
      async (args) =>
        reportFailure(async () => {
          await signResults(args.file);
          core.info(`Signed ${args.file}`);
        })
    )
    .command(
      'publish <file>',
      'Publish a JSON results file to the results API',
      (cmd) =>
        cmd
          .positional('file', {
            type: 'string',
            describe: 'JSON results file',
            demandOption: true
          })
          .option('repo', {
            type: 'string',
            describe: `Repository in owner/repo form (default: ${ENV.repository})`
          })
          .option('ref', {
            type: 'string',
            describe: `Branch ref (default: ${ENV.ref})`
          }),
      async (args) =>
        reportFailure(async () => {
          const config = loadConfig({
            ...process.env,
            ...(args.repo ? { [ENV.repository]: args.repo } : {}),
            ...(args.ref ? { [ENV.ref]: args.ref } : {})
          });
          maskToken(config);
          const target = requirePublishSettings(config);
          const payload = await fs.readFile(args.file);
          await publishResults(payload, target, { baseUrl: config.publishBaseUrl });
          core.info(`Published ${args.file} for ${target.repository}@${target.ref}`);
        })
    );

  await parser.parse();
  return typeof process.exitCode === 'number' ? process.exitCode : 0;
}

// Only run if invoked as a binary, not imported by tests.
const isInvokedAsBin = (() => {
  try {
    const thisFile = fileURLToPath(import.meta.url);
    return process.argv[1] === thisFile;
  } catch {
    return false;
  }
})();

if (isInvokedAsBin) {
  main().catch((err: unknown) => {
    core.setFailed(errorMessage(err));
  });
}
