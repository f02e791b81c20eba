import { spawn } from 'node:child_process';
import { open, type FileHandle } from 'node:fs/promises';
import { finished } from 'node:stream/promises';

import { ActionError, errorMessage } from '../errors.js';
import type { ScanOutput } from '../types.js';

const STDERR_EXCERPT_LIMIT = 2000;

export interface ScanRequest {
  repository: string;
  output: ScanOutput;
  repoToken?: string;
  policyFile?: string;
}

/** Runs the scanner once and leaves its results at `request.output.file`. */
export interface ScanEngine {
  run(request: ScanRequest): Promise<void>;
}

export interface CommandScanEngineOptions {
  command: string;
  /** Arguments placed before the scan flags, e.g. a script path when `command` is an interpreter. */
  commandArgs?: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Receives the scanner's stderr as it arrives. Defaults to `process.stderr`. */
  stderr?: NodeJS.WritableStream;
}

export function scorecardArgs(request: ScanRequest): string[] {
  const args = [`--repo=github.com/${request.repository}`, `--format=${request.output.format}`, '--show-details'];
  if (request.policyFile && request.output.format === 'sarif') {
    args.push(`--policy=${request.policyFile}`);
  }
  return args;
}

function excerpt(value: string): string {
  const trimmed = value.trim();
  return trimmed.length <= STDERR_EXCERPT_LIMIT ? trimmed : `...${trimmed.slice(-(STDERR_EXCERPT_LIMIT - 3))}`;
}

function writeError(file: string, err: unknown): ActionError {
  return new ActionError('SCAN_EXECUTION_FAILED', `writing ${file}: ${errorMessage(err)}`, {
    details: { file },
    cause: err
  });
}

/** Spawns the scorecard binary and streams its stdout into the results file. */
export class CommandScanEngine implements ScanEngine {
  private readonly command: string;
  private readonly commandArgs: string[];
  private readonly cwd: string | undefined;
  private readonly env: NodeJS.ProcessEnv;
  private readonly stderr: NodeJS.WritableStream;

  constructor(options: CommandScanEngineOptions) {
    this.command = options.command;
    this.commandArgs = options.commandArgs ?? [];
    this.cwd = options.cwd;
    this.env = options.env ?? process.env;
    this.stderr = options.stderr ?? process.stderr;
  }

  async run(request: ScanRequest): Promise<void> {
    const args = [...this.commandArgs, ...scorecardArgs(request)];
    const env: NodeJS.ProcessEnv = {
      ...this.env,
      ...(request.repoToken ? { GITHUB_AUTH_TOKEN: request.repoToken } : {})
    };

    let handle: FileHandle;
    try {
      handle = await open(request.output.file, 'w');
    } catch (err) {
      throw writeError(request.output.file, err);
    }
    const out = handle.createWriteStream();
    // Resolves to the stream error, if any.
    const outDone = finished(out).then(
      () => undefined,
      (err: unknown) => err
    );

    const exit = await new Promise<{ code: number | null; signal: NodeJS.Signals | null; stderr: string }>(
      (resolve, reject) => {
        const child = spawn(this.command, args, {
          cwd: this.cwd,
          env,
          stdio: ['ignore', 'pipe', 'pipe']
        });

        let stderr = '';
        child.stdout.pipe(out);
        child.stderr.on('data', (chunk: Buffer) => {
          this.stderr.write(chunk);
          stderr += chunk.toString('utf8');
          if (stderr.length > STDERR_EXCERPT_LIMIT * 2) {
            stderr = stderr.slice(-STDERR_EXCERPT_LIMIT);
          }
        });

        child.on('error', (err) => {
          out.destroy();
          reject(
            new ActionError('SCAN_EXECUTION_FAILED', `failed to start ${this.command}: ${err.message}`, {
              details: { command: this.command },
              cause: err
            })
          );
        });
        child.on('close', (code, signal) => resolve({ code, signal, stderr }));
      }
    );

    const outError = await outDone;
    if (outError !== undefined) {
      throw writeError(request.output.file, outError);
    }

    if (exit.code !== 0) {
      const status = exit.signal ? `signal ${exit.signal}` : `exit code ${exit.code}`;
      const stderr = excerpt(exit.stderr);
      throw new ActionError(
        'SCAN_EXECUTION_FAILED',
        `${this.command} failed with ${status}${stderr ? `: ${stderr}` : ''}`,
        { details: { command: this.command, exitCode: exit.code, signal: exit.signal } }
      );
    }
  }
}
