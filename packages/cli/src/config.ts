import { ActionError } from './errors.js';
import { RESULTS_FORMATS, type ActionConfig, type PublishTarget, type ResultsFormat } from './types.js';

/** Environment variables read by the action. Names follow the GitHub Actions input convention. */
export const ENV = {
  publishResults: 'INPUT_PUBLISH_RESULTS',
  repository: 'GITHUB_REPOSITORY',
  ref: 'GITHUB_REF',
  repoToken: 'INPUT_REPO_TOKEN',
  resultsFile: 'INPUT_RESULTS_FILE',
  resultsFormat: 'INPUT_RESULTS_FORMAT',
  policyFile: 'INPUT_POLICY_FILE',
  publishBaseUrl: 'INPUT_INTERNAL_PUBLISH_BASE_URL',
  scorecardBin: 'SCORECARD_BIN'
} as const;

export const DEFAULT_RESULTS_FILE = 'results.sarif';
export const DEFAULT_RESULTS_FORMAT: ResultsFormat = 'sarif';
export const DEFAULT_PUBLISH_BASE_URL = 'https://api.securityscorecards.dev';
export const DEFAULT_SCORECARD_BIN = 'scorecard';

/** Where the JSON re-run writes; this is also the file that gets signed. */
export const JSON_RESULTS_FILE = 'results.json';

type Env = Record<string, string | undefined>;

function readOptional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/** Untrimmed; these values go on the wire as given. */
function readVerbatim(env: Env, name: string): string | undefined {
  const value = env[name];
  return value ? value : undefined;
}

function readRequired(env: Env, name: string): string {
  const value = readOptional(env, name);
  if (value === undefined) {
    throw new ActionError('CONFIG_MISSING', `${name} must be set`, { details: { variable: name } });
  }
  return value;
}

function isResultsFormat(value: string): value is ResultsFormat {
  return (RESULTS_FORMATS as readonly string[]).includes(value);
}

function readFormat(env: Env): ResultsFormat {
  const raw = readOptional(env, ENV.resultsFormat);
  if (raw === undefined) return DEFAULT_RESULTS_FORMAT;
  const format = raw.toLowerCase();
  if (!isResultsFormat(format)) {
    throw new ActionError(
      'CONFIG_INVALID',
      `${ENV.resultsFormat} must be one of ${RESULTS_FORMATS.join(', ')}; got "${raw}"`,
      { details: { variable: ENV.resultsFormat, value: raw } }
    );
  }
  return format;
}

function readRepository(env: Env): string {
  const repository = readRequired(env, ENV.repository);
  if (!/^[^/\s]+\/[^/\s]+$/.test(repository)) {
    throw new ActionError('CONFIG_INVALID', `${ENV.repository} must be in owner/repo form; got "${repository}"`, {
      details: { variable: ENV.repository, value: repository }
    });
  }
  return repository;
}

export function loadConfig(env: Env = process.env): ActionConfig {
  const ref = readVerbatim(env, ENV.ref);
  const repoToken = readVerbatim(env, ENV.repoToken);
  const policyFile = readOptional(env, ENV.policyFile);

  return Object.freeze({
    publishResults: env[ENV.publishResults] === 'true',
    repository: readRepository(env),
    ...(ref ? { ref } : {}),
    ...(repoToken ? { repoToken } : {}),
    output: Object.freeze({
      file: readOptional(env, ENV.resultsFile) ?? DEFAULT_RESULTS_FILE,
      format: readFormat(env)
    }),
    ...(policyFile ? { policyFile } : {}),
    // Validated by publishEndpoint.
    publishBaseUrl: readOptional(env, ENV.publishBaseUrl) ?? DEFAULT_PUBLISH_BASE_URL,
    scorecardBin: readOptional(env, ENV.scorecardBin) ?? DEFAULT_SCORECARD_BIN
  });
}

/** Derived copy for the machine-readable re-run. The input is left untouched. */
export function withJsonOutput(config: ActionConfig): ActionConfig {
  return Object.freeze({
    ...config,
    output: Object.freeze({ file: JSON_RESULTS_FILE, format: 'json' as const })
  });
}

export function requirePublishSettings(config: ActionConfig): PublishTarget {
  if (!config.ref) {
    throw new ActionError('CONFIG_MISSING', `${ENV.ref} must be set to publish results`, {
      details: { variable: ENV.ref }
    });
  }
  if (!config.repoToken) {
    throw new ActionError('CONFIG_MISSING', `${ENV.repoToken} must be set to publish results`, {
      details: { variable: ENV.repoToken }
    });
  }
  return { repository: config.repository, ref: config.ref, accessToken: config.repoToken };
}
