export {
  ENV,
  DEFAULT_PUBLISH_BASE_URL,
  DEFAULT_RESULTS_FILE,
  DEFAULT_RESULTS_FORMAT,
  JSON_RESULTS_FILE,
  loadConfig,
  requirePublishSettings,
  withJsonOutput
} from './config.js';
export { ActionError, WorkflowError, type ActionErrorReason } from './errors.js';
export { CommandScanEngine, scorecardArgs, type ScanEngine, type ScanRequest } from './scan/engine.js';
export { runJsonScan, runScan } from './scan/invoker.js';
export { DEFAULT_SIGNING_CONFIG, signResults, type SignFn, type SigningConfig } from './lib/sign.js';
export { PUBLISH_TIMEOUT_MS, buildPublishBody, publishEndpoint, publishResults } from './lib/publish.js';
export { runWorkflow, type WorkflowDeps } from './lib/workflow.js';
export type {
  ActionConfig,
  PublishPayload,
  PublishTarget,
  ResultsFormat,
  ScanOutput,
  WorkflowPhase,
  WorkflowReport
} from './types.js';
