/**
 * Shapes shared by the scan, sign and publish phases.
 */

export const RESULTS_FORMATS = ['sarif', 'json', 'default'] as const;

export type ResultsFormat = (typeof RESULTS_FORMATS)[number];

/** File and format the scanner writes for one run. */
export interface ScanOutput {
  file: string;
  format: ResultsFormat;
}

export interface ActionConfig {
  publishResults: boolean;
  /** `owner/repo` */
  repository: string;
  ref?: string;
  repoToken?: string;
  output: ScanOutput;
  policyFile?: string;
  publishBaseUrl: string;
  scorecardBin: string;
}

/** Body of the results API call. Field names are the wire contract. */
export interface PublishPayload {
  result: string;
  branch: string;
  accessToken: string;
}

export interface PublishTarget {
  repository: string;
  ref: string;
  accessToken: string;
}

export type WorkflowPhase = 'scan' | 'json-scan' | 'sign' | 'publish';

export interface WorkflowReport {
  resultsFile: string;
  published: boolean;
  jsonResultsFile?: string;
}
