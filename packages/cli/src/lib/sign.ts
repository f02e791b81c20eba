import fs from 'node:fs/promises';
import * as core from '@actions/core';
import { sign } from 'sigstore';

import { ActionError, errorMessage } from '../errors.js';

export type SigstoreSignOptions = NonNullable<Parameters<typeof sign>[1]>;

/** Same call shape as `sigstore.sign`; the returned bundle is not used. */
export type SignFn = (payload: Buffer, options: SigstoreSignOptions) => Promise<unknown>;

export interface SigningConfig {
  /** Issues the short-lived signing certificate. */
  fulcioURL: string;
  /** Transparency log receiving the signature entry. */
  rekorURL: string;
  /** Audience requested for the CI identity token. */
  oidcClientId: string;
  tlogUpload: boolean;
  timeoutMs: number;
}

export const DEFAULT_SIGNING_CONFIG: Readonly<SigningConfig> = Object.freeze({
  fulcioURL: 'https://fulcio.sigstore.dev',
  rekorURL: 'https://rekor.sigstore.dev',
  oidcClientId: 'sigstore',
  tlogUpload: true,
  timeoutMs: 3 * 60 * 1000
});

export interface SignResultsOptions {
  config?: Partial<SigningConfig>;
  signFn?: SignFn;
  getIdToken?: (audience: string) => Promise<string>;
}

function signingError(message: string, resultsFile: string, cause: unknown): ActionError {
  return new ActionError('SIGNING_FAILED', `${message}: ${errorMessage(cause)}`, {
    details: { file: resultsFile },
    cause
  });
}

/**
 * Signs a results file keylessly and records the signature in the transparency log.
 *
 * The certificate comes from Fulcio against the job's OIDC identity. Signature and
 * certificate are dropped: verifiers rebuild everything from the published payload and
 * the log entry.
 */
export async function signResults(resultsFile: string, opts: SignResultsOptions = {}): Promise<void> {
  const config: SigningConfig = { ...DEFAULT_SIGNING_CONFIG, ...opts.config };
  const signFn = opts.signFn ?? sign;
  const getIdToken = opts.getIdToken ?? ((audience: string) => core.getIDToken(audience));

  let payload: Buffer;
  try {
    payload = await fs.readFile(resultsFile);
  } catch (err) {
    throw signingError('reading results to sign', resultsFile, err);
  }

  let identityToken: string;
  try {
    identityToken = await getIdToken(config.oidcClientId);
  } catch (err) {
    throw signingError('obtaining OIDC identity token', resultsFile, err);
  }

  core.debug(`signing ${resultsFile} via ${config.fulcioURL}, tlog ${config.tlogUpload ? config.rekorURL : 'disabled'}`);
  try {
    await signFn(payload, {
      fulcioURL: config.fulcioURL,
      rekorURL: config.rekorURL,
      identityToken,
      tlogUpload: config.tlogUpload,
      timeout: config.timeoutMs
    });
  } catch (err) {
    throw signingError('error signing payload', resultsFile, err);
  }
}
