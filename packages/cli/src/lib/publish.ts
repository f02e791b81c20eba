import * as core from '@actions/core';

import { ActionError, errorMessage } from '../errors.js';
import type { PublishPayload, PublishTarget } from '../types.js';

export const PUBLISH_TIMEOUT_MS = 10_000;

export interface PublishOptions {
  baseUrl: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export function publishEndpoint(baseUrl: string, repository: string): string {
  const raw = `${baseUrl}/projects/github.com/${repository}`;
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch (err) {
    throw new ActionError('ENDPOINT_INVALID', `parsing Scorecard API endpoint ${raw}: ${errorMessage(err)}`, {
      details: { url: raw },
      cause: err
    });
  }
  if (!['http:', 'https:'].includes(parsed.protocol)) {
    throw new ActionError('ENDPOINT_INVALID', `Scorecard API endpoint must use http or https: ${raw}`, {
      details: { url: raw }
    });
  }
  return parsed.toString();
}

export function buildPublishBody(payload: Uint8Array, branch: string, accessToken: string): PublishPayload {
  let result: string;
  try {
    result = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(payload);
  } catch (err) {
    throw new ActionError('PAYLOAD_SERIALIZATION_FAILED', `json results are not valid UTF-8: ${errorMessage(err)}`, {
      cause: err
    });
  }
  return { result, branch, accessToken };
}

/**
 * Uploads JSON results to the results API. Only `201 Created` counts as success.
 *
 * The deadline covers the whole exchange, body read included.
 */
export async function publishResults(payload: Uint8Array, target: PublishTarget, opts: PublishOptions): Promise<void> {
  const body = JSON.stringify(buildPublishBody(payload, target.ref, target.accessToken));
  const endpoint = publishEndpoint(opts.baseUrl, target.repository);
  const timeoutMs = opts.timeoutMs ?? PUBLISH_TIMEOUT_MS;
  const fetchImpl = opts.fetchImpl ?? fetch;

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    let request: Request;
    try {
      request = new Request(endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body,
        signal: controller.signal
      });
    } catch (err) {
      throw new ActionError('REQUEST_INVALID', `creating HTTP request: ${errorMessage(err)}`, { cause: err });
    }

    core.debug(`POST ${endpoint}`);
    let status: number;
    let statusText: string;
    let responseBody: string;
    try {
      const response = await fetchImpl(request);
      status = response.status;
      statusText = response.statusText;
      responseBody = await response.text();
    } catch (err) {
      if (controller.signal.aborted) {
        throw new ActionError('PUBLISH_TIMEOUT', `publish request timed out after ${timeoutMs}ms`, {
          details: { url: endpoint, timeoutMs },
          cause: err
        });
      }
      throw new ActionError('PUBLISH_NETWORK_ERROR', `executing scorecard-api call: ${errorMessage(err)}`, {
        details: { url: endpoint },
        cause: err
      });
    }

    if (status !== 201) {
      throw new ActionError(
        'PUBLISH_REJECTED',
        `publish request failed with ${status}${statusText ? ` ${statusText}` : ''}: ${responseBody}`,
        { details: { url: endpoint, status, body: responseBody } }
      );
    }
  } finally {
    clearTimeout(timeout);
  }
}
