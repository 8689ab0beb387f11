/**
 * Minimal HTTP helpers for the external APIs
 *
 * One attempt per request with a fixed timeout. Every failure is raised as
 * an ExternalFetchError; callers decide whether to absorb it.
 */

import type { z } from 'zod';
import { ExternalFetchError, errorMessage } from '../utils/errors.js';

export type QueryParams = Record<string, string | number | boolean>;

export function buildUrl(base: string, path: string, params: QueryParams = {}): URL {
  const url = new URL(`${base.replace(/\/+$/, '')}${path}`);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, String(value));
  }
  return url;
}

/**
 * URL as text with the api_key parameter removed, for logs and storage
 */
export function redactApiKey(url: string | URL): string {
  const copy = new URL(String(url));
  copy.searchParams.delete('api_key');
  return copy.toString();
}

async function send(url: URL, method: 'GET' | 'HEAD', timeoutMs: number): Promise<Response> {
  try {
    return await fetch(url, {
      method,
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      throw new ExternalFetchError(`Request to ${redactApiKey(url)} timed out after ${timeoutMs} ms`, {
        cause: error,
      });
    }
    throw new ExternalFetchError(`Request to ${redactApiKey(url)} failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * GET a JSON document and validate it against `schema`
 */
export async function getJson<S extends z.ZodTypeAny>(
  url: URL,
  schema: S,
  timeoutMs: number
): Promise<z.infer<S>> {
  const response = await send(url, 'GET', timeoutMs);

  if (!response.ok) {
    throw new ExternalFetchError(`HTTP ${response.status} from ${redactApiKey(url)}`, {
      status: response.status,
    });
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new ExternalFetchError(`Invalid JSON from ${redactApiKey(url)}`, { cause: error });
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ExternalFetchError(`Unexpected response shape from ${redactApiKey(url)}: ${issues}`, {
      cause: parsed.error,
    });
  }

  return parsed.data;
}

/**
 * HEAD request; the caller inspects the status
 */
export async function head(url: URL, timeoutMs: number): Promise<Response> {
  return send(url, 'HEAD', timeoutMs);
}
