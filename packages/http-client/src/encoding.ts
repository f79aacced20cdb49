/**
 * Request assembly helpers used by the method builders
 */

import { ValidationError } from '@switchyard/errors';

import type { HeaderMap, HttpMethod, PreparedRequest } from './types.js';

export type FormValues = URLSearchParams | Record<string, string | readonly string[]>;

/**
 * Lower-case header names. Later maps win, so caller headers passed last
 * override builder defaults regardless of case.
 */
export function mergeHeaders(...maps: Array<Readonly<HeaderMap> | undefined>): HeaderMap {
  const merged: HeaderMap = {};
  for (const map of maps) {
    if (!map) continue;
    for (const [name, value] of Object.entries(map)) {
      merged[name.toLowerCase()] = value;
    }
  }
  return merged;
}

/**
 * Parse and normalise an absolute http(s) URL
 */
export function resolveUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (cause) {
    throw new ValidationError(`invalid request URL: ${url}`, { code: 'INVALID_URL', cause });
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ValidationError(`unsupported URL protocol: ${parsed.protocol}`, {
      code: 'INVALID_URL',
      data: { url },
    });
  }

  return parsed.toString();
}

export function encodeJson(payload: unknown): Buffer {
  let text: string | undefined;
  try {
    text = JSON.stringify(payload);
  } catch (cause) {
    throw new ValidationError('payload cannot be encoded as JSON', { code: 'ENCODE_ERROR', cause });
  }

  if (text === undefined) {
    throw new ValidationError(`payload of type ${typeof payload} cannot be encoded as JSON`, {
      code: 'ENCODE_ERROR',
    });
  }

  return Buffer.from(text, 'utf8');
}

export function encodeForm(form: FormValues): string {
  if (form instanceof URLSearchParams) {
    return form.toString();
  }

  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(form)) {
    if (typeof value === 'string') {
      params.append(key, value);
    } else {
      value.forEach(item => params.append(key, item));
    }
  }
  return params.toString();
}

export function prepareRequest(
  method: HttpMethod,
  url: string,
  options: { body?: Buffer; defaults?: HeaderMap; headers?: HeaderMap } = {}
): PreparedRequest {
  return {
    method,
    url: resolveUrl(url),
    headers: mergeHeaders(options.defaults, options.headers),
    ...(options.body !== undefined && { body: options.body }),
  };
}
