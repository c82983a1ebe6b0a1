/**
 * JSON-over-HTTP helper shared by the external API providers.
 * Uses native fetch; every call gets an abort timeout and its response body
 * validated against a zod schema.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { UpstreamError, errorMessage } from '../errors.js';
import { ApiErrorBodySchema } from '../types/api.js';

export interface JsonRequest {
  /** Service name used in error messages, e.g. "iNaturalist". */
  service: string;
  url: string;
  method?: 'GET' | 'POST';
  body?: unknown;
  timeoutMs: number;
  headers?: Record<string, string>;
}

export interface JsonResponse<T> {
  status: number;
  data: T;
}

export async function requestJson<T>(
  req: JsonRequest,
  schema: ZodType<T, ZodTypeDef, unknown>
): Promise<JsonResponse<T>> {
  const headers: Record<string, string> = {
    Accept: 'application/json',
    ...req.headers,
  };
  if (req.body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }

  let res: Response;
  try {
    res = await fetch(req.url, {
      method: req.method ?? 'GET',
      headers,
      body: req.body !== undefined ? JSON.stringify(req.body) : undefined,
      signal: AbortSignal.timeout(req.timeoutMs),
    });
  } catch (err) {
    throw new UpstreamError(req.service, errorMessage(err));
  }

  if (!res.ok) {
    const body: unknown = await res.json().catch(() => ({}));
    const parsed = ApiErrorBodySchema.safeParse(body);
    const detail = parsed.success
      ? parsed.data.message ?? parsed.data.error ?? 'Unknown error'
      : 'Unknown error';
    throw new UpstreamError(req.service, detail, res.status);
  }

  let json: unknown;
  try {
    json = await res.json();
  } catch {
    throw new UpstreamError(req.service, 'response body is not valid JSON', res.status);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? `${first.path.join('.') || '(root)'}: ${first.message}` : 'unknown';
    throw new UpstreamError(req.service, `unexpected payload shape at ${where}`, res.status);
  }

  return { status: res.status, data: parsed.data };
}
