import { z } from 'zod';

import { ValidationError } from '../errors/app-error.js';
import { type BodyInit, isBodyInit } from './body-extract.js';
import type { Fetcher } from './fetcher.js';
import { isFetcher } from './fetcher-target.js';

export type HeadersInit = NonNullable<ConstructorParameters<typeof Headers>[0]>;

export type RedirectMode = 'follow' | 'manual';
export type ResponseBodyEncoding = 'automatic' | 'manual';

function isHeadersInit(value: unknown): value is HeadersInit {
  return typeof value === 'object' && value !== null;
}

function isMetadataRecord(
  value: unknown
): value is Record<string, unknown> {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value)
  );
}

export const metadataSchema = z
  .custom<Record<string, unknown>>(
    isMetadataRecord,
    'metadata must be a plain object'
  )
  .nullable()
  .optional();

/** Deep copy, so no two entities share a metadata record. */
export function copyMetadata(
  metadata: Record<string, unknown> | null
): Record<string, unknown> | null {
  if (!metadata) return null;
  try {
    return structuredClone(metadata);
  } catch (error: unknown) {
    throw new ValidationError('metadata must be structured-cloneable.', {
      cause: error,
    });
  }
}

export const requestInitSchema = z.object({
  method: z.string().optional(),
  headers: z
    .custom<HeadersInit>(isHeadersInit, 'headers must be a header list')
    .optional(),
  body: z
    .custom<BodyInit>(isBodyInit, 'body is not a supported body type')
    .nullable()
    .optional(),
  redirect: z.enum(['follow', 'manual']).optional(),
  integrity: z
    .literal('', 'subresource integrity is not supported')
    .optional(),
  cache: z.string().optional(),
  encodeResponseBody: z.enum(['automatic', 'manual']).optional(),
  signal: z.instanceof(AbortSignal).nullable().optional(),
  fetcher: z
    .custom<Fetcher>(isFetcher, 'fetcher must be a Fetcher')
    .nullable()
    .optional(),
  metadata: metadataSchema,
  keepalive: z.literal(false).optional(),
});

export type RequestInit = z.input<typeof requestInitSchema>;
export type ParsedRequestInit = z.output<typeof requestInitSchema>;

export function parseRequestInit(init: unknown): ParsedRequestInit {
  const parsed = requestInitSchema.safeParse(init);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const detail = issue
      ? `${issue.path.join('.') || 'init'}: ${issue.message}`
      : 'invalid value';
    throw new ValidationError(`Invalid request init (${detail}).`, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

/** True for an init dictionary with no own keys. */
export function isEmptyInit(init: RequestInit): boolean {
  return Object.keys(init).length === 0;
}
