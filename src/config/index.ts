import process from 'node:process';

import { parseBoolean, parseInteger, parseLogLevel } from './env-parsers.js';

const { env } = process;

/**
 * Switches that gate parts of the public surface. Every execution context
 * starts from these values and may override any of them.
 */
export interface CompatibilityFlags {
  /** Accept the `cache` request option at all. */
  cacheOptionEnabled: boolean;
  /** Accept `cache: 'no-cache'` in addition to `'no-store'`. */
  cacheNoCache: boolean;
  /** Expose `queue()` and `scheduled()` on fetchers. */
  serviceBindingExtraHandlers: boolean;
  /** Expose the legacy `get()` / `put()` / `delete()` helpers. */
  fetcherGetPutDelete: boolean;
  /** Resolve arbitrary property names to remote methods. */
  jsRpc: boolean;
}

const DEFAULT_MAX_REDIRECTS = 20;
const SLOW_REQUEST_THRESHOLD_MS = 5000;

export const config = {
  fetcher: {
    maxRedirects: parseInteger(
      env['FETCH_MAX_REDIRECTS'],
      DEFAULT_MAX_REDIRECTS,
      0,
      100
    ),
    // Base used to resolve schemeless URLs on fetchers that allow them.
    fakeBaseUrl: 'https://fake-host/',
  },
  compat: {
    cacheOptionEnabled: parseBoolean(env['COMPAT_CACHE_OPTION'], true),
    cacheNoCache: parseBoolean(env['COMPAT_CACHE_NO_CACHE'], true),
    serviceBindingExtraHandlers: parseBoolean(
      env['COMPAT_EXTRA_HANDLERS'],
      true
    ),
    fetcherGetPutDelete: parseBoolean(env['COMPAT_GET_PUT_DELETE'], true),
    jsRpc: parseBoolean(env['COMPAT_JS_RPC'], true),
  } satisfies CompatibilityFlags,
  logging: {
    level: parseLogLevel(env['LOG_LEVEL']),
    enabled: parseBoolean(env['LOG_ENABLED'], env['NODE_ENV'] !== 'test'),
  },
  telemetry: {
    channelName: 'sandbox-fetch.fetch',
    slowRequestThresholdMs: parseInteger(
      env['SLOW_REQUEST_THRESHOLD_MS'],
      SLOW_REQUEST_THRESHOLD_MS,
      0
    ),
  },
};
