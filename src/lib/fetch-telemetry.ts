import { randomUUID } from 'node:crypto';
import diagnosticsChannel from 'node:diagnostics_channel';
import { performance } from 'node:perf_hooks';

import { config } from '../config/index.js';
import { AppError } from '../errors/app-error.js';
import { getErrorMessage, isSystemError, toError } from '../errors.js';
import { ExecutionContext } from '../services/context.js';
import { logDebug, logError, logWarn } from '../services/logger.js';

// ---------------------------------------------------------------------------
// Telemetry types
// ---------------------------------------------------------------------------

export type FetchChannelEvent =
  | {
      v: 1;
      type: 'start';
      requestId: string;
      method: string;
      url: string;
      contextId?: string;
    }
  | {
      v: 1;
      type: 'end';
      requestId: string;
      status: number;
      duration: number;
      contextId?: string;
    }
  | {
      v: 1;
      type: 'error';
      requestId: string;
      url: string;
      error: string;
      code?: string;
      duration: number;
      contextId?: string;
    };

const fetchChannel = diagnosticsChannel.channel(config.telemetry.channelName);

export interface FetchTelemetryContext {
  requestId: string;
  startTime: number;
  url: string;
  method: string;
  contextId?: string;
}

/** Query strings can carry tokens; logs and events only get origin + path. */
function redactUrl(url: string): string {
  if (!URL.canParse(url)) return url;
  const parsed = new URL(url);
  return `${parsed.origin}${parsed.pathname}`;
}

function errorCode(error: Error): string | undefined {
  if (error instanceof AppError) return error.code;
  return isSystemError(error) ? error.code : undefined;
}

// ---------------------------------------------------------------------------
// FetchTelemetry
// ---------------------------------------------------------------------------

export class FetchTelemetry {
  constructor(
    private readonly slowRequestThresholdMs = config.telemetry
      .slowRequestThresholdMs
  ) {}

  start(url: string, method: string): FetchTelemetryContext {
    const ctx: FetchTelemetryContext = {
      requestId: randomUUID(),
      startTime: performance.now(),
      url: redactUrl(url),
      method,
    };
    const contextId = ExecutionContext.tryCurrent()?.id;
    if (contextId) ctx.contextId = contextId;

    this.publish({
      v: 1,
      type: 'start',
      requestId: ctx.requestId,
      method: ctx.method,
      url: ctx.url,
      ...this.contextFields(ctx),
    });

    logDebug('Subrequest started', {
      requestId: ctx.requestId,
      method: ctx.method,
      url: ctx.url,
      ...this.contextFields(ctx),
    });

    return ctx;
  }

  recordResponse(context: FetchTelemetryContext, status: number): void {
    const duration = performance.now() - context.startTime;
    const durationLabel = `${Math.round(duration)}ms`;

    this.publish({
      v: 1,
      type: 'end',
      requestId: context.requestId,
      status,
      duration,
      ...this.contextFields(context),
    });

    logDebug('Subrequest completed', {
      requestId: context.requestId,
      status,
      url: context.url,
      duration: durationLabel,
    });

    if (duration > this.slowRequestThresholdMs) {
      logWarn('Slow subrequest detected', {
        requestId: context.requestId,
        url: context.url,
        duration: durationLabel,
      });
    }
  }

  recordError(context: FetchTelemetryContext, error: unknown): void {
    const duration = performance.now() - context.startTime;
    const err = toError(error);
    const code = errorCode(err);

    this.publish({
      v: 1,
      type: 'error',
      requestId: context.requestId,
      url: context.url,
      error: err.message,
      duration,
      ...(code !== undefined ? { code } : {}),
      ...this.contextFields(context),
    });

    const logData: Record<string, unknown> = {
      requestId: context.requestId,
      url: context.url,
      code,
      error: err.message,
    };

    // Cancellation is caller-driven, not a failure of the destination.
    if (code === 'CANCELED') {
      logDebug('Subrequest canceled', logData);
      return;
    }
    logError('Subrequest failed', logData);
  }

  private contextFields(ctx: FetchTelemetryContext): { contextId?: string } {
    return ctx.contextId ? { contextId: ctx.contextId } : {};
  }

  private publish(event: FetchChannelEvent): void {
    if (!fetchChannel.hasSubscribers) return;

    try {
      fetchChannel.publish(event);
    } catch (error: unknown) {
      logDebug('Telemetry subscriber threw', {
        error: getErrorMessage(error),
      });
    }
  }
}

export const fetchTelemetry = new FetchTelemetry();
