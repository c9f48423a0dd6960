/**
 * Stage Timer Utility
 * Consistent timing instrumentation for pipeline stages
 *
 * Major stages always log at INFO; others at DEBUG unless slower than SLOW_STAGE_MS.
 */

import { performance } from 'node:perf_hooks';
import type { Logger } from '../logger/structured-logger.js';

export const SLOW_STAGE_MS = 2000;

export interface TimedContext {
  requestId: string;
  traceId?: string;
  log: Logger;
  timings: Record<string, number>;
}

export type StageTimerExtra = Record<string, unknown>;

const MAJOR_STAGES = new Set(['admit', 'fetch_candidates', 'pipeline']);

function isMajorStage(stage: string): boolean {
  return MAJOR_STAGES.has(stage);
}

export function timingKey(stage: string): string {
  return `${stage.replace(/_(\w)/g, (_, c: string) => c.toUpperCase())}Ms`;
}

export function startStage(ctx: TimedContext, stage: string, extra?: StageTimerExtra): number {
  const level = isMajorStage(stage) ? 'info' : 'debug';
  ctx.log[level]({
    requestId: ctx.requestId,
    ...(ctx.traceId && { traceId: ctx.traceId }),
    stage,
    event: 'stage_started',
    ...extra
  }, `[Suggestions] ${stage} started`);

  return performance.now();
}

export function endStage(ctx: TimedContext, stage: string, startTime: number, extra?: StageTimerExtra): number {
  const durationMs = Math.round(performance.now() - startTime);
  ctx.timings[timingKey(stage)] = durationMs;

  const isSlow = durationMs > SLOW_STAGE_MS;
  const level = isMajorStage(stage) || isSlow ? 'info' : 'debug';

  ctx.log[level]({
    requestId: ctx.requestId,
    ...(ctx.traceId && { traceId: ctx.traceId }),
    stage,
    event: 'stage_completed',
    durationMs,
    ...(isSlow && { slow: true }),
    ...extra
  }, `[Suggestions] ${stage} completed`);

  return durationMs;
}

export function failStage(ctx: TimedContext, stage: string, startTime: number, error: unknown): number {
  const durationMs = Math.round(performance.now() - startTime);
  ctx.timings[timingKey(stage)] = durationMs;

  ctx.log.warn({
    requestId: ctx.requestId,
    ...(ctx.traceId && { traceId: ctx.traceId }),
    stage,
    event: 'stage_failed',
    durationMs,
    error: error instanceof Error ? error.message : String(error),
    errorName: error instanceof Error ? error.name : undefined
  }, `[Suggestions] ${stage} failed`);

  return durationMs;
}

/**
 * Run a stage with start/end/fail instrumentation
 */
export async function timeStage<T>(ctx: TimedContext, stage: string, fn: () => Promise<T>, extra?: StageTimerExtra): Promise<T> {
  const start = startStage(ctx, stage, extra);
  try {
    const result = await fn();
    endStage(ctx, stage, start);
    return result;
  } catch (error) {
    failStage(ctx, stage, start, error);
    throw error;
  }
}

/**
 * Simple timer for non-stage operations
 */
export function startTimer(): { stop: () => number; elapsed: () => number } {
  const startTime = performance.now();
  return {
    stop: () => Math.round(performance.now() - startTime),
    elapsed: () => Math.round(performance.now() - startTime)
  };
}
