/**
 * Result sinks: side channel for per-evaluation and per-summary events.
 * The runner never lets a sink failure reach the experiment.
 */

import type { ExperimentEvent, ResultSink } from './types.js';
import { logger } from '../utils/logger.js';

export class LoggerResultSink implements ResultSink {
  async emit(event: ExperimentEvent): Promise<void> {
    if (event.type === 'summary') {
      const { summary } = event;
      logger.info(`Summary ${summary.configurationId}`, {
        runId: event.runId,
        status: summary.status,
        successfulRecords: summary.successfulRecords,
        failedRecords: summary.failedRecords,
        metrics: summary.metrics,
      });
      return;
    }
    logger.debug(`Evaluation ${event.configurationId}/${event.recordId}: ${event.result.evaluator}`, {
      value: event.result.value,
      score: event.result.score,
    });
  }
}

export interface HttpResultSinkOptions {
  url: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
}

/**
 * POSTs each event as JSON to a telemetry collector
 */
export class HttpResultSink implements ResultSink {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;

  constructor(options: HttpResultSinkOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.headers = options.headers ?? {};
  }

  async emit(event: ExperimentEvent): Promise<void> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...this.headers },
        body: JSON.stringify({ ...event, emittedAt: new Date().toISOString() }),
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new Error(`Telemetry collector responded ${response.status}`);
      }
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Fan out to several sinks; every sink sees every event
 */
export class CompositeResultSink implements ResultSink {
  private readonly sinks: readonly ResultSink[];

  constructor(sinks: readonly ResultSink[]) {
    this.sinks = sinks;
  }

  async emit(event: ExperimentEvent): Promise<void> {
    const outcomes = await Promise.allSettled(this.sinks.map(sink => sink.emit(event)));
    const failure = outcomes.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
    if (failure) {
      throw failure.reason;
    }
  }
}
