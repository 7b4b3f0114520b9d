import { Injectable, Logger } from '@nestjs/common';
import { PersistenceError, SinkName } from '../common/errors';
import { PredictionLogFile } from './prediction-log-file.service';
import { PredictionStore } from './prediction-store.service';
import { PredictionEvent, PredictionSink, SinkResult } from './prediction-sink';

export type PersistenceFailures = Record<SinkName, number>;

/**
 * Fans each prediction event out to every sink.
 *
 * Sinks are attempted independently: one failing never stops the other,
 * and `record` itself never rejects. Persistence is observability here,
 * so failures are logged and counted but kept away from the response.
 */
@Injectable()
export class PredictionRecorder {
  private readonly logger = new Logger(PredictionRecorder.name);
  private readonly sinks: readonly PredictionSink[];
  private readonly failures: PersistenceFailures = { log: 0, store: 0 };

  constructor(logFile: PredictionLogFile, store: PredictionStore) {
    this.sinks = [logFile, store];
  }

  async record(event: PredictionEvent): Promise<SinkResult[]> {
    const results = await Promise.all(this.sinks.map((sink) => this.attempt(sink, event)));

    const failed = results.filter((r) => r.status === 'failed');
    if (failed.length === results.length) {
      this.logger.error(
        `Prediction at ${event.timestamp} was not persisted to any sink (${failed.map((r) => r.sink).join(', ')})`,
      );
    }
    return results;
  }

  failureCounts(): PersistenceFailures {
    return { ...this.failures };
  }

  private async attempt(sink: PredictionSink, event: PredictionEvent): Promise<SinkResult> {
    try {
      await sink.write(event);
      return { sink: sink.name, status: 'written' };
    } catch (cause) {
      const error = new PersistenceError(sink.name, cause);
      this.failures[sink.name] += 1;
      this.logger.warn(error.message);
      return { sink: sink.name, status: 'failed', error };
    }
  }
}
