import { Injectable, Logger } from '@nestjs/common';
import { describeError } from '../common/errors';
import {
  PersistenceFailures,
  PredictionRecorder,
} from '../persistence/prediction-recorder.service';
import { PredictionStore } from '../persistence/prediction-store.service';

export type PredictionCount =
  | { status: 'ok'; totalPredictions: number }
  | { status: 'unavailable'; reason: string };

/**
 * Usage counters. The total is counted from the store on every call and
 * never cached; an unreachable store is reported as `unavailable`, not 0.
 */
@Injectable()
export class MetricsService {
  private readonly logger = new Logger(MetricsService.name);

  constructor(
    private readonly store: PredictionStore,
    private readonly recorder: PredictionRecorder,
  ) {}

  async count(): Promise<PredictionCount> {
    try {
      return { status: 'ok', totalPredictions: await this.store.count() };
    } catch (error) {
      const reason = describeError(error);
      this.logger.error(`Prediction count unavailable: ${reason}`);
      return { status: 'unavailable', reason };
    }
  }

  persistenceFailures(): PersistenceFailures {
    return this.recorder.failureCounts();
  }
}
