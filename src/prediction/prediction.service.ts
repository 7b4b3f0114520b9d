// src/prediction/prediction.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { ModelMismatchError, describeError } from '../common/errors';
import { PredictionRecorder } from '../persistence/prediction-recorder.service';
import {
  PredictResponseDto,
  PredictionRequest,
  toPayload,
} from './dto/predict.dto';
import { PredictionEngine, PredictionResult } from './prediction-engine.service';

/**
 * Per-request orchestration: score, record, respond.
 * Shape validation has already happened in the ValidationPipe.
 */
@Injectable()
export class PredictionService {
  private readonly logger = new Logger(PredictionService.name);

  constructor(
    private readonly engine: PredictionEngine,
    private readonly recorder: PredictionRecorder,
  ) {}

  async handle(request: PredictionRequest): Promise<PredictResponseDto> {
    const timestamp = new Date().toISOString();
    const input = toPayload(request);
    const { prediction, features } = this.score(input);

    // Never throws; sink failures are logged and counted by the recorder.
    const outcome = await this.recorder.record({ timestamp, input, prediction });
    this.logger.debug(
      `Predicted ${prediction} from ${JSON.stringify(features)} [${outcome.map((r) => `${r.sink}:${r.status}`).join(', ')}]`,
    );

    return { predicted_price: prediction };
  }

  private score(input: PredictionRequest): PredictionResult {
    try {
      return this.engine.predict(input);
    } catch (error) {
      if (error instanceof ModelMismatchError) {
        this.logger.fatal(
          `Loaded model rejected the feature vector: ${describeError(error)}`,
        );
      }
      throw error;
    }
  }
}
