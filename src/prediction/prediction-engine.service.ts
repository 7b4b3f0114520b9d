import { Inject, Injectable } from '@nestjs/common';
import type { PredictionRequest } from './dto/predict.dto';
import { FeatureVector, deriveFeatures } from './features';
import { MODEL_HANDLE } from './model/model.provider';
import type { ModelHandle } from './model/model-handle';

export interface PredictionResult {
  prediction: number;
  /** The exact vector that was scored. */
  features: FeatureVector;
}

@Injectable()
export class PredictionEngine {
  constructor(@Inject(MODEL_HANDLE) private readonly model: ModelHandle) {}

  predict(request: PredictionRequest): PredictionResult {
    const features = deriveFeatures(request);
    return { prediction: this.model.score(features), features };
  }
}
