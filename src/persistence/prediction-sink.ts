import type { PersistenceError, SinkName } from '../common/errors';
import type { PredictionRequest } from '../prediction/dto/predict.dto';

export interface PredictionEvent {
  timestamp: string;
  input: PredictionRequest;
  prediction: number;
}

/** A destination for prediction events. Each sink serializes its own writes. */
export interface PredictionSink {
  readonly name: SinkName;
  write(event: PredictionEvent): Promise<void>;
}

export type SinkResult =
  | { sink: SinkName; status: 'written' }
  | { sink: SinkName; status: 'failed'; error: PersistenceError };
