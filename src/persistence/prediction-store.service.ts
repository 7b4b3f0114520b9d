import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { PredictionEntity } from './prediction.entity';
import { PredictionEvent, PredictionSink } from './prediction-sink';

export interface StoredPrediction {
  id: number;
  timestamp: string;
  input: unknown;
  prediction: number;
}

/**
 * Structured prediction store (SQLite via TypeORM). sql.js runs
 * statements synchronously, which serializes concurrent inserts.
 */
@Injectable()
export class PredictionStore implements PredictionSink {
  readonly name = 'store' as const;

  constructor(
    @InjectRepository(PredictionEntity)
    private readonly repository: Repository<PredictionEntity>,
  ) {}

  async write(event: PredictionEvent): Promise<void> {
    await this.repository.insert({
      timestamp: event.timestamp,
      inputs: JSON.stringify(event.input),
      prediction: String(event.prediction),
    });
  }

  count(): Promise<number> {
    return this.repository.count();
  }

  async findByTimestamp(timestamp: string): Promise<StoredPrediction[]> {
    const rows = await this.repository.find({ where: { timestamp }, order: { id: 'ASC' } });
    return rows.map(toStoredPrediction);
  }
}

function toStoredPrediction(row: PredictionEntity): StoredPrediction {
  const input: unknown = JSON.parse(row.inputs);
  return {
    id: row.id,
    timestamp: row.timestamp,
    input,
    prediction: Number(row.prediction),
  };
}
