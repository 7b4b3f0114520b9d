import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { describeError } from '../common/errors';
import { PredictionEvent, PredictionSink } from './prediction-sink';

/** `<timestamp> - INFO - Input: <payload> | Prediction: <value>` */
export function formatLogLine(event: PredictionEvent): string {
  return `${event.timestamp} - INFO - Input: ${JSON.stringify(event.input)} | Prediction: ${event.prediction}\n`;
}

/**
 * Append-only, human-readable prediction log.
 * Each line is written by its own open/append/close cycle, and writes are
 * queued so concurrent requests never interleave partial lines.
 */
@Injectable()
export class PredictionLogFile implements PredictionSink, OnModuleInit {
  readonly name = 'log' as const;
  readonly path: string;
  private readonly logger = new Logger(PredictionLogFile.name);
  private queue: Promise<void> = Promise.resolve();

  constructor(config: ConfigService) {
    this.path = config.getOrThrow<string>('persistence.logPath');
  }

  async onModuleInit() {
    try {
      await mkdir(dirname(this.path), { recursive: true });
    } catch (error) {
      // Not fatal: every write will fail and be counted instead.
      this.logger.warn(`Cannot create log directory for ${this.path}: ${describeError(error)}`);
    }
  }

  write(event: PredictionEvent): Promise<void> {
    const line = formatLogLine(event);
    const pending = this.queue.then(() => appendFile(this.path, line, { flag: 'a' }));
    // the caller observes the failure through `pending`; the queue moves on
    this.queue = pending.catch(() => undefined);
    return pending;
  }
}
