import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { ConfigService } from '@nestjs/config';
import type { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { PredictionEntity } from './prediction.entity';

const IN_MEMORY = ':memory:';

/**
 * SQLite (sql.js) database held in memory for the lifetime of the process.
 * It is loaded from the database file when one exists and written back
 * after every insert; the file's directory is created on first start.
 */
export function databaseOptions(config: ConfigService): TypeOrmModuleOptions {
  const database = config.getOrThrow<string>('persistence.databasePath');
  if (database !== IN_MEMORY) {
    mkdirSync(dirname(database), { recursive: true });
  }

  return {
    type: 'sqljs',
    location: database === IN_MEMORY ? undefined : database,
    autoSave: database !== IN_MEMORY,
    entities: [PredictionEntity],
    synchronize: true,
    // a store that cannot open at boot is a deployment problem; fail fast
    retryAttempts: 0,
  };
}
