import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PredictionEntity } from './prediction.entity';
import { PredictionLogFile } from './prediction-log-file.service';
import { PredictionRecorder } from './prediction-recorder.service';
import { PredictionStore } from './prediction-store.service';

@Module({
  imports: [TypeOrmModule.forFeature([PredictionEntity])],
  providers: [PredictionLogFile, PredictionStore, PredictionRecorder],
  exports: [PredictionRecorder, PredictionStore],
})
export class PersistenceModule {}
