import { Module } from '@nestjs/common';
import { PersistenceModule } from '../persistence/persistence.module';
import { PredictionController } from './prediction.controller';
import { PredictionEngine } from './prediction-engine.service';
import { PredictionService } from './prediction.service';
import { MODEL_HANDLE, modelHandleProvider } from './model/model.provider';

@Module({
  imports: [PersistenceModule],
  controllers: [PredictionController],
  providers: [modelHandleProvider, PredictionEngine, PredictionService],
  exports: [MODEL_HANDLE],
})
export class PredictionModule {}
