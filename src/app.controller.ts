import { Controller, Get, Inject } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MODEL_HANDLE } from './prediction/model/model.provider';
import type { ModelHandle } from './prediction/model/model-handle';

@Controller()
export class AppController {
  constructor(
    private readonly config: ConfigService,
    @Inject(MODEL_HANDLE) private readonly model: ModelHandle,
  ) {}

  @Get()
  root() {
    return { message: 'Housing price prediction API is running' };
  }

  @Get('health')
  health() {
    return {
      ok: true,
      env: this.config.get<string>('nodeEnv'),
      version: 'v1',
      model: { kind: this.model.kind, features: this.model.featureCount },
    };
  }
}
