import { Logger, Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ModelHandle, loadModel } from './model-handle';

export const MODEL_HANDLE = Symbol('MODEL_HANDLE');

/**
 * Loads the model once while the application initializes. A failure here
 * rejects NestFactory.create, so the server never starts listening.
 */
export const modelHandleProvider: Provider<ModelHandle> = {
  provide: MODEL_HANDLE,
  inject: [ConfigService],
  useFactory: (config: ConfigService): ModelHandle => {
    const path = config.getOrThrow<string>('model.path');
    const model = loadModel(path);
    new Logger('ModelHandle').log(
      `Loaded ${model.kind} model (${model.featureCount} features) from ${path}`,
    );
    return model;
  },
};
