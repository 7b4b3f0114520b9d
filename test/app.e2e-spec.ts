import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { configureApp } from '../src/app.setup';
import { PredictionStore } from '../src/persistence/prediction-store.service';
import { FEATURE_ORDER } from '../src/prediction/features';
import { LinearRegressionModel, ModelHandle } from '../src/prediction/model/model-handle';
import { MODEL_HANDLE } from '../src/prediction/model/model.provider';
import {
  LINEAR_SAMPLE_PREDICTION,
  SAMPLE_REQUEST,
  TREE_SAMPLE_PREDICTION,
  fixturePath,
} from './fixtures';

const ENV_KEYS = ['MODEL_PATH', 'PREDICTION_LOG_PATH', 'PREDICTION_DB_PATH'] as const;

describe('Prediction API (e2e)', () => {
  const savedEnv = ENV_KEYS.map((key) => [key, process.env[key]] as const);
  let app: INestApplication;
  let running: INestApplication | undefined;
  let dir: string;
  let logPath: string;

  async function startApp(
    options: { modelFile?: string; model?: ModelHandle } = {},
  ): Promise<INestApplication> {
    process.env.MODEL_PATH = fixturePath(options.modelFile ?? 'linear-model.json');
    process.env.PREDICTION_LOG_PATH = logPath;
    process.env.PREDICTION_DB_PATH = ':memory:';

    let builder = Test.createTestingModule({ imports: [AppModule] });
    if (options.model) {
      builder = builder.overrideProvider(MODEL_HANDLE).useValue(options.model);
    }
    const moduleRef = await builder.compile();
    app = configureApp(moduleRef.createNestApplication({ logger: false, bodyParser: false }));
    await app.init();
    running = app;
    return app;
  }

  const logLines = () => readFileSync(logPath, 'utf8').trimEnd().split('\n');

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'prediction-api-'));
    logPath = join(dir, 'logs', 'predictions.log');
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await running?.close();
    running = undefined;
    rmSync(dir, { recursive: true, force: true });
  });

  afterAll(() => {
    for (const [key, value] of savedEnv) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  });

  describe('GET /', () => {
    it('reports liveness', async () => {
      await startApp();

      const res = await request(app.getHttpServer()).get('/').expect(200);

      expect(res.body).toEqual({ message: 'Housing price prediction API is running' });
    });
  });

  describe('GET /health', () => {
    it('describes the loaded model', async () => {
      await startApp({ modelFile: 'decision-tree-model.json' });

      const res = await request(app.getHttpServer()).get('/health').expect(200);

      expect(res.body).toMatchObject({
        ok: true,
        version: 'v1',
        model: { kind: 'decision_tree', features: 8 },
      });
    });
  });

  describe('POST /predict', () => {
    it('returns the predicted price', async () => {
      await startApp();

      const res = await request(app.getHttpServer())
        .post('/predict')
        .send(SAMPLE_REQUEST)
        .expect(200);

      expect(res.body).toEqual({ predicted_price: LINEAR_SAMPLE_PREDICTION });
    });

    it('scores with a decision tree artifact', async () => {
      await startApp({ modelFile: 'decision-tree-model.json' });

      const res = await request(app.getHttpServer())
        .post('/predict')
        .send(SAMPLE_REQUEST)
        .expect(200);

      expect(res.body).toEqual({ predicted_price: TREE_SAMPLE_PREDICTION });
    });

    it('writes one log line and one row per prediction', async () => {
      await startApp();

      await request(app.getHttpServer()).post('/predict').send(SAMPLE_REQUEST).expect(200);

      const [line] = logLines();
      expect(line).toMatch(
        /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z - INFO - Input: \{"total_rooms":8,.*"longitude":-122\.4194\} \| Prediction: 13\.5$/,
      );
      expect(await app.get(PredictionStore).count()).toBe(1);
    });

    it('rejects a missing field with field-level detail', async () => {
      await startApp();
      const { longitude: _longitude, ...body } = SAMPLE_REQUEST;

      const res = await request(app.getHttpServer()).post('/predict').send(body).expect(422);

      expect(res.body).toEqual({
        statusCode: 422,
        error: 'ValidationError',
        message: 'Invalid prediction request: longitude',
        details: [
          {
            field: 'longitude',
            messages: ['longitude must be a number conforming to the specified constraints'],
          },
        ],
      });
    });

    it('rejects non-numeric and unknown fields', async () => {
      await startApp();

      const res = await request(app.getHttpServer())
        .post('/predict')
        .send({ ...SAMPLE_REQUEST, median_income: '3.5', ocean_proximity: 'NEAR BAY' })
        .expect(422);

      expect(res.body.error).toBe('ValidationError');
      expect(res.body.details.map((d: { field: string }) => d.field).sort()).toEqual([
        'median_income',
        'ocean_proximity',
      ]);
    });

    it('answers 422 with a fixed message for a body that is not valid JSON', async () => {
      await startApp();

      const res = await request(app.getHttpServer())
        .post('/predict')
        .set('Content-Type', 'application/json')
        .send('{"total_rooms": 8,')
        .expect(422);

      expect(res.body).toEqual({
        statusCode: 422,
        error: 'ValidationError',
        message: 'Request body is not valid JSON',
      });
      expect(existsSync(logPath)).toBe(false);
    });

    it('rejects zero households without scoring or recording', async () => {
      await startApp();

      const res = await request(app.getHttpServer())
        .post('/predict')
        .send({ ...SAMPLE_REQUEST, households: 0 })
        .expect(422);

      expect(res.body.details).toEqual([
        { field: 'households', messages: ['households must be a positive number'] },
      ]);
      expect(existsSync(logPath)).toBe(false);
      await request(app.getHttpServer())
        .get('/metrics')
        .expect(200)
        .expect((r) => expect(r.body.total_predictions).toBe(0));
    });

    it('answers 500 with a structured error when the model rejects the vector', async () => {
      const sevenFeatures = FEATURE_ORDER.slice(0, 7);
      await startApp({ model: new LinearRegressionModel(sevenFeatures, [1, 1, 1, 1, 1, 1, 1], 0) });

      const res = await request(app.getHttpServer())
        .post('/predict')
        .send(SAMPLE_REQUEST)
        .expect(500);

      expect(res.body).toEqual({
        statusCode: 500,
        error: 'ModelMismatchError',
        message: 'Model expects 7 features but received 8',
      });
      expect(existsSync(logPath)).toBe(false);
    });

    it('still answers 200 when the store is unavailable', async () => {
      await startApp();
      jest
        .spyOn(app.get(PredictionStore), 'write')
        .mockRejectedValue(new Error('SQLITE_READONLY: attempt to write a readonly database'));

      const res = await request(app.getHttpServer())
        .post('/predict')
        .send(SAMPLE_REQUEST)
        .expect(200);

      expect(res.body).toEqual({ predicted_price: LINEAR_SAMPLE_PREDICTION });
      expect(logLines()).toHaveLength(1);
      const metrics = await request(app.getHttpServer()).get('/metrics').expect(200);
      expect(metrics.body).toEqual({
        total_predictions: 0,
        persistence_failures: { log: 0, store: 1 },
      });
    });

    it('round-trips a record through the store by timestamp', async () => {
      await startApp();

      const res = await request(app.getHttpServer())
        .post('/predict')
        .send(SAMPLE_REQUEST)
        .expect(200);
      const timestamp = logLines()[0].split(' - ')[0];
      const rows = await app.get(PredictionStore).findByTimestamp(timestamp);

      expect(rows).toHaveLength(1);
      expect(rows[0].input).toEqual(SAMPLE_REQUEST);
      expect(rows[0].prediction).toBe(res.body.predicted_price);
    });
  });

  describe('GET /metrics', () => {
    it('counts every served prediction', async () => {
      await startApp();
      const server = app.getHttpServer();

      for (const households of [100, 200, 400]) {
        await request(server).post('/predict').send({ ...SAMPLE_REQUEST, households }).expect(200);
      }

      const res = await request(server).get('/metrics').expect(200);
      expect(res.body).toEqual({
        total_predictions: 3,
        persistence_failures: { log: 0, store: 0 },
      });
    });

    it('records concurrent predictions completely', async () => {
      await startApp();
      const server = app.getHttpServer();

      const [first, second] = await Promise.all([
        request(server).post('/predict').send(SAMPLE_REQUEST),
        request(server).post('/predict').send({ ...SAMPLE_REQUEST, median_income: 5.5 }),
      ]);

      expect(first.status).toBe(200);
      expect(second.status).toBe(200);
      const predictions = logLines()
        .map((line) => Number(line.split(' | Prediction: ')[1]))
        .sort((a, b) => a - b);
      expect(predictions).toEqual([13.5, 14.5]);
      const res = await request(server).get('/metrics').expect(200);
      expect(res.body.total_predictions).toBe(2);
    });

    it('answers 503 rather than zero when the store cannot be queried', async () => {
      await startApp();
      jest
        .spyOn(app.get(PredictionStore), 'count')
        .mockRejectedValue(new Error('SQLITE_CANTOPEN: unable to open database file'));

      const res = await request(app.getHttpServer()).get('/metrics').expect(503);

      expect(res.body).toEqual({
        statusCode: 503,
        error: 'StoreUnavailable',
        message: 'Prediction store is unavailable',
        total_predictions: null,
      });
    });
  });

  describe('startup', () => {
    it('refuses to build the application without a model artifact', async () => {
      process.env.MODEL_PATH = fixturePath('no-such-model.json');
      process.env.PREDICTION_LOG_PATH = logPath;
      process.env.PREDICTION_DB_PATH = ':memory:';

      await expect(Test.createTestingModule({ imports: [AppModule] }).compile()).rejects.toThrow(
        /Cannot load model artifact .*no-such-model\.json/,
      );
    });
  });
});
