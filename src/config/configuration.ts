// Centralized, typed configuration for the API
// Export a default factory so ConfigModule.load can consume it.
export default () => ({
  nodeEnv: process.env.NODE_ENV ?? 'development',
  port: parseInt(process.env.PORT ?? '8000', 10),
  // one of: fatal | error | warn | log | debug | verbose
  logLevel: process.env.LOG_LEVEL ?? 'log',

  model: {
    // serialized artifact exported by the training pipeline
    path: process.env.MODEL_PATH ?? 'models/LinearRegression.json',
  },

  persistence: {
    logPath: process.env.PREDICTION_LOG_PATH ?? 'logs/predictions.log',
    databasePath: process.env.PREDICTION_DB_PATH ?? 'predictions.db',
  },
});
