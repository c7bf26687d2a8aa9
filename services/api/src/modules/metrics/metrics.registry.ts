import { Counter, collectDefaultMetrics, Histogram, Registry } from 'prom-client';

export const apiRegistry = new Registry();
collectDefaultMetrics({ register: apiRegistry });

export const predictionRequests = new Counter({
  name: 'depin_predictions_total',
  help: 'Compatibility prediction requests by outcome',
  labelNames: ['outcome'],
  registers: [apiRegistry],
});

export const predictionDuration = new Histogram({
  name: 'depin_prediction_duration_seconds',
  help: 'Time spent scoring the catalog for one prediction',
  buckets: [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1],
  registers: [apiRegistry],
});
