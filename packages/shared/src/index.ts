export * from './types.js';
export * from './errors.js';
export { logger } from './logger.js';
export * from './model-types.js';
export { ModelRouter } from './model-router.js';
export { loadModelConfig, createDefaultConfig } from './model-config.js';
export { getTracer, getTraceHeaders, withSpan } from './tracing.js';
export { CircuitBreaker, type CircuitBreakerOptions, type CircuitState } from './circuit-breaker.js';
export { features, createFeatures, type Features, type FeatureFlag, type SafehouseMode } from './features.js';
