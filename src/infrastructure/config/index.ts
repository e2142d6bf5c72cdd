export {
  DEFAULT_LOG_LEVEL,
  DEFAULT_TRACER_NAME,
  loadTracingOptionsFromEnv,
  parseBooleanFlag,
  resolveTracingOptions,
} from './TracingOptions';

export type { ResolvedTracingOptions, TracingOptions } from './TracingOptions';
