export { hasTraceCoordinates } from './ITelemetryMessage';

export type { ITelemetryMessage } from './ITelemetryMessage';
