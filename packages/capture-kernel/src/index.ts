export { CorrelationError, type CorrelationErrorCode } from './errors.js';
export {
  correlationTokenSchema,
  createCorrelationToken,
  parseCorrelationToken,
  isCorrelationToken,
  type CorrelationToken
} from './token.js';
export {
  CorrelationContext,
  CorrelationScope,
  correlationContext,
  type ScopeBinding
} from './scope.js';
export {
  CAPTURE_FIELDS,
  CAPTURE_LEVELS,
  LEVEL_VALUES,
  levelFromValue,
  parseLogLine,
  propertyValueSchema,
  type CaptureInput,
  type CaptureLevel,
  type CapturedEvent,
  type EventProperties,
  type PropertyValue
} from './event.js';
export { CorrelatedEvents } from './correlated-events.js';
export {
  EventCaptureStore,
  correlationMarker,
  type EventCaptureStoreOptions,
  type QueryOptions
} from './store.js';
export {
  CaptureDestination,
  captureLoggerOptions,
  type CaptureDestinationOptions,
  type EchoTarget
} from './destination.js';
export {
  initializeCapture,
  isCaptureInitialized,
  getCaptureLogger,
  correlatedEvents,
  beginCorrelationScope,
  withCorrelationScope,
  activeCorrelationToken,
  type CaptureOptions,
  type CaptureRuntime
} from './capture.js';
export { withCorrelation, type CorrelatedTestContext } from './testing.js';
