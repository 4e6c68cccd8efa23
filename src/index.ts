export { ConnectionGate } from './connection-gate.js';
export {
  type DispatchOptions,
  type DispatchResult,
  normalizeStatus,
  ResponseDispatcher,
} from './dispatcher.js';
export {
  annotateError,
  type CallFrame,
  captureCallstack,
  combineErrors,
  formatCallstack,
  getErrorMessage,
  ReportableError,
  SerializationError,
  type Severity,
  severityForStatus,
} from './errors.js';
export {
  acceptsGzip,
  chooseEncoding,
  type EncodingDecision,
  hasGzipMagic,
  isCompressibleContentType,
} from './gzip.js';
export {
  HostnameCache,
  type HostnameResolver,
  reverseLookup,
} from './hostname-cache.js';
export {
  createApp,
  type HttpServerHandle,
  startHttpServer,
  type StartHttpServerOptions,
} from './http-server.js';
export {
  createStructuredLogEntry,
  type LogEntry,
  type LogEntryFactory,
  StructuredLogEntry,
} from './log-entry.js';
export {
  type MetricsSink,
  RequestMetrics,
  type RequestSample,
} from './metrics.js';
export { type LoggedServerOptions, OptionsError } from './options.js';
export {
  bytesBody,
  type HandlerResponse,
  header,
  type Header,
  jsonBody,
  type JsonSerializer,
  type ResponseBody,
  serializeJson,
  textBody,
} from './response.js';
export {
  type LoggedHandler,
  LoggedServer,
  type RequestListener,
  type ShutdownOutcome,
  type ShutdownResult,
} from './server.js';
