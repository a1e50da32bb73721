/**
 * Gateway Module - Public exports
 */

export {
  ChatGatewayServer,
  type ChatGatewayDependencies,
  type ChatFailureBody,
  type ChatGatewayOptions,
  type ChatRequestBody,
  type ChatResponseBody,
  type HealthReport,
  type ServiceStatus,
} from './http-server.js';

export {
  ErrorCodes,
  ErrorMessages,
  GatewayError,
  isGatewayError,
  statusForErrorKind,
  type ErrorBody,
  type ErrorCode,
} from './errors.js';

export { SSE_HEADERS, formatSseEvent } from './sse.js';
