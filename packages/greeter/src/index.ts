// Public surface of @porch/greeter
export {
  GreeterClient,
  type ConnectionState,
  type GreeterClientOptions,
  type GreeterEvent,
  type GreeterEventHandler,
} from "./client/greeter-client.js";
export {
  AuthStateMachine,
  IDLE_PHASE,
  isTerminalPhase,
  phaseUsername,
  transition,
  type AuthNotice,
  type AuthPhase,
  type AuthPhaseStatus,
  type AuthPrompt,
  type AuthSessionSnapshot,
  type FailureCause,
  type ProtocolViolation,
  type Transition,
} from "./client/auth-machine.js";
export {
  connectGreetd,
  createAbsentTransport,
  createStreamTransport,
  openGreetdTransport,
  type AbsentTransport,
  type ByteReader,
  type ByteWriter,
  type ConnectedTransport,
  type GreetdTransport,
} from "./client/greetd-transport.js";
export { RequestDispatcher } from "./client/request-dispatcher.js";
export { ResponseListener, type ListenerEvent } from "./client/response-listener.js";

export * from "./shared/messages.js";
export {
  FrameDecoder,
  createRequestDecoder,
  createResponseDecoder,
  decodeFrame,
  decodeFrames,
  decodeRequestFrame,
  encodeFrame,
  encodeRequest,
  encodeResponse,
  type FrameDecoderOptions,
} from "./shared/frame-codec.js";
export {
  ConnectionError,
  InvalidIntentError,
  LOGIN_SERVICE_UNREACHABLE,
  MalformedFrameError,
  ProtocolDecodeError,
  describeConnectionError,
  getErrorMessage,
  isWireError,
  type ConnectionErrorReason,
} from "./shared/errors.js";
export {
  GREETD_SOCKET_ENV,
  formatDaemonAddress,
  parseDaemonAddress,
  type GreetdAddress,
} from "./shared/daemon-endpoints.js";

export { loadConfig, type CliConfigOverrides, type GreeterConfig } from "./runtime/config.js";
export {
  createRootLogger,
  resolveLogConfig,
  type LogFormat,
  type LogLevel,
  type ResolvedLogConfig,
} from "./runtime/logger.js";
export {
  loadPersistedConfig,
  resolveConfigPath,
  type PersistedConfig,
} from "./runtime/persisted-config.js";
export {
  defaultSessionDirs,
  listDesktopSessions,
  sessionEnvironment,
  splitExec,
  type DesktopSession,
  type SessionType,
} from "./sessions/desktop-sessions.js";
