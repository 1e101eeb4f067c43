// Core types
export type { Credential } from './pool/credential.js';
export type { CredentialStatus, CredentialHealth, PoolPolicy, CredentialPoolOptions } from './pool/pool.js';
export type { ProviderPoolSummary, PoolTrackerOptions } from './pool/tracker.js';
export type { CallContext, ProviderCall, ProviderOutcome } from './providers/provider.js';
export type { PromptPayload, PromptResponse } from './providers/http.js';
export type {
  AttemptOutcome,
  BatchJob,
  BatchResult,
  CallAttempt,
  CallFailed,
  CallFailure,
  CallRequest,
  CallResult,
  CallSuccess,
  FailedState,
  FailureReason,
  RequestDefaults,
  RequestOverrides,
  RequestState,
  TerminalState,
} from './scheduler/types.js';
export type { RequestObserver } from './scheduler/state.js';
export type { DispatchOptions, RequestExecutor } from './scheduler/dispatcher.js';
export type { BatchCoordinatorOptions, RunBatchOptions } from './scheduler/batch.js';
export type { CreateRequestOptions, DispatchBatchOptions } from './scheduler/service.js';
export type { AttemptSettlement, AttemptRun } from './scheduler/deadline.js';
export type { KeyrelayConfig, ProviderConfig, RotationStrategy } from './config/schema.js';
export type { ProviderErrorKind, KeyrelayErrorCode } from './errors.js';

// Classes
export { CredentialPool, DEFAULT_POOL_POLICY } from './pool/pool.js';
export { PoolTracker } from './pool/tracker.js';
export { ProviderRegistry, builtinProviderIds } from './providers/registry.js';
export { Dispatcher } from './scheduler/dispatcher.js';
export { FailoverRacer } from './scheduler/racer.js';
export { BatchCoordinator } from './scheduler/batch.js';
export { DispatchService } from './scheduler/service.js';
export { RequestLifecycle, TRANSITIONS, canTransition, isTerminalState } from './scheduler/state.js';

// Providers
export { GeminiProvider } from './providers/adapters/gemini.js';
export { OpenAIProvider } from './providers/adapters/openai.js';
export { providerFailure } from './providers/provider.js';
export { isPromptPayload, kindForStatus } from './providers/http.js';

// Dispatch helpers
export { createCallRequest } from './scheduler/types.js';
export { callWithDeadline, runAttempt } from './scheduler/deadline.js';
export { maskKey } from './pool/credential.js';

// Errors
export {
  KeyrelayError,
  PoolExhaustedError,
  BatchValidationError,
  ConfigError,
  InvalidTransitionError,
  UnknownProviderError,
  isRetryable,
  penalizesCredential,
} from './errors.js';

// Config
export { loadConfig, normalizeConfig, resetConfigCache, getGlobalConfigDir } from './config/config.js';
export { DEFAULT_CONFIG } from './config/defaults.js';
export { readEnvOverrides } from './config/env.js';

// Utils
export { generateRequestId } from './utils/id.js';
export { logger, createLogger, setLogLevel, getLogLevel } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
