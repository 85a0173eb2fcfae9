/**
 * Feishu Auth
 *
 * Third-party identity authentication against Feishu: authorization
 * redirect, code exchange, profile retrieval and result normalization.
 *
 * @packageDocumentation
 */

// Types
export type {
  // Token types
  Token,

  // Callback types
  CallbackParams,

  // Result types
  ProfileMapping,
  Result,
  Credentials,
  Info,
  RawInfo,
  Extra,
  AuthResult,
} from "./types";
export {
  SecretString,
  hasAccessToken,
  createToken,
  parseCallbackParams,
  parseCallbackUrl,
} from "./types";

// Errors
export type { AttemptError, TransportErrorKind, ErrorResponse } from "./error";
export {
  AuthError,
  ConfigurationError,
  MissingCodeError,
  ProviderError,
  TransportError,
  DataInvalidError,
  DataCorruptedError,
  SignatureMismatchError,
  StateError,
  isAuthError,
  isTamperSignal,
  parseErrorResponse,
  createErrorFromResponse,
  toAttemptError,
  toAuthError,
} from "./error";

// Core
export type { HttpRequest, HttpResponse, HttpTransport } from "./core";
export {
  FetchHttpTransport,
  MockHttpTransport,
} from "./core";

// Telemetry
export type { LogLevel, AuthLogContext, Logger, LogEntry } from "./telemetry";
export {
  noOpLogger,
  InMemoryLogger,
  ConsoleLogger,
  REDACTED_KEYS,
  redactContext,
} from "./telemetry";

// Crypto
export type { DecryptionContext, SignedPayload } from "./crypto";
export {
  computeSignature,
  verifySignature,
  decryptPayload,
  openSignedPayload,
} from "./crypto";

// Client
export type {
  AuthorizationUrlParams,
  OAuthClient,
  ParamStyle,
  TokenRequestEncoding,
  UserInfoVariant,
  ProviderConfig,
  ProfileFieldMap,
} from "./client";
export { FeishuOAuthClient, FeishuProvider, PROFILE_FIELD_MAPS } from "./client";

// Config
export type { StrategyConfig, StrategyConfigInput } from "./config";
export {
  strategyConfigSchema,
  validateConfig,
  configFromEnv,
  DEFAULT_SCOPE,
  DEFAULT_TIMEOUT,
  DEFAULT_PROVIDER_NAME,
} from "./config";

// Strategy
export type {
  AttemptState,
  AttemptSnapshot,
  UserInfoSource,
  RequestPhaseInput,
  RequestPhaseResult,
  StrategyDeps,
} from "./strategy";
export {
  AuthAttempt,
  ResultNormalizer,
  splitScopes,
  DirectUserInfoSource,
  MiniappUserInfoSource,
  createUserInfoSource,
  FeishuStrategy,
  TEST_CODE,
  createStrategy,
} from "./strategy";
