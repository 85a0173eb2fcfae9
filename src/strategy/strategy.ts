/**
 * Feishu Strategy
 *
 * Drives one authentication attempt from the request phase through the
 * callback to the normalized result.
 */

import { FeishuOAuthClient, OAuthClient } from "../client";
import { StrategyConfig, StrategyConfigInput, validateConfig } from "../config";
import { FetchHttpTransport, HttpTransport } from "../core/transport";
import {
  AuthError,
  ConfigurationError,
  MissingCodeError,
  ProviderError,
  SignatureMismatchError,
  StateError,
  providerErrorFromParams,
  toAuthError,
} from "../error";
import { Logger, noOpLogger } from "../telemetry";
import type { CallbackParams } from "../types/callback";
import type {
  AuthResult,
  Credentials,
  Extra,
  Info,
  ProfileMapping,
  Result,
} from "../types/result";
import { Token, hasAccessToken } from "../types/token";
import { AuthAttempt } from "./attempt";
import { ResultNormalizer, splitScopes } from "./normalizer";
import { UserInfoSource, createUserInfoSource } from "./user-info";

/**
 * Callback code that skips the exchange entirely.
 */
export const TEST_CODE = "test_code";

/**
 * Request phase input.
 */
export interface RequestPhaseInput {
  /** Absolute callback URL of the host */
  callbackUrl: string;
  /** Scope override; falls back to the configured default */
  scope?: string;
  /** Opaque value the provider echoes back */
  state?: string;
}

/**
 * Request phase output. The host redirects the browser to `redirectUrl`.
 */
export interface RequestPhaseResult {
  attempt: AuthAttempt;
  redirectUrl: string;
}

/**
 * Collaborators injected by the host. Omitted ones get defaults.
 */
export interface StrategyDeps {
  transport?: HttpTransport;
  logger?: Logger;
  client?: OAuthClient;
  userInfo?: UserInfoSource;
}

/**
 * Authentication strategy. Immutable after construction, so one instance can
 * serve concurrent attempts.
 */
export class FeishuStrategy {
  readonly config: StrategyConfig;
  private client: OAuthClient;
  private userInfo: UserInfoSource;
  private normalizer: ResultNormalizer;
  private logger: Logger;

  constructor(config: StrategyConfig, deps: StrategyDeps = {}) {
    this.config = config;
    this.logger = (deps.logger ?? noOpLogger).child({
      provider: config.providerName,
      variant: config.userInfoVariant,
    });
    this.client =
      deps.client ??
      new FeishuOAuthClient(
        config,
        deps.transport ?? new FetchHttpTransport({ timeout: config.timeout }),
        this.logger
      );
    this.userInfo = deps.userInfo ?? createUserInfoSource(config, this.client, this.logger);
    this.normalizer = new ResultNormalizer(config.profileFields, config.provider.scopeDelimiter);
  }

  get name(): string {
    return this.config.providerName;
  }

  handleRequest(input: RequestPhaseInput): RequestPhaseResult {
    const scope = input.scope || this.config.defaultScope;
    const redirectUri = this.config.sendRedirectUri ? input.callbackUrl : undefined;

    const attempt = new AuthAttempt();
    attempt.issue({
      scopes: splitScopes(scope, this.config.provider.scopeDelimiter),
      stateParam: input.state,
      redirectUri,
    });

    const redirectUrl = this.client.buildAuthorizationUrl({
      scope,
      redirectUri,
      state: input.state,
    });

    this.logger.info("request.redirect", {
      scope,
      sendRedirectUri: this.config.sendRedirectUri,
      hasState: input.state !== undefined,
    });
    return { attempt, redirectUrl };
  }

  /**
   * Handle the provider callback. Failures are recorded on the attempt;
   * only a lifecycle misuse throws.
   */
  async handleCallback(
    params: CallbackParams,
    attempt: AuthAttempt = AuthAttempt.resume()
  ): Promise<AuthAttempt> {
    attempt.receiveCallback();

    if (params.code === TEST_CODE) {
      attempt.markTestBypass();
      this.logger.info("callback.test_bypass");
      return attempt;
    }

    if (!params.code) {
      this.fail(
        attempt,
        params.error
          ? new ProviderError(params.error, params.errorDescription)
          : new MissingCodeError("No code received")
      );
      return attempt;
    }

    const started = Date.now();
    try {
      const token = await this.client.exchangeCode(params.code);
      if (!hasAccessToken(token)) {
        this.fail(attempt, providerErrorFromParams(token.extra));
        return attempt;
      }
      attempt.setToken(token);
      this.logger.info("token.exchanged", {
        tokenType: token.tokenType,
        hasRefreshToken: token.refreshToken !== undefined,
      });

      const profile = await this.userInfo.fetch(token, params);
      attempt.authenticate(profile);
      this.logger.info("userinfo.fetched", { durationMs: Date.now() - started });
    } catch (error) {
      if (error instanceof StateError) {
        throw error;
      }
      this.fail(attempt, toAuthError(error), Date.now() - started);
    }
    return attempt;
  }

  /**
   * Discard the token and profile held by the attempt. Idempotent.
   */
  handleCleanup(attempt: AuthAttempt): AuthAttempt {
    attempt.cleanup();
    return attempt;
  }

  /**
   * Provider-unique user id, read from the configured uid field.
   */
  uid(attempt: AuthAttempt): string | null {
    const value = this.requireProfile(attempt)[this.config.uidField];
    if (typeof value === "string") {
      return value;
    }
    return typeof value === "number" ? String(value) : null;
  }

  credentials(attempt: AuthAttempt): Credentials {
    return this.normalizer.credentials(this.requireToken(attempt));
  }

  info(attempt: AuthAttempt): Info {
    return this.normalizer.info(this.requireProfile(attempt));
  }

  extra(attempt: AuthAttempt): Extra {
    return {
      rawInfo: this.normalizer.rawInfo(this.requireToken(attempt), this.requireProfile(attempt)),
    };
  }

  result(attempt: AuthAttempt): AuthResult {
    return {
      provider: this.config.providerName,
      uid: this.uid(attempt),
      credentials: this.credentials(attempt),
      info: this.info(attempt),
      extra: this.extra(attempt),
    };
  }

  private fail(attempt: AuthAttempt, error: AuthError, durationMs?: number): void {
    attempt.fail(error);

    const context = { errorCode: error.code, errorType: error.name, durationMs };
    if (error instanceof MissingCodeError) {
      this.logger.info("callback.missing_code", context);
    } else if (error instanceof ProviderError) {
      this.logger.warn("callback.provider_error", context);
    } else if (error instanceof SignatureMismatchError) {
      this.logger.warn("payload.signature_mismatch", context);
    } else {
      this.logger.error("callback.failed", context);
    }
  }

  private requireToken(attempt: AuthAttempt): Token {
    const token = attempt.token;
    if (attempt.state !== "authenticated" || !token) {
      throw new StateError(`Attempt holds no token (state: ${attempt.state})`);
    }
    return token;
  }

  private requireProfile(attempt: AuthAttempt): ProfileMapping {
    const profile = attempt.profile;
    if (attempt.state !== "authenticated" || !profile) {
      throw new StateError(`Attempt holds no profile (state: ${attempt.state})`);
    }
    return profile;
  }
}

/**
 * Validate configuration and build a strategy.
 */
export function createStrategy(
  input: StrategyConfigInput,
  deps: StrategyDeps = {}
): Result<FeishuStrategy, ConfigurationError> {
  const config = validateConfig(input);
  if (!config.ok) {
    return config;
  }
  return { ok: true, value: new FeishuStrategy(config.value, deps) };
}
