/**
 * OAuth Client
 *
 * Authorization URL construction, code exchange and user-info retrieval
 * against the identity provider.
 */

import type { StrategyConfig } from "../config";
import { HttpRequest, HttpResponse, HttpTransport } from "../core/transport";
import { isRecord, parseJsonObject, stringField } from "../core/json";
import {
  DataInvalidError,
  MissingCodeError,
  ProviderError,
  TransportError,
  createErrorFromResponse,
  errorFromRecord,
  toAuthError,
} from "../error";
import { Logger, noOpLogger } from "../telemetry";
import { Token, createToken } from "../types/token";
import type { ProfileMapping } from "../types/result";

/**
 * Authorization URL parameters.
 */
export interface AuthorizationUrlParams {
  /** Requested scope string */
  scope: string;
  /** Callback URL; omitted when the provider has it pre-registered */
  redirectUri?: string;
  /** Opaque value echoed back on the callback */
  state?: string;
}

/**
 * OAuth client interface.
 */
export interface OAuthClient {
  /**
   * Build the authorization URL for the browser redirect. No network call.
   */
  buildAuthorizationUrl(params: AuthorizationUrlParams): string;

  /**
   * Exchange an authorization code for a token.
   */
  exchangeCode(code: string | undefined): Promise<Token>;

  /**
   * Fetch the user profile with a bearer token.
   */
  fetchUserInfo(token: Token, endpoint?: string): Promise<ProfileMapping>;
}

const STANDARD_TOKEN_FIELDS = [
  "access_token",
  "token_type",
  "expires_in",
  "expires_at",
  "refresh_token",
];

/**
 * OAuth client for Feishu-style providers.
 */
export class FeishuOAuthClient implements OAuthClient {
  private config: StrategyConfig;
  private transport: HttpTransport;
  private logger: Logger;

  constructor(config: StrategyConfig, transport: HttpTransport, logger: Logger = noOpLogger) {
    this.config = config;
    this.transport = transport;
    this.logger = logger;
  }

  buildAuthorizationUrl(params: AuthorizationUrlParams): string {
    const url = new URL(this.config.provider.authorizationEndpoint);

    url.searchParams.set("response_type", "code");
    url.searchParams.set("client_id", this.config.clientId);
    if (this.config.provider.paramStyle === "app") {
      url.searchParams.set("app_id", this.config.clientId);
    }
    if (params.redirectUri !== undefined) {
      url.searchParams.set("redirect_uri", params.redirectUri);
    }
    url.searchParams.set("scope", params.scope);
    if (params.state !== undefined) {
      url.searchParams.set("state", params.state);
    }

    return url.toString();
  }

  async exchangeCode(code: string | undefined): Promise<Token> {
    if (!code) {
      throw new MissingCodeError();
    }

    const { provider } = this.config;
    const idKey = provider.paramStyle === "app" ? "app_id" : "client_id";
    const secretKey = provider.paramStyle === "app" ? "app_secret" : "client_secret";
    const params: Record<string, string> = {
      grant_type: "authorization_code",
      [idKey]: this.config.clientId,
      [secretKey]: this.config.clientSecret.expose(),
      code,
    };

    const json = provider.tokenRequestEncoding === "json";
    const response = await this.send({
      method: "POST",
      url: provider.tokenEndpoint,
      headers: {
        accept: "application/json",
        "content-type": json ? "application/json" : "application/x-www-form-urlencoded",
      },
      body: json ? JSON.stringify(params) : new URLSearchParams(params).toString(),
      timeout: this.config.timeout,
    });

    if (response.status < 200 || response.status >= 300) {
      throw createErrorFromResponse(response.status, response.body);
    }

    return this.parseTokenResponse(response);
  }

  async fetchUserInfo(token: Token, endpoint?: string): Promise<ProfileMapping> {
    const response = await this.send({
      method: "GET",
      url: endpoint ?? this.config.provider.userInfoEndpoint,
      headers: {
        authorization: `Bearer ${token.accessToken}`,
        "content-type": "application/json",
      },
      timeout: this.config.timeout,
    });

    const body = parseJsonObject(response.body);
    if (response.status < 200 || response.status >= 300) {
      if (!body) {
        throw new TransportError(
          `User info request failed with HTTP ${response.status}`,
          "HttpStatus",
          { status: response.status }
        );
      }
      throw new DataInvalidError(describeFailure(body, `HTTP ${response.status}`));
    }

    if (!body) {
      throw new DataInvalidError("user info response is not a JSON object");
    }
    if (typeof body.code === "number" && body.code !== 0) {
      throw new DataInvalidError(describeFailure(body, `provider code ${body.code}`));
    }
    if (!isRecord(body.data)) {
      throw new DataInvalidError("user info response has no data object");
    }

    this.logger.debug("userinfo.response", { status: response.status });
    return { ...token.extra, ...body.data };
  }

  private async send(request: HttpRequest): Promise<HttpResponse> {
    try {
      return await this.transport.send(request);
    } catch (error) {
      throw toAuthError(error);
    }
  }

  private parseTokenResponse(response: HttpResponse): Token {
    const data = parseJsonObject(response.body);
    if (!data) {
      throw new TransportError(
        `Token endpoint returned an unparseable body (HTTP ${response.status})`,
        "HttpStatus",
        { status: response.status }
      );
    }

    const providerError = errorFromRecord(data);
    if (providerError) {
      throw new ProviderError(providerError.error, providerError.error_description);
    }
    if (typeof data.code === "number" && data.code !== 0) {
      throw new ProviderError(String(data.code), describeFailure(data, `provider code ${data.code}`));
    }

    const extra = extractExtraFields(data);
    const accessToken = stringField(data, "access_token");

    // Session tokens carry the session key instead of an access token; the
    // encoded structure itself stands in for the access token.
    if (!accessToken && typeof data.session_key === "string") {
      return createToken({
        accessToken: response.body,
        tokenType: "session",
        expiresAt: expiresAt(data),
        extra,
      });
    }

    return createToken({
      accessToken: accessToken ?? "",
      refreshToken: stringField(data, "refresh_token"),
      expiresAt: expiresAt(data),
      tokenType: stringField(data, "token_type") ?? "Bearer",
      extra,
    });
  }
}

function extractExtraFields(data: Record<string, unknown>): Record<string, unknown> {
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (!STANDARD_TOKEN_FIELDS.includes(key)) {
      extra[key] = value;
    }
  }
  return extra;
}

function expiresAt(data: Record<string, unknown>): number | undefined {
  if (typeof data.expires_at === "number") {
    return data.expires_at;
  }
  if (typeof data.expires_in === "number") {
    return Math.floor(Date.now() / 1000) + data.expires_in;
  }
  return undefined;
}

function describeFailure(body: Record<string, unknown>, fallback: string): string {
  return (
    stringField(body, "msg") ??
    stringField(body, "message") ??
    stringField(body, "error_description") ??
    stringField(body, "error") ??
    fallback
  );
}
