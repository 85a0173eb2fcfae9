/**
 * Strategy Configuration
 *
 * Validation and defaults for the strategy configuration.
 *
 * @module config/schema
 */

import { z } from "zod";
import { ConfigurationError } from "../error";
import { SecretString } from "../types/token";
import type { Result } from "../types/result";
import {
  DEFAULT_UID_FIELDS,
  FeishuProvider,
  PROFILE_FIELD_MAPS,
  ProfileFieldMap,
  ProviderConfig,
  UserInfoVariant,
} from "../client/providers";

/** Default requested scope. */
export const DEFAULT_SCOPE = "snsapi_userinfo";

/** Default request timeout in milliseconds. */
export const DEFAULT_TIMEOUT = 30000;

/** Default provider name reported in results and logs. */
export const DEFAULT_PROVIDER_NAME = "feishu";

const providerSchema = z.object({
  authorizationEndpoint: z.string().url().default(FeishuProvider.authorizationEndpoint),
  tokenEndpoint: z.string().url().default(FeishuProvider.tokenEndpoint),
  userInfoEndpoint: z.string().url().default(FeishuProvider.userInfoEndpoint),
  paramStyle: z.enum(["app", "client"]).default(FeishuProvider.paramStyle),
  tokenRequestEncoding: z.enum(["json", "form"]).default(FeishuProvider.tokenRequestEncoding),
  scopeDelimiter: z.string().min(1).default(FeishuProvider.scopeDelimiter),
});

const profileFieldsSchema = z.object({
  nickname: z.string().min(1).optional(),
  name: z.string().min(1).optional(),
  image: z.string().min(1).optional(),
  email: z.string().min(1).optional(),
});

/**
 * Zod schema for strategy configuration.
 */
export const strategyConfigSchema = z.object({
  clientId: z.string().min(1, "clientId is required"),
  clientSecret: z.string().min(1, "clientSecret is required"),
  providerName: z.string().min(1).default(DEFAULT_PROVIDER_NAME),
  defaultScope: z.string().default(DEFAULT_SCOPE),
  sendRedirectUri: z.boolean().default(true),
  userInfoVariant: z.enum(["direct", "miniapp"]).default("miniapp"),
  uidField: z.string().min(1).optional(),
  profileFields: profileFieldsSchema.default({}),
  provider: providerSchema.default({}),
  timeout: z.number().int().positive().default(DEFAULT_TIMEOUT),
});

/**
 * Configuration accepted from the host. Omitted fields take their defaults.
 */
export type StrategyConfigInput = z.input<typeof strategyConfigSchema>;

/**
 * Validated strategy configuration.
 */
export interface StrategyConfig {
  readonly clientId: string;
  readonly clientSecret: SecretString;
  readonly providerName: string;
  readonly defaultScope: string;
  readonly sendRedirectUri: boolean;
  readonly userInfoVariant: UserInfoVariant;
  /** Profile key holding the provider-unique user id */
  readonly uidField: string;
  readonly profileFields: Readonly<ProfileFieldMap>;
  readonly provider: Readonly<ProviderConfig>;
  readonly timeout: number;
}

const REQUIRED_FIELDS = new Set<string | number>(["clientId", "clientSecret"]);

/**
 * Validate configuration and apply defaults.
 */
export function validateConfig(input: unknown): Result<StrategyConfig, ConfigurationError> {
  const parsed = strategyConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    const missing = parsed.error.issues.some(
      (issue) => issue.path.length === 1 && REQUIRED_FIELDS.has(issue.path[0] ?? "")
    );
    return {
      ok: false,
      error: new ConfigurationError(
        `Invalid strategy configuration: ${issues.join("; ")}`,
        missing ? "MissingRequired" : "InvalidConfig",
        issues
      ),
    };
  }

  const data = parsed.data;
  return {
    ok: true,
    value: Object.freeze({
      clientId: data.clientId,
      clientSecret: new SecretString(data.clientSecret),
      providerName: data.providerName,
      defaultScope: data.defaultScope,
      sendRedirectUri: data.sendRedirectUri,
      userInfoVariant: data.userInfoVariant,
      uidField: data.uidField ?? DEFAULT_UID_FIELDS[data.userInfoVariant],
      profileFields: Object.freeze({
        ...PROFILE_FIELD_MAPS[data.userInfoVariant],
        ...stripUndefined(data.profileFields),
      }),
      provider: Object.freeze({ ...data.provider }),
      timeout: data.timeout,
    }),
  };
}

function stripUndefined(fields: ProfileFieldMap): ProfileFieldMap {
  const result: ProfileFieldMap = {};
  if (fields.nickname !== undefined) result.nickname = fields.nickname;
  if (fields.name !== undefined) result.name = fields.name;
  if (fields.image !== undefined) result.image = fields.image;
  if (fields.email !== undefined) result.email = fields.email;
  return result;
}

