/**
 * Provider Defaults
 *
 * Endpoints and naming conventions for Feishu, plus the per-variant profile
 * field maps.
 */

/**
 * How the client identifier and secret are named on the wire.
 * "app" sends app_id/app_secret, "client" sends client_id/client_secret.
 */
export type ParamStyle = "app" | "client";

/**
 * Token request body encoding.
 */
export type TokenRequestEncoding = "json" | "form";

/**
 * Source of the user profile.
 */
export type UserInfoVariant = "direct" | "miniapp";

/**
 * Provider endpoint configuration.
 */
export interface ProviderConfig {
  /** Authorization endpoint URL (browser redirect target) */
  authorizationEndpoint: string;
  /** Token endpoint URL */
  tokenEndpoint: string;
  /** User-info endpoint URL (direct variant) */
  userInfoEndpoint: string;
  paramStyle: ParamStyle;
  tokenRequestEncoding: TokenRequestEncoding;
  /** Delimiter joining granted scopes in the token response */
  scopeDelimiter: string;
}

/**
 * Profile keys read for each normalized field.
 */
export interface ProfileFieldMap {
  nickname?: string;
  name?: string;
  image?: string;
  email?: string;
}

export const FeishuProvider: ProviderConfig = {
  authorizationEndpoint: "https://open.feishu.cn/connect/qrconnect/page/sso",
  tokenEndpoint: "https://open.feishu.cn/connect/qrconnect/oauth2/access_token/",
  userInfoEndpoint: "https://open.feishu.cn/open-apis/authen/v1/user_info",
  paramStyle: "app",
  tokenRequestEncoding: "json",
  scopeDelimiter: ",",
};

export const PROFILE_FIELD_MAPS: Readonly<Record<UserInfoVariant, Readonly<ProfileFieldMap>>> = {
  direct: { nickname: "name", name: "name", image: "avatar_url", email: "email" },
  miniapp: { nickname: "nickName", image: "avatarUrl" },
};

export const DEFAULT_UID_FIELDS: Readonly<Record<UserInfoVariant, string>> = {
  direct: "open_id",
  miniapp: "openId",
};
