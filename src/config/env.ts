/**
 * Configuration from environment variables.
 */

import type { ConfigurationError } from "../error";
import type { Result } from "../types/result";
import { StrategyConfig, validateConfig } from "./schema";

/**
 * Read FEISHU_* variables and validate them.
 */
export function configFromEnv(
  env: Record<string, string | undefined> = process.env
): Result<StrategyConfig, ConfigurationError> {
  const input: Record<string, unknown> = {
    clientId: env.FEISHU_APP_ID,
    clientSecret: env.FEISHU_APP_SECRET,
  };

  if (env.FEISHU_DEFAULT_SCOPE !== undefined) {
    input.defaultScope = env.FEISHU_DEFAULT_SCOPE;
  }

  const sendRedirectUri = env.FEISHU_SEND_REDIRECT_URI;
  if (sendRedirectUri) {
    input.sendRedirectUri = !["false", "0", "no"].includes(sendRedirectUri.toLowerCase());
  }

  if (env.FEISHU_USER_INFO_VARIANT) {
    input.userInfoVariant = env.FEISHU_USER_INFO_VARIANT;
  }

  if (env.FEISHU_UID_FIELD) {
    input.uidField = env.FEISHU_UID_FIELD;
  }

  // Non-numeric values go through as strings so the schema rejects them.
  const timeout = env.FEISHU_TIMEOUT;
  if (timeout !== undefined) {
    input.timeout = /^\d+$/.test(timeout) ? Number(timeout) : timeout;
  }

  return validateConfig(input);
}
