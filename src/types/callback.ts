/**
 * Callback Types
 *
 * Parameters the host decodes from the provider redirect.
 */

/**
 * Callback parameters from the authorization redirect.
 */
export interface CallbackParams {
  /** Authorization code (on success) */
  code?: string;
  /** State echoed from the request phase */
  state?: string;
  /** Error code (on failure) */
  error?: string;
  /** Human-readable error description */
  errorDescription?: string;
  /** Signature over raw_data + session key (miniapp) */
  signature?: string;
  /** Raw user data the signature covers (miniapp) */
  rawData?: string;
  /** Base64 initialization vector (miniapp) */
  iv?: string;
  /** Base64 AES ciphertext (miniapp) */
  encryptedData?: string;
}

const PARAM_NAMES: ReadonlyArray<[keyof CallbackParams, string]> = [
  ["code", "code"],
  ["state", "state"],
  ["error", "error"],
  ["errorDescription", "error_description"],
  ["signature", "signature"],
  ["rawData", "raw_data"],
  ["iv", "iv"],
  ["encryptedData", "encrypted_data"],
];

/**
 * Build callback parameters from host-decoded query or form fields.
 *
 * Array values (repeated keys) use the first entry.
 */
export function parseCallbackParams(
  params: Record<string, string | string[] | undefined>
): CallbackParams {
  const result: CallbackParams = {};
  for (const [key, wireName] of PARAM_NAMES) {
    const raw = params[wireName];
    const value = Array.isArray(raw) ? raw[0] : raw;
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Parse callback parameters from URL.
 */
export function parseCallbackUrl(url: string): CallbackParams {
  const parsed = new URL(url);
  const params: Record<string, string> = {};
  parsed.searchParams.forEach((value, key) => {
    if (!(key in params)) {
      params[key] = value;
    }
  });
  return parseCallbackParams(params);
}
