import crypto from "node:crypto";
import { VirgoCXUsageError } from "./errors.js";
import type { Payload } from "./types.js";

export const SECRET_FIELD = "apiSecret";

/**
 * Signature for an authenticated request.
 *
 * The exchange recomputes this as md5 over the values concatenated in sorted
 * key order, with the secret included under `apiSecret`. A different ordering
 * yields a wrong signature and no specific error from the server.
 */
export function vcxSign(payload: Payload, apiSecret?: string): string {
  const signed: Payload = { ...payload };
  if (!(SECRET_FIELD in signed)) {
    if (apiSecret === undefined || apiSecret === "") {
      throw new VirgoCXUsageError("API secret is required", SECRET_FIELD);
    }
    signed[SECRET_FIELD] = apiSecret;
  }
  const message = Object.keys(signed)
    .sort()
    .map((key) => String(signed[key]))
    .join("");
  return crypto.createHash("md5").update(message).digest("hex");
}
