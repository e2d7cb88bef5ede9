import { z } from "zod";
import { keyMapping, type EnumParser, type MappingVariant } from "./enums.js";
import { VirgoCXApiError, VirgoCXDecodeError, VirgoCXStatusError } from "./errors.js";
import type { ApiObject, ApiValue, RawResponse } from "./types.js";

const envelopeSchema = z.object({
  code: z.number().int(),
  msg: z.string().optional(),
  data: z.unknown(),
});

/**
 * Replaces enum-coded fields with their decoded values.
 *
 * Arrays are mapped element-wise; in an object only the keys known to the
 * mapping are converted, other values are left as they are.
 */
export function outputEnumify(node: unknown, mapping: ReadonlyMap<string, EnumParser>): ApiValue {
  if (Array.isArray(node)) {
    return node.map((item) => outputEnumify(item, mapping));
  }
  if (node !== null && typeof node === "object") {
    const out: ApiObject = {};
    for (const [key, value] of Object.entries(node)) {
      const parse = mapping.get(key);
      if (parse) {
        const parsed = parse(value);
        if (!parsed.ok) throw new VirgoCXDecodeError(parsed.reason, key);
        out[key] = parsed.value;
      } else {
        out[key] = toApiValue(value);
      }
    }
    return out;
  }
  return toApiValue(node);
}

function toApiValue(value: unknown): ApiValue {
  if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) return value.map(toApiValue);
  if (typeof value === "object") {
    const out: ApiObject = {};
    for (const [key, item] of Object.entries(value)) out[key] = toApiValue(item);
    return out;
  }
  throw new VirgoCXDecodeError(`Unexpected ${typeof value} in response`);
}

/** Validates the transport status and the envelope, then decodes `data`. */
export function formatResult(raw: RawResponse, variant: MappingVariant = "typical"): ApiValue {
  if (raw.status !== 200) {
    throw new VirgoCXStatusError(raw.status, raw.body);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw.body);
  } catch {
    throw new VirgoCXDecodeError(`Response body is not JSON: ${raw.body}`);
  }

  const envelope = envelopeSchema.safeParse(json);
  if (!envelope.success) {
    throw new VirgoCXDecodeError(`Response body is not an API envelope: ${raw.body}`);
  }
  if (envelope.data.code !== 0) {
    throw new VirgoCXApiError(envelope.data.code, envelope.data.msg, raw.body);
  }

  return outputEnumify(envelope.data.data ?? null, keyMapping(variant));
}

/**
 * Wraps a request function so its response goes through formatResult.
 *
 *   const getTrades = resultFormatter("atypical")((symbol: string) => transport.get(...));
 */
export function resultFormatter(variant: MappingVariant = "typical") {
  return <A extends unknown[]>(send: (...args: A) => Promise<RawResponse>) =>
    async (...args: A): Promise<ApiValue> => formatResult(await send(...args), variant);
}
