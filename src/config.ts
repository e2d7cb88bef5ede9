import { z } from "zod";
import { DEFAULT_BASE_URL } from "./types.js";

const flag = z
  .enum(["true", "false", "1", "0"])
  .optional()
  .transform((v) => v === "true" || v === "1");

const envSchema = z.object({
  VIRGOCX_API_KEY: z.string().optional(),
  VIRGOCX_API_SECRET: z.string().optional(),
  VIRGOCX_API_URL: z.string().url().default(DEFAULT_BASE_URL),
  VIRGOCX_VERIFY_TLS: flag,
  VIRGOCX_AUTO_CONVERT: flag,
  LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).default("info"),
});

export interface ServerConfig {
  apiKey?: string;
  apiSecret?: string;
  baseUrl: string;
  verifyTls: boolean;
  autoConvert: boolean;
  logLevel: string;
}

/** Reads the server settings from the environment (after dotenv has populated it). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }
  const e = parsed.data;
  return {
    apiKey: e.VIRGOCX_API_KEY || undefined,
    apiSecret: e.VIRGOCX_API_SECRET || undefined,
    baseUrl: e.VIRGOCX_API_URL,
    verifyTls: e.VIRGOCX_VERIFY_TLS,
    autoConvert: e.VIRGOCX_AUTO_CONVERT,
    logLevel: e.LOG_LEVEL,
  };
}
