/**
 * Environment configuration
 * Typed settings with defaults. Entry scripts load .env files before
 * calling getAppEnv().
 */

import path from "path";
import { z } from "zod";
import { ConfigError } from "../lib/errors";
import { DEFAULT_CONTEXT_WINDOW, MAX_CONTEXT_WINDOW } from "./chat";

const EnvSchema = z.object({
  TOPICS_CONFIG_PATH: z.string().min(1).default("config/topics.json"),
  CHAT_CONTEXT_WINDOW: z.coerce.number().int().min(1).max(MAX_CONTEXT_WINDOW).default(DEFAULT_CONTEXT_WINDOW),
  DEBUG: z.string().optional(),
});

export interface AppEnv {
  topicsConfigPath: string;
  contextWindow: number;
  debug: boolean;
}

/**
 * Resolve settings from the given environment (process.env by default)
 */
export function getAppEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  const result = EnvSchema.safeParse({
    TOPICS_CONFIG_PATH: source.TOPICS_CONFIG_PATH || undefined,
    CHAT_CONTEXT_WINDOW: source.CHAT_CONTEXT_WINDOW || undefined,
    DEBUG: source.DEBUG || undefined,
  });

  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid environment: ${details}`);
  }

  return {
    topicsConfigPath: path.resolve(process.cwd(), result.data.TOPICS_CONFIG_PATH),
    contextWindow: result.data.CHAT_CONTEXT_WINDOW,
    debug: Boolean(result.data.DEBUG),
  };
}
