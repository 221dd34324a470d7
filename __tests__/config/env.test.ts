/**
 * Tests for environment settings
 */

import path from "path";
import { describe, it, expect } from "vitest";
import { getAppEnv } from "../../src/config/env";
import { ConfigError } from "../../src/lib/errors";

describe("getAppEnv", () => {
  it("applies defaults", () => {
    expect(getAppEnv({})).toEqual({
      topicsConfigPath: path.resolve(process.cwd(), "config/topics.json"),
      contextWindow: 10,
      debug: false,
    });
  });

  it("reads overrides", () => {
    const env = getAppEnv({ TOPICS_CONFIG_PATH: "/etc/scout/topics.json", CHAT_CONTEXT_WINDOW: "25", DEBUG: "1" });

    expect(env.topicsConfigPath).toBe("/etc/scout/topics.json");
    expect(env.contextWindow).toBe(25);
    expect(env.debug).toBe(true);
  });

  it("treats empty values as unset", () => {
    expect(getAppEnv({ CHAT_CONTEXT_WINDOW: "" }).contextWindow).toBe(10);
  });

  it("rejects a context window above the maximum", () => {
    expect(() => getAppEnv({ CHAT_CONTEXT_WINDOW: "80" })).toThrow(ConfigError);
  });
});
