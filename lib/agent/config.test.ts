import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "./config";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      GEMINI_API_KEY: "",
      GEMINI_MODEL: "gemini-2.5-flash",
      DEFAULT_PAPER_LIMIT: 3,
      PRIMARY_MIN_INTERVAL_MS: 1100,
      DOWNLOAD_DIR: join(tmpdir(), "literature-review"),
      REPORT_DIR: "reports",
      PORT: 8000,
      RUN_TTL_MINUTES: 120,
    });
  });

  it("coerces numbers and treats blank values as unset", () => {
    const config = loadConfig({ PORT: "9000", DOWNLOAD_DELAY_MS: "", GEMINI_API_KEY: "test-secret" });

    expect(config.PORT).toBe(9000);
    expect(config.DOWNLOAD_DELAY_MS).toBe(500);
    expect(config.GEMINI_API_KEY).toBe("test-secret");
  });

  it("lists every invalid key in one error", () => {
    const load = () => loadConfig({ PORT: "abc", DEFAULT_PAPER_LIMIT: "0" });

    expect(load).toThrow(ConfigError);
    expect(load).toThrow(/^Invalid environment configuration:\n {2}- DEFAULT_PAPER_LIMIT: .*\n {2}- PORT: /);
  });
});
