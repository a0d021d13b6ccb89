import { describe, expect, test } from "vitest";
import { ConfigError, VERSION, loadRunConfig } from "../packages/core/src/index.js";

const BASE_ENV = {
  WIKI_API_URL: "https://wiki.test/w/api.php",
  WIKI_TARGET_LANG: "es",
  WIKI_BOT_USER: "Admin@langbot",
  WIKI_BOT_PASS: "test-secret",
};

describe("loadRunConfig", () => {
  test("reads the environment and applies defaults", () => {
    expect(loadRunConfig({}, BASE_ENV)).toEqual({
      apiUrl: "https://wiki.test/w/api.php",
      targetLanguage: "es",
      pagesFile: "pages.txt",
      username: "Admin@langbot",
      password: "test-secret",
      reason: undefined,
      userAgent: `Pagelang/${VERSION}`,
      timeoutMs: 30000,
      rateLimitWriteMs: 0,
    });
  });

  test("command-line values win over the environment", () => {
    const config = loadRunConfig(
      { apiUrl: "https://other.test/api.php", targetLanguage: "fr", pagesFile: "list.txt", reason: "cleanup" },
      { ...BASE_ENV, WIKI_PAGES_FILE: "env.txt", WIKI_LANG_REASON: "env reason" }
    );

    expect(config.apiUrl).toBe("https://other.test/api.php");
    expect(config.targetLanguage).toBe("fr");
    expect(config.pagesFile).toBe("list.txt");
    expect(config.reason).toBe("cleanup");
  });

  test("parses numeric settings", () => {
    const config = loadRunConfig({}, { ...BASE_ENV, WIKI_HTTP_TIMEOUT_MS: "5000", WIKI_RATE_LIMIT_WRITE: "250" });

    expect(config.timeoutMs).toBe(5000);
    expect(config.rateLimitWriteMs).toBe(250);
  });

  test("rejects a non-numeric setting", () => {
    expect(() => loadRunConfig({}, { ...BASE_ENV, WIKI_HTTP_TIMEOUT_MS: "soon" })).toThrow(
      'WIKI_HTTP_TIMEOUT_MS must be a non-negative integer, got "soon"'
    );
  });

  test("rejects a zero request timeout", () => {
    const load = () => loadRunConfig({}, { ...BASE_ENV, WIKI_HTTP_TIMEOUT_MS: "0" });

    expect(load).toThrow(ConfigError);
    expect(load).toThrow('WIKI_HTTP_TIMEOUT_MS must be greater than 0, got "0"');
  });

  test("accepts zero write spacing", () => {
    expect(loadRunConfig({}, { ...BASE_ENV, WIKI_RATE_LIMIT_WRITE: "0" }).rateLimitWriteMs).toBe(0);
  });

  test("requires the API URL and target language", () => {
    const { WIKI_API_URL: _url, ...noUrl } = BASE_ENV;
    expect(() => loadRunConfig({}, noUrl)).toThrow("WIKI_API_URL environment variable required (or pass --api-url)");

    const { WIKI_TARGET_LANG: _lang, ...noLang } = BASE_ENV;
    expect(() => loadRunConfig({}, noLang)).toThrow(ConfigError);
  });

  test("rejects an API URL that is not http(s)", () => {
    expect(() => loadRunConfig({ apiUrl: "not a url" }, BASE_ENV)).toThrow("WIKI_API_URL is not a valid URL: not a url");
    expect(() => loadRunConfig({ apiUrl: "ftp://wiki.test/api.php" }, BASE_ENV)).toThrow(
      "WIKI_API_URL must be an http(s) URL"
    );
  });

  test("requires credentials unless dry-running", () => {
    const env = { WIKI_API_URL: BASE_ENV.WIKI_API_URL, WIKI_TARGET_LANG: "es" };

    expect(() => loadRunConfig({}, env)).toThrow("WIKI_BOT_USER environment variable required");
    expect(loadRunConfig({ dryRun: true }, env).username).toBe("");
  });

  test("rejects the placeholder credentials", () => {
    let caught: unknown;
    try {
      loadRunConfig({}, { ...BASE_ENV, WIKI_BOT_PASS: "bot_password" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ variable: "WIKI_BOT_PASS" });
  });
});
