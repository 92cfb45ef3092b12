import { describe, expect, it } from "vitest";
import { readBaseUrl } from "./args";

describe("readBaseUrl", () => {
  it("prefers the --base-url= flag", () => {
    expect(readBaseUrl(["--base-url=http://api.test:8080/"], { EVAL_API_BASE_URL: "http://env.test" })).toBe(
      "http://api.test:8080"
    );
  });

  it("accepts the flag value as a separate argument", () => {
    expect(readBaseUrl(["--base-url", "http://api.test"], {})).toBe("http://api.test");
  });

  it("falls back to the environment, then localhost", () => {
    expect(readBaseUrl([], { EVAL_API_BASE_URL: "http://env.test/" })).toBe("http://env.test");
    expect(readBaseUrl([], {})).toBe("http://localhost:3001");
  });

  it("rejects a dangling flag", () => {
    expect(() => readBaseUrl(["--base-url"], {})).toThrow("Usage: npm run smoke -- --base-url=<http://host:port>");
  });
});
