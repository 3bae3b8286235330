import { describe, it, expect } from "vitest";
import { ok, err } from "./result.js";
import type { Result } from "./result.js";

describe("Result type", () => {
  it("ok() wraps a list of coverage URLs", () => {
    const result = ok(["https://tfs.example.test/a.coverage"]);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toEqual(["https://tfs.example.test/a.coverage"]);
    }
  });

  it("err() carries a structured failure", () => {
    const result: Result<string[], { message: string }> = err({
      message: "build server unreachable",
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("build server unreachable");
    }
  });
});
