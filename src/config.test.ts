import { describe, it, expect } from "vitest";
import { DEFAULT_SOLVE_CONFIG, readEnvConfig, resolveSolveConfig } from "./config";
import { InvalidInputError } from "./problem/errors";

describe("resolveSolveConfig", () => {
  it("falls back to the defaults", () => {
    expect(resolveSolveConfig({}, {})).toEqual(DEFAULT_SOLVE_CONFIG);
  });

  it("reads COMMUNITY_* variables", () => {
    const env = {
      COMMUNITY_TIME_LIMIT_MS: "500",
      COMMUNITY_MAX_CUT_ROUNDS: "7",
      COMMUNITY_CONNECTIVITY: "cuts",
      COMMUNITY_LOG_LEVEL: "debug",
    };
    expect(resolveSolveConfig({}, env)).toEqual({
      timeLimitMs: 500,
      maxCutRounds: 7,
      connectivity: "cuts",
      logLevel: "debug",
    });
  });

  it("prefers explicit options over the environment", () => {
    const env = { COMMUNITY_TIME_LIMIT_MS: "500", COMMUNITY_CONNECTIVITY: "cuts" };
    expect(resolveSolveConfig({ timeLimitMs: 100, connectivity: "flow" }, env)).toMatchObject({
      timeLimitMs: 100,
      connectivity: "flow",
    });
  });

  it("ignores empty variables", () => {
    expect(resolveSolveConfig({}, { COMMUNITY_CONNECTIVITY: "" }).connectivity).toBeUndefined();
  });

  it("rejects invalid values", () => {
    expect(() => resolveSolveConfig({}, { COMMUNITY_CONNECTIVITY: "bfs" })).toThrow(InvalidInputError);
    expect(() => resolveSolveConfig({ maxCutRounds: -1 }, {})).toThrow(InvalidInputError);
  });
});

describe("readEnvConfig", () => {
  it("only looks at COMMUNITY_* keys", () => {
    expect(readEnvConfig({ PATH: "/bin", COMMUNITY_LOG_LEVEL: "warn" })).toEqual({
      COMMUNITY_LOG_LEVEL: "warn",
    });
  });
});
