import { describe, it, expect } from "vitest";
import { concurrencyLimits, contextOptions, parseArgs, UsageError } from "../src/args.js";

describe("parseArgs", () => {
  it("shows help without a command", () => {
    expect(parseArgs([]).command).toBe("help");
    expect(parseArgs(["-h"]).command).toBe("help");
    expect(parseArgs(["run", "ci.yml", "--help"]).command).toBe("help");
  });

  it("parses a run with every option", () => {
    const opts = parseArgs([
      "run",
      "ci.yml",
      "--source",
      "schedule",
      "--ref",
      "develop",
      "--var",
      "DEPLOY=yes",
      "--var",
      "URL=http://x?a=b",
      "--play",
      "deploy",
      "--limit",
      "docker=2",
      "--max-jobs",
      "4",
      "--logs-dir",
      "out",
      "--cache-dir",
      "cache",
      "--workdir",
      "src",
      "--simulate",
      "--verbose",
      "--from-env",
    ]);
    expect(opts).toEqual({
      command: "run",
      file: "ci.yml",
      source: "schedule",
      ref: "develop",
      variables: { DEPLOY: "yes", URL: "http://x?a=b" },
      fromEnv: true,
      simulate: true,
      play: ["deploy"],
      tagLimits: { docker: 2 },
      maxJobs: 4,
      logsDir: "out",
      cacheDir: "cache",
      workdir: "src",
      verbose: true,
    });
  });

  it("accepts the file after options", () => {
    expect(parseArgs(["plan", "--ref", "main", "ci.yml"]).file).toBe("ci.yml");
  });

  it("rejects bad input", () => {
    expect(() => parseArgs(["deploy", "ci.yml"])).toThrow(new UsageError("Unknown command: deploy"));
    expect(() => parseArgs(["run"])).toThrow("No pipeline file specified");
    expect(() => parseArgs(["run", "a.yml", "b.yml"])).toThrow("Unexpected argument: b.yml");
    expect(() => parseArgs(["run", "ci.yml", "--var", "NOVALUE"])).toThrow(
      "--var requires KEY=VALUE, got: NOVALUE",
    );
    expect(() => parseArgs(["run", "ci.yml", "--max-jobs", "0"])).toThrow(
      "--max-jobs requires a positive integer, got: 0",
    );
    expect(() => parseArgs(["run", "ci.yml", "--ref"])).toThrow("--ref requires a value");
    expect(() => parseArgs(["run", "ci.yml", "--dry-run"])).toThrow("Unknown option: --dry-run");
  });
});

describe("contextOptions", () => {
  it("defaults to a push to main", () => {
    expect(contextOptions(parseArgs(["plan", "ci.yml"]))).toEqual({
      source: "push",
      refName: "main",
      tag: undefined,
      sha: undefined,
      defaultBranch: undefined,
      variables: {},
    });
  });

  it("ignores the environment without --from-env", () => {
    const opts = parseArgs(["plan", "ci.yml"]);
    expect(contextOptions(opts, { CI_PIPELINE_SOURCE: "schedule" }).source).toBe("push");
  });

  it("fills unset values from CI_* variables with --from-env", () => {
    const opts = parseArgs(["plan", "ci.yml", "--from-env", "--ref", "feature"]);
    const ctx = contextOptions(opts, {
      CI_PIPELINE_SOURCE: "web",
      CI_COMMIT_BRANCH: "ignored",
      CI_COMMIT_SHA: "abc123",
    });
    expect(ctx.source).toBe("web");
    expect(ctx.refName).toBe("feature");
    expect(ctx.sha).toBe("abc123");
  });

  it("falls back to CI_COMMIT_REF_NAME for tag pipelines", () => {
    const opts = parseArgs(["plan", "ci.yml", "--from-env"]);
    const ctx = contextOptions(opts, { CI_COMMIT_REF_NAME: "v1.0.0", CI_COMMIT_TAG: "v1.0.0" });
    expect(ctx.refName).toBe("v1.0.0");
    expect(ctx.tag).toBe("v1.0.0");
  });

  it("uses the tag as the ref of a tag pipeline", () => {
    const ctx = contextOptions(parseArgs(["plan", "ci.yml", "--tag", "v2.0.0"]));
    expect(ctx.refName).toBe("v2.0.0");
    expect(ctx.tag).toBe("v2.0.0");
  });

  it("rejects an unknown source", () => {
    expect(() => contextOptions(parseArgs(["plan", "ci.yml", "--source", "cron"]))).toThrow(
      "Unknown pipeline source: cron",
    );
  });
});

describe("concurrencyLimits", () => {
  it("omits tag limits when none are given", () => {
    expect(concurrencyLimits(parseArgs(["run", "ci.yml"]))).toEqual({ maxJobs: undefined, tags: undefined });
  });

  it("collects tag limits", () => {
    const opts = parseArgs(["run", "ci.yml", "--limit", "gpu=1", "--limit", "docker=3"]);
    expect(concurrencyLimits(opts)).toEqual({ maxJobs: undefined, tags: { gpu: 1, docker: 3 } });
  });
});
