import { describe, it, expect } from "vitest";
import * as path from "node:path";
import { runLayout } from "../src/layout.js";

describe("runLayout", () => {
  const cwd = path.resolve("/work/project");
  const tmp = path.resolve("/tmp");

  it("keeps workspaces out of the checkout by default", () => {
    const layout = runLayout({}, ".gitlab-ci.yml", "1700000000000", cwd, tmp);
    expect(layout).toEqual({
      logsRoot: path.join(cwd, ".conveyor-runs", "1700000000000"),
      workRoot: path.join(tmp, "conveyor-1700000000000", "builds"),
      sourceDir: cwd,
      sourceExclude: [path.join(cwd, ".conveyor-runs"), path.join(cwd, ".conveyor-runs", "1700000000000")],
    });
    expect(path.relative(layout.sourceDir, layout.workRoot).startsWith("..")).toBe(true);
  });

  it("resolves --logs-dir and --workdir against the current directory", () => {
    const layout = runLayout({ logsDir: "out/logs", workdir: "app" }, "ci/pipeline.yml", "42", cwd, tmp);
    expect(layout.logsRoot).toBe(path.join(cwd, "out", "logs"));
    expect(layout.sourceDir).toBe(path.join(cwd, "app"));
    expect(layout.sourceExclude).toEqual([path.join(cwd, ".conveyor-runs"), path.join(cwd, "out", "logs")]);
  });

  it("copies the directory holding the pipeline file without --workdir", () => {
    expect(runLayout({}, "ci/pipeline.yml", "42", cwd, tmp).sourceDir).toBe(path.join(cwd, "ci"));
  });
});
