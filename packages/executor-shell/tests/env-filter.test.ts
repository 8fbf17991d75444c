import { describe, it, expect } from "vitest";
import { filterEnv, jobEnvironment } from "../src/env-filter.js";

describe("filterEnv", () => {
  const hostEnv: NodeJS.ProcessEnv = {
    PATH: "/usr/bin",
    HOME: "/home/builder",
    SHELL: "/bin/bash",
    LANG: "C.UTF-8",
    DEPLOY_TOKEN: "test-secret",
    REGISTRY_PASSWORD: "test-secret",
    AWS_SECRET_ACCESS_KEY: "test-secret",
    SIGNING_PRIVATE_KEY: "test-secret",
    CI_JOB_TOKEN: "test-secret",
    NODE_ENV: "development",
    BUILD_FLAVOR: "release",
  };

  describe("inherit_all policy", () => {
    it("passes non-sensitive variables through", () => {
      const result = filterEnv(hostEnv, "inherit_all");
      expect(result.PATH).toBe("/usr/bin");
      expect(result.NODE_ENV).toBe("development");
      expect(result.BUILD_FLAVOR).toBe("release");
    });

    it("drops sensitive names", () => {
      const result = filterEnv(hostEnv, "inherit_all");
      expect(result.DEPLOY_TOKEN).toBeUndefined();
      expect(result.REGISTRY_PASSWORD).toBeUndefined();
      expect(result.AWS_SECRET_ACCESS_KEY).toBeUndefined();
      expect(result.SIGNING_PRIVATE_KEY).toBeUndefined();
      expect(result.CI_JOB_TOKEN).toBeUndefined();
    });

    it("matches sensitive suffixes case-insensitively", () => {
      const result = filterEnv({ npm_auth_token: "test-secret", PATH: "/bin" }, "inherit_all");
      expect(result).toEqual({ PATH: "/bin" });
    });

    it("is the default policy", () => {
      expect(filterEnv(hostEnv)).toEqual(filterEnv(hostEnv, "inherit_all"));
    });
  });

  describe("inherit_core policy", () => {
    it("keeps only core shell variables", () => {
      const result = filterEnv(hostEnv, "inherit_core");
      expect(result).toEqual({
        PATH: "/usr/bin",
        HOME: "/home/builder",
        SHELL: "/bin/bash",
        LANG: "C.UTF-8",
      });
    });
  });

  describe("inherit_none policy", () => {
    it("keeps only PATH", () => {
      expect(filterEnv(hostEnv, "inherit_none")).toEqual({ PATH: "/usr/bin" });
    });

    it("is empty without PATH", () => {
      expect(filterEnv({ HOME: "/root" }, "inherit_none")).toEqual({});
    });
  });

  describe("include and exclude", () => {
    it("include lets a sensitive name through", () => {
      const result = filterEnv(hostEnv, "inherit_core", { include: new Set(["DEPLOY_TOKEN"]) });
      expect(result.DEPLOY_TOKEN).toBe("test-secret");
    });

    it("exclude wins over include and core", () => {
      const result = filterEnv(hostEnv, "inherit_all", {
        include: new Set(["HOME"]),
        exclude: new Set(["HOME"]),
      });
      expect(result.HOME).toBeUndefined();
    });
  });
});

describe("jobEnvironment", () => {
  it("puts job variables over host values", () => {
    const env = jobEnvironment({ PATH: "/usr/bin", NODE_ENV: "development" }, "inherit_all", {
      NODE_ENV: "test",
      CI_JOB_NAME: "unit",
    });
    expect(env).toEqual({ PATH: "/usr/bin", NODE_ENV: "test", CI_JOB_NAME: "unit" });
  });

  it("keeps sensitive job variables, which the pipeline declared itself", () => {
    const env = jobEnvironment({}, "inherit_none", { DEPLOY_TOKEN: "test-secret" });
    expect(env).toEqual({ DEPLOY_TOKEN: "test-secret" });
  });

  it("applies include and exclude options to host values", () => {
    const env = jobEnvironment(
      { PATH: "/usr/bin", NPM_TOKEN: "test-secret", EDITOR: "vi" },
      "inherit_all",
      { CI_JOB_NAME: "unit" },
      { include: new Set(["NPM_TOKEN"]), exclude: new Set(["EDITOR"]) },
    );
    expect(env).toEqual({ PATH: "/usr/bin", NPM_TOKEN: "test-secret", CI_JOB_NAME: "unit" });
  });
});
