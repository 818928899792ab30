// apps/cli/src/config/__tests__/loader.test.ts
import { describe, it, expect, vi, beforeEach } from "vitest";
import { join } from "path";

const mockGit = vi.hoisted(() => ({
  listConfig: vi.fn(),
}));

vi.mock("simple-git", () => ({
  simpleGit: vi.fn(() => mockGit),
  GitConfigScope: { global: "global" },
}));

import {
  buildConfig,
  expandHome,
  loadConfig,
  parseGitSettings,
  readGitSettings,
} from "../loader.js";
import { ConfigError } from "../../errors.js";

function configList(all: Record<string, string | string[]>) {
  return { all, files: ["/home/test/.gitconfig"], values: {} };
}

describe("Config Loader", () => {
  beforeEach(() => {
    mockGit.listConfig.mockReset();
  });

  describe("readGitSettings", () => {
    it("keeps only global.* keys, without the prefix", async () => {
      mockGit.listConfig.mockResolvedValue(
        configList({
          "user.name": "Test User",
          "global.basedir": "/srv/code",
          "global.ignore": "vendor",
        }),
      );

      expect(await readGitSettings()).toEqual({ basedir: "/srv/code", ignore: "vendor" });
      expect(mockGit.listConfig).toHaveBeenCalledWith("global");
    });

    it("takes the last value of a repeated key", async () => {
      mockGit.listConfig.mockResolvedValue(
        configList({ "global.default-cmd": ["list", "info"] }),
      );

      expect(await readGitSettings()).toEqual({ "default-cmd": "info" });
    });

    it("treats a missing global config file as no settings", async () => {
      mockGit.listConfig.mockRejectedValue(
        new Error("fatal: unable to read config file '/home/test/.gitconfig'"),
      );

      expect(await readGitSettings()).toEqual({});
    });

    it("raises ConfigError for other git failures", async () => {
      mockGit.listConfig.mockRejectedValue(new Error("spawn git ENOENT"));

      await expect(readGitSettings()).rejects.toThrow(
        "Could not read git configuration: spawn git ENOENT",
      );
    });
  });

  describe("parseGitSettings", () => {
    it("raises ConfigError naming the bad setting", () => {
      expect(() => parseGitSettings({ "follow-symlinks": "sometimes" })).toThrow(ConfigError);
      expect(() => parseGitSettings({ "follow-symlinks": "sometimes" })).toThrow(
        /follow-symlinks/,
      );
    });
  });

  describe("expandHome", () => {
    it("expands a leading tilde", () => {
      expect(expandHome("~", "/home/test")).toBe("/home/test");
      expect(expandHome("~/src", "/home/test")).toBe(join("/home/test", "src"));
      expect(expandHome("/srv/~x", "/home/test")).toBe("/srv/~x");
    });
  });

  describe("buildConfig", () => {
    it("uses the home directory and defaults when nothing is set", () => {
      const config = buildConfig({}, {}, "/home/test");

      expect(config).toEqual({
        scanRoot: "/home/test",
        followSymlinks: true,
        sameFilesystem: process.platform !== "win32",
        ignorePatterns: [],
        defaultCmd: "status",
        verbose: false,
        showUntracked: true,
      });
    });

    it("maps every stored setting", () => {
      const config = buildConfig(
        {
          basedir: "~/src",
          "follow-symlinks": false,
          "same-filesystem": false,
          ignore: ["vendor"],
          "default-cmd": "list",
          verbose: true,
          "show-untracked": false,
          "cache-file": "~/state/repos.txt",
          "ignore-file": "/srv/ignored.txt",
        },
        {},
        "/home/test",
      );

      expect(config).toEqual({
        scanRoot: join("/home/test", "src"),
        followSymlinks: false,
        sameFilesystem: false,
        ignorePatterns: ["vendor"],
        defaultCmd: "list",
        verbose: true,
        showUntracked: false,
        cacheFile: join("/home/test", "state", "repos.txt"),
        ignoreFile: "/srv/ignored.txt",
      });
    });

    it("lets command line flags override stored settings", () => {
      expect(buildConfig({ verbose: false }, { verbose: true }, "/h").verbose).toBe(true);
      expect(buildConfig({ "show-untracked": false }, { untracked: true }, "/h").showUntracked).toBe(
        true,
      );
      expect(buildConfig({ "show-untracked": true }, { nountracked: true }, "/h").showUntracked).toBe(
        false,
      );
    });
  });

  describe("loadConfig", () => {
    it("builds the configuration from git settings", async () => {
      mockGit.listConfig.mockResolvedValue(
        configList({ "global.basedir": "/srv/code", "global.default-cmd": "ahead" }),
      );

      const config = await loadConfig({ nountracked: true });

      expect(config.scanRoot).toBe("/srv/code");
      expect(config.defaultCmd).toBe("ahead");
      expect(config.showUntracked).toBe(false);
    });
  });
});
