import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import {
  findProjectRoot,
  findOrCreateProjectRoot,
  ensureNetrecallDir,
  getNetrecallPaths,
  resolveUserPath,
} from "./project.js";

describe("project utilities", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "netrecall-project-test-")));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("findProjectRoot", () => {
    it("returns undefined without a marker directory", () => {
      expect(findProjectRoot(tempDir)).toBeUndefined();
    });

    it("finds a .netrecall directory from a nested path", () => {
      fs.mkdirSync(path.join(tempDir, ".netrecall"));
      const nested = path.join(tempDir, "a", "b");
      fs.mkdirSync(nested, { recursive: true });
      expect(findProjectRoot(nested)).toBe(tempDir);
    });

    it("falls back to the nearest .git directory", () => {
      fs.mkdirSync(path.join(tempDir, ".git"));
      expect(findProjectRoot(tempDir)).toBe(tempDir);
    });

    it("prefers an outer .netrecall over an inner .git", () => {
      fs.mkdirSync(path.join(tempDir, ".netrecall"));
      const inner = path.join(tempDir, "repo");
      fs.mkdirSync(path.join(inner, ".git"), { recursive: true });
      expect(findProjectRoot(inner)).toBe(tempDir);
    });

    it("checks an override directly", () => {
      expect(findProjectRoot(undefined, tempDir)).toBeUndefined();
      fs.mkdirSync(path.join(tempDir, ".netrecall"));
      expect(findProjectRoot(undefined, tempDir)).toBe(tempDir);
    });
  });

  describe("findOrCreateProjectRoot", () => {
    it("returns an override as given", () => {
      expect(findOrCreateProjectRoot(undefined, tempDir)).toBe(tempDir);
    });
  });

  describe("resolveUserPath", () => {
    it("expands ~", () => {
      expect(resolveUserPath("~")).toBe(os.homedir());
      expect(resolveUserPath("~/data")).toBe(path.join(os.homedir(), "data"));
    });
  });

  describe("paths", () => {
    it("creates the .netrecall directory", () => {
      const dir = ensureNetrecallDir(tempDir);
      expect(dir).toBe(path.join(tempDir, ".netrecall"));
      expect(fs.statSync(dir).isDirectory()).toBe(true);
    });

    it("lays out files inside .netrecall", () => {
      const paths = getNetrecallPaths(tempDir);
      expect(paths).toEqual({
        netrecallDir: path.join(tempDir, ".netrecall"),
        sessionsDir: path.join(tempDir, ".netrecall", "sessions"),
        databaseFile: path.join(tempDir, ".netrecall", "sessions.db"),
        logFile: path.join(tempDir, ".netrecall", "netrecall.log"),
        configFile: path.join(tempDir, ".netrecall", "config.json"),
      });
    });
  });
});
