import { describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { CONFIG_DIR, deepMerge, loadConfig } from "../src/config/loader.js";
import { validateConfig } from "../src/config/validator.js";

const REPO_CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../config");

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) ? { ...value } : {};
}

function field(raw: unknown, key: string): unknown {
  return asRecord(raw)[key];
}

describe("config loader", () => {
  it("defaults to the repository config directory", () => {
    expect(CONFIG_DIR).toBe(REPO_CONFIG_DIR);
  });

  it("loads base config with all required fields", () => {
    const res = validateConfig(loadConfig(undefined, REPO_CONFIG_DIR, {}));
    expect(res.valid).toBe(true);
    if (!res.valid) return;

    expect(res.config.log_file).toBe("/var/log/install-imagemagick.log");
    expect(res.config.pin_file).toBe("/etc/apt/preferences.d/imagemagick.pref");
    expect(res.config.build_packages).toEqual(["git", "make", "cmake", "automake", "yasm", "g++", "pkg-config"]);
    expect(res.config.packages.aom.build_system).toBe("cmake");
    expect(res.config.packages.imagemagick.configure_flags).toEqual([
      "--without-magick-plus-plus",
      "--disable-docs",
      "--with-heic=yes",
    ]);
  });

  it("merges env-specific config over base", () => {
    const raw = loadConfig("ci", REPO_CONFIG_DIR, {});
    expect(field(raw, "work_dir")).toBe("/tmp/imagemagick7-build");
    expect(field(raw, "pin_file")).toBe("/etc/apt/preferences.d/imagemagick.pref");
  });

  it("applies IM7_ environment variable overrides", () => {
    const raw = loadConfig(undefined, REPO_CONFIG_DIR, { IM7_LOG_FILE: "/tmp/override.log", HOME: "/root" });
    expect(field(raw, "log_file")).toBe("/tmp/override.log");
    expect(field(raw, "home")).toBeUndefined();
  });

  it("env vars override env-specific yaml", () => {
    const raw = loadConfig("ci", REPO_CONFIG_DIR, { IM7_WORK_DIR: "/tmp/elsewhere" });
    expect(field(raw, "work_dir")).toBe("/tmp/elsewhere");
  });

  it("returns base config when env yaml does not exist", () => {
    const raw = loadConfig("nonexistent-env", REPO_CONFIG_DIR, {});
    expect(field(raw, "work_dir")).toBe("/usr/local/src/imagemagick7");
  });

  it("rejects a yaml file that is not a mapping", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "im7-config-"));
    try {
      fs.writeFileSync(path.join(dir, "base.yaml"), "- just\n- a list\n");
      expect(() => loadConfig(undefined, dir, {})).toThrow("must contain a mapping");
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("deepMerge", () => {
  it("merges nested objects and replaces arrays", () => {
    const merged = deepMerge(
      { a: { b: 1, c: [1, 2] }, d: "x" },
      { a: { c: [3] }, e: true },
    );
    expect(merged).toEqual({ a: { b: 1, c: [3] }, d: "x", e: true });
  });
});

describe("config validator", () => {
  it("rejects config missing required fields", () => {
    const res = validateConfig({ schema_version: "1.0.0" });
    expect(res.valid).toBe(false);
    expect(res.errors).toContain("must have required property 'work_dir'");
  });

  it("rejects unknown build systems", () => {
    const raw = loadConfig(undefined, REPO_CONFIG_DIR, {});
    const packages = field(raw, "packages");
    const aom = field(packages, "aom");
    const broken = {
      ...asRecord(raw),
      packages: { ...asRecord(packages), aom: { ...asRecord(aom), build_system: "meson" } },
    };
    expect(validateConfig(broken).valid).toBe(false);
  });

  it("rejects a download url without a version placeholder", () => {
    const raw = loadConfig(undefined, REPO_CONFIG_DIR, {});
    const packages = field(raw, "packages");
    const libheif = field(packages, "libheif");
    const broken = {
      ...asRecord(raw),
      packages: { ...asRecord(packages), libheif: { ...asRecord(libheif), download_url: "https://example.com/libheif.tar.gz" } },
    };
    expect(validateConfig(broken).valid).toBe(false);
  });

  it("ignores IM7_ variables that name no setting", () => {
    const raw = loadConfig(undefined, REPO_CONFIG_DIR, {
      IM7_HOME: "/home/operator",
      IM7_TYPO_DIR: "/tmp",
      IM7_PACKAGES: "aom",
      IM7_WORK_DIR: "/tmp/im7-work",
    });
    expect(field(raw, "home")).toBeUndefined();
    expect(field(raw, "typo_dir")).toBeUndefined();
    expect(field(raw, "work_dir")).toBe("/tmp/im7-work");

    const res = validateConfig(raw);
    expect(res.valid).toBe(true);
  });

  it("rejects unknown top-level keys in yaml", () => {
    const res = validateConfig({ ...asRecord(loadConfig(undefined, REPO_CONFIG_DIR, {})), typo_dir: "/tmp" });
    expect(res.valid).toBe(false);
    expect(res.errors).toContain("must NOT have additional properties");
  });
});
