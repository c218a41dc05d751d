import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { applyEnvOverrides, deepMerge, envKeyPath, loadConfig, parseEnvValue } from "../src/config/loader.js";
import { requireValidConfig, validateConfig } from "../src/config/validator.js";

const CONFIG_DIR = path.resolve(import.meta.dirname, "../config");

describe("config loader", () => {
  it("loads base config with all required fields", () => {
    const config = loadConfig(undefined, CONFIG_DIR, {});
    expect(config.schema_version).toBe("1.0.0");
    expect(config.output_dir).toBe("output");
    expect(config.package).toMatchObject({ name: "sample", version: "1.0.0", source_dir: "distribution" });
    expect(config.distribution).toMatchObject({ codename: "stable", component: "main", architectures: ["amd64"] });
  });

  it("merges env-specific config over base", () => {
    const config = loadConfig("ci", CONFIG_DIR, {});
    expect(config.output_dir).toBe("build/apt");
    expect(config.publish).toEqual({
      destination: "/var/www/html/distributions/debian",
      owner: "ci:ci",
      use_sudo: false,
    });
    expect(config.schema_version).toBe("1.0.0");
  });

  it("returns base config when env yaml does not exist", () => {
    const config = loadConfig("nonexistent-env", CONFIG_DIR, {});
    expect(config.output_dir).toBe("output");
  });

  it("applies environment variable overrides with __ for nesting", () => {
    const config = loadConfig("ci", CONFIG_DIR, {
      APTCTL_OUTPUT_DIR: "/tmp/override",
      APTCTL_SIGNING__KEY_ID: "ABCDEF01",
      APTCTL_PUBLISH__USE_SUDO: "true",
      APTCTL_DISTRIBUTION__ARCHITECTURES: "[amd64, arm64]",
      HOME: "/root",
    });
    expect(config.output_dir).toBe("/tmp/override");
    expect(config.signing).toEqual({ key_id: "ABCDEF01" });
    expect(config.publish).toMatchObject({ use_sudo: true, owner: "ci:ci" });
    expect(config.distribution).toMatchObject({ architectures: ["amd64", "arm64"], origin: "Example" });
  });

  it("maps variable names to config paths", () => {
    expect(envKeyPath("APTCTL_SIGNING__KEY_ID")).toEqual(["signing", "key_id"]);
    expect(envKeyPath("APTCTL_TEMPLATES_DIR")).toEqual(["templates_dir"]);
    expect(envKeyPath("APTCTL___X")).toBeNull();
    expect(envKeyPath("PATH")).toBeNull();
  });

  it("deepMerge replaces arrays and keeps sibling keys", () => {
    expect(deepMerge({ a: { b: 1, c: [1, 2] }, d: "x" }, { a: { c: [3] } })).toEqual({ a: { b: 1, c: [3] }, d: "x" });
  });

  it("reads booleans, integers and flow sequences and keeps everything else as typed", () => {
    expect(parseEnvValue("true")).toBe(true);
    expect(parseEnvValue("false")).toBe(false);
    expect(parseEnvValue("120")).toBe(120);
    expect(parseEnvValue("[amd64, arm64]")).toEqual(["amd64", "arm64"]);
    expect(parseEnvValue("0xDEADBEEF")).toBe("0xDEADBEEF");
    expect(parseEnvValue("01234567")).toBe("01234567");
    expect(parseEnvValue("12345E67")).toBe("12345E67");
    expect(parseEnvValue("1.5")).toBe("1.5");
    expect(parseEnvValue("yes")).toBe("yes");
    expect(parseEnvValue("12345678901234567890")).toBe("12345678901234567890");
  });

  it("keeps a value that is not YAML as a string", () => {
    expect(applyEnvOverrides({}, { APTCTL_OUTPUT_DIR: "out: [" })).toEqual({ output_dir: "out: [" });
  });

  describe("broken config directories", () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "aptctl-config-"));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it("requires base.yaml", () => {
      expect(() => loadConfig(undefined, tmpDir, {})).toThrow(`Missing base config: ${path.join(tmpDir, "base.yaml")}`);
    });

    it("reports unparsable YAML as invalid config", () => {
      fs.writeFileSync(path.join(tmpDir, "base.yaml"), "package: [\n");
      let caught: unknown;
      try {
        loadConfig(undefined, tmpDir, {});
      } catch (e) {
        caught = e;
      }
      expect(caught).toMatchObject({ kind: "ConfigurationError", site: "CONFIG_INVALID" });
    });

    it("rejects a document that is not a mapping", () => {
      fs.writeFileSync(path.join(tmpDir, "base.yaml"), "- just\n- a list\n");
      expect(() => loadConfig(undefined, tmpDir, {})).toThrow("must contain a mapping");
    });
  });
});

describe("config validator", () => {
  it("accepts the base and ci configs", async () => {
    expect((await validateConfig(loadConfig(undefined, CONFIG_DIR, {}))).valid).toBe(true);
    expect((await validateConfig(loadConfig("ci", CONFIG_DIR, {}))).valid).toBe(true);
  });

  it("fills defaults for optional fields", async () => {
    const raw = loadConfig(undefined, CONFIG_DIR, {});
    const res = await validateConfig({
      ...raw,
      tools: { build: ["dpkg-deb", "--build"], scan: ["dpkg-scanpackages"], release: ["apt-ftparchive", "release"] },
      signing: {},
    });
    expect(res.valid).toBe(true);
    if (res.valid) {
      expect(res.config.tools.gpg).toBe("gpg");
      expect(res.config.tools.timeout_seconds).toBe(120);
      expect(res.config.signing.key_id).toBe("");
    }

    const bare = { ...raw, distribution: { architectures: ["arm64"] } };
    const bareRes = await validateConfig(bare);
    expect(bareRes.valid).toBe(true);
    if (bareRes.valid) {
      expect(bareRes.config.distribution.codename).toBe("stable");
      expect(bareRes.config.distribution.suite).toBe("stable");
      expect(bareRes.config.distribution.component).toBe("main");
    }
  });

  it("takes a numeric key id from the environment as a string", async () => {
    const config = await requireValidConfig(loadConfig(undefined, CONFIG_DIR, { APTCTL_SIGNING__KEY_ID: "12345678" }));
    expect(config.signing.key_id).toBe("12345678");
  });

  it("passes key ids that look like numbers through unchanged", async () => {
    for (const id of ["0xDEADBEEF", "01234567", "12345E67", "1234567890123456789"]) {
      const config = await requireValidConfig(loadConfig(undefined, CONFIG_DIR, { APTCTL_SIGNING__KEY_ID: id }));
      expect(config.signing.key_id).toBe(id);
    }
  });

  it("rejects an empty architecture list", async () => {
    const raw = deepMerge(loadConfig(undefined, CONFIG_DIR, {}), { distribution: { architectures: [] } });
    const res = await validateConfig(raw);
    expect(res.valid).toBe(false);
    if (!res.valid) expect(res.errors).toContain("/distribution/architectures");
  });

  it("rejects unknown keys and bad modes", async () => {
    const raw = deepMerge(loadConfig(undefined, CONFIG_DIR, {}), {
      index: { packages_mode: "guess" },
      extra: true,
    });
    const res = await validateConfig(raw);
    expect(res.valid).toBe(false);
    if (!res.valid) {
      expect(res.errors).toContain("/index/packages_mode");
      expect(res.errors).toContain("must NOT have additional properties");
    }
  });

  it("requireValidConfig throws a configuration error", async () => {
    const raw = deepMerge(loadConfig(undefined, CONFIG_DIR, {}), { package: { name: "Not A Debian Name" } });
    await expect(requireValidConfig(raw)).rejects.toMatchObject({ kind: "ConfigurationError", site: "CONFIG_INVALID" });
  });
});
