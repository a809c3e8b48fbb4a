import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { getConfigValue, loadConfig, setConfigValue, validateConfig } from "../manager.js";
import { MalformedDocumentError } from "../../errors/index.js";

describe("Config manager", () => {
  let tmpDir: string;
  let configPath: string;

  const sampleConfig = {
    schemaVersion: 1,
    maxNproc: 8,
    maxNchunks: 12,
    tmpDir: "/scratch",
    eventsDir: "/var/lib/toolcontract/events",
  };

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "toolcontract-config-test-"));
    configPath = join(tmpDir, "toolcontract.yaml");
    await writeFile(configPath, stringifyYaml(sampleConfig), "utf-8");
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  describe("loadConfig", () => {
    it("reads the file", async () => {
      const config = await loadConfig(configPath, {});
      expect(config).toEqual({ ...sampleConfig });
    });

    it("falls back to defaults for a missing file", async () => {
      const config = await loadConfig(join(tmpDir, "missing.yaml"), {});
      expect(config.schemaVersion).toBe(1);
      expect(config.maxNproc).toBe(1);
      expect(config.maxNchunks).toBe(24);
      expect(config.tmpDir).toBe(tmpdir());
      expect(config.eventsDir).toBeUndefined();
    });

    it("treats an empty file as defaults", async () => {
      await writeFile(configPath, "", "utf-8");
      expect((await loadConfig(configPath, {})).maxNproc).toBe(1);
    });

    it("applies environment overrides", async () => {
      const config = await loadConfig(configPath, {
        TOOLCONTRACT_MAX_NPROC: "32",
        TOOLCONTRACT_MAX_NCHUNKS: "4",
        TOOLCONTRACT_TMP_DIR: "/fast-scratch",
        TOOLCONTRACT_EVENTS_DIR: "",
      });
      expect(config.maxNproc).toBe(32);
      expect(config.maxNchunks).toBe(4);
      expect(config.tmpDir).toBe("/fast-scratch");
      expect(config.eventsDir).toBe("/var/lib/toolcontract/events");
    });

    it("rejects invalid environment values", async () => {
      await expect(loadConfig(configPath, { TOOLCONTRACT_MAX_NPROC: "many" })).rejects.toThrow(MalformedDocumentError);
    });

    it("rejects invalid file values", async () => {
      await writeFile(configPath, stringifyYaml({ maxNproc: 0 }), "utf-8");
      await expect(loadConfig(configPath, {})).rejects.toThrow(/maxNproc/);
    });

    it("rejects a non-mapping document", async () => {
      await writeFile(configPath, "- 1\n- 2\n", "utf-8");
      await expect(loadConfig(configPath, {})).rejects.toThrow(MalformedDocumentError);
    });
  });

  describe("getConfigValue", () => {
    it("gets a top-level value", async () => {
      expect(await getConfigValue(configPath, "maxNproc")).toBe(8);
    });

    it("returns undefined for keys not in the file", async () => {
      expect(await getConfigValue(configPath, "logDir")).toBeUndefined();
      expect(await getConfigValue(configPath, "tmpDir.nested")).toBeUndefined();
    });
  });

  describe("setConfigValue", () => {
    it("parses and writes a valid change", async () => {
      const result = await setConfigValue(configPath, "maxNchunks", "48", false);
      expect(result.change).toEqual({ key: "maxNchunks", oldValue: 12, newValue: 48 });
      expect(result.issues).toEqual([]);
      expect(await getConfigValue(configPath, "maxNchunks")).toBe(48);
    });

    it("adds keys that were not set", async () => {
      await setConfigValue(configPath, "contractsDir", "/etc/toolcontract/contracts", false);
      const written = parseYaml(await readFile(configPath, "utf-8"));
      expect(written.contractsDir).toBe("/etc/toolcontract/contracts");
    });

    it("does not write an invalid change", async () => {
      const result = await setConfigValue(configPath, "maxNproc", "-1", false);
      expect(result.change.newValue).toBe("-1");
      expect(result.issues.map(i => i.path)).toEqual(["maxNproc"]);
      expect(await getConfigValue(configPath, "maxNproc")).toBe(8);
    });

    it("does not write in dry-run mode", async () => {
      const result = await setConfigValue(configPath, "maxNproc", "16", true);
      expect(result.change).toEqual({ key: "maxNproc", oldValue: 8, newValue: 16 });
      expect(await getConfigValue(configPath, "maxNproc")).toBe(8);
    });

    it("creates the file when missing", async () => {
      const path = join(tmpDir, "new.yaml");
      await setConfigValue(path, "maxNproc", "2", false);
      expect(await getConfigValue(path, "maxNproc")).toBe(2);
    });
  });

  describe("validateConfig", () => {
    it("accepts a valid file", async () => {
      expect(await validateConfig(configPath)).toEqual({ valid: true, issues: [] });
    });

    it("lists schema issues", async () => {
      await writeFile(configPath, stringifyYaml({ schemaVersion: 2, maxNchunks: "many" }), "utf-8");
      const result = await validateConfig(configPath);
      expect(result.valid).toBe(false);
      expect(result.issues.map(i => i.path)).toEqual(["schemaVersion", "maxNchunks"]);
    });
  });
});
