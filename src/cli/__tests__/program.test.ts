import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { stringify as stringifyYaml } from "yaml";
import { createProgram } from "../program.js";
import { loadResolvedToolContract } from "../../io/tool-contract-io.js";
import { getConfigValue } from "../../config/manager.js";

const CONTRACTS = fileURLToPath(new URL("../../../tests/fixtures/contracts/", import.meta.url));
const INVALID = fileURLToPath(new URL("../../../tests/fixtures/invalid/", import.meta.url));
const CHUNKS = fileURLToPath(new URL("../../../tests/fixtures/chunks/", import.meta.url));

describe("toolcontract CLI", () => {
  let tmpDir: string;
  let configPath: string;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "toolcontract-cli-"));
    configPath = join(tmpDir, "toolcontract.yaml");
    await writeFile(configPath, stringifyYaml({
      maxNproc: 4,
      maxNchunks: 24,
      tmpDir: "/scratch",
      contractsDir: CONTRACTS,
    }), "utf-8");
    log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    error = vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await rm(tmpDir, { recursive: true, force: true });
  });

  async function run(...args: string[]): Promise<string[]> {
    await createProgram().parseAsync(["--config", configPath, ...args], { from: "user" });
    return log.mock.calls.map(call => String(call[0]));
  }

  describe("contract", () => {
    it("validates a contract document", async () => {
      const lines = await run("contract", "validate", join(CONTRACTS, "filter_fasta.json"));
      expect(lines).toEqual(["✅ dev_tools.tasks.filter_fasta (standard) is valid"]);
      expect(process.exitCode).toBeUndefined();
    });

    it("reports an invalid contract document", async () => {
      await run("contract", "validate", join(INVALID, "bad_id.json"));
      expect(process.exitCode).toBe(1);
      expect(String(error.mock.calls[0]?.[0])).toMatch(/^❌ InvalidContractError: \[definition\]/);
    });

    it("summarizes a contract", async () => {
      const lines = await run("contract", "show", join(CONTRACTS, "scatter_fasta.json"));
      expect(lines[0]).toBe("dev_tools.tasks.scatter_fasta v0.1.0 (scatter, local)");
      expect(lines).toContain("  scatter:     keys $chunk.fasta_id; max_nchunks 3");
    });
  });

  describe("registry", () => {
    it("lists contracts of one kind", async () => {
      const lines = await run("registry", "list", CONTRACTS, "--kind", "gather");
      expect(lines).toHaveLength(1);
      expect(lines[0]?.split(/\s+/)).toEqual(["dev_tools.tasks.gather_fasta", "gather", "local", "0.1.0"]);
    });

    it("rejects an unknown kind", async () => {
      await run("registry", "list", CONTRACTS, "--kind", "fan-out");
      expect(process.exitCode).toBe(1);
    });
  });

  describe("resolve", () => {
    it("resolves a registered contract to a document", async () => {
      const out = join(tmpDir, "rtc.json");
      const lines = await run(
        "resolve", "dev_tools.tasks.filter_fasta",
        "-i", "/tmp/a.fasta",
        "-o", "/out",
        "--option", "dev_tools.task_options.length=40",
        "--invocation-id", "inv1",
        "--out", out,
      );
      expect(lines).toEqual([`✅ Resolved dev_tools.tasks.filter_fasta → ${out}`, "   output: /out/file.fasta"]);

      const rtc = await loadResolvedToolContract(out);
      expect(rtc.options).toEqual({ "dev_tools.task_options.length": { type: "int", value: 40 } });
      expect(rtc.resources[0]).toEqual(["$tmpdir", "/scratch/dev_tools-filter_fasta-inv1/tmpdir-0"]);
    });

    it("prints the document when no --out is given", async () => {
      const [printed] = await run(
        "resolve", join(CONTRACTS, "scatter_fasta.json"),
        "-i", "/tmp/a.fasta",
        "-o", "/out",
        "--nchunks", "2",
      );
      const doc = JSON.parse(printed ?? "");
      expect(doc.tool_contract.chunk_keys).toEqual(["$chunk.fasta_id"]);
      expect(doc.tool_contract.max_nchunks).toBe(3);
      expect(doc.tool_contract.nchunks).toBe(2);
    });

    it("reports resolution errors", async () => {
      await run(
        "resolve", "dev_tools.tasks.filter_fasta",
        "-i", "/tmp/a.fasta",
        "-o", "/out",
        "--option", "dev_tools.task_options.width=3",
      );
      expect(process.exitCode).toBe(1);
      expect(String(error.mock.calls[0]?.[0])).toMatch(/^❌ UnknownOptionError:/);
    });

    it("resolves a gather contract against a chunk list", async () => {
      const [printed] = await run(
        "gather", "dev_tools.tasks.gather_fasta", join(CHUNKS, "fasta.chunks.json"),
        "-o", "/out",
      );
      const doc = JSON.parse(printed ?? "");
      expect(doc.tool_contract.chunk_files).toEqual([
        "/work/chunk-2.fasta",
        "/work/chunk-0.fasta",
        "/work/chunk-1.fasta",
      ]);
    });
  });

  describe("chunks", () => {
    it("merges one key in chunk list order", async () => {
      const lines = await run("chunks", "merge", join(CHUNKS, "fasta.chunks.json"), "fasta_id");
      expect(lines).toEqual(["/work/chunk-2.fasta", "/work/chunk-0.fasta", "/work/chunk-1.fasta"]);
    });

    it("shows a chunk list", async () => {
      const lines = await run("chunks", "show", join(CHUNKS, "fasta.chunks.json"));
      expect(lines.slice(0, 5)).toEqual([
        "# fasta split in three",
        "3 chunk(s)",
        "  c2",
        "    $chunk.fasta_id = /work/chunk-2.fasta",
        "    nrecords = 40",
      ]);
    });

    it("reports a skewed chunk list", async () => {
      await run("chunks", "show", join(CHUNKS, "skewed.chunks.json"));
      expect(process.exitCode).toBe(1);
      expect(String(error.mock.calls[0]?.[0])).toMatch(/^❌ ChunkKeySkewError:/);
    });
  });

  describe("config", () => {
    it("sets and gets values", async () => {
      await run("config", "set", "maxNproc", "16");
      expect(await getConfigValue(configPath, "maxNproc")).toBe(16);

      log.mockClear();
      expect(await run("config", "get", "maxNproc")).toEqual(["16"]);
    });

    it("rejects invalid values", async () => {
      const lines = await run("config", "set", "maxNproc", "zero");
      expect(lines[0]).toBe("❌ Config change rejected:");
      expect(process.exitCode).toBe(1);
      expect(await getConfigValue(configPath, "maxNproc")).toBe(4);
    });

    it("validates the file", async () => {
      expect(await run("config", "validate")).toEqual(["✅ Config valid"]);
    });
  });
});
