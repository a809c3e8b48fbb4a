import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import { join } from "node:path";
import type { ToolContractInput } from "../../schemas/tool-contract.js";
import { defineToolContract } from "../../contracts/define.js";
import { createChunk } from "../../chunks/chunk.js";
import { checkScatterOutput, resolveScatterToolContract } from "../scatter.js";
import { resolveGatherFromChunks, resolveGatherToolContract } from "../gather.js";
import { resolveContract } from "../dispatch.js";
import {
  ArityError,
  ChunkCountExceededError,
  ChunkKeySkewError,
  InvalidChunkError,
  InvalidContractError,
  MultipleOutputsError,
  ResourceBoundError,
} from "../../errors/index.js";

const CHUNKS = fileURLToPath(new URL("../../../tests/fixtures/chunks/", import.meta.url));

function scatterFasta(maxNchunks: number | "$max_nchunks" = 3, overrides: Partial<ToolContractInput> = {}) {
  return defineToolContract({
    toolContractId: "dev_tools.tasks.scatter_fasta",
    version: "0.1.0",
    inputTypes: [{ fileTypeId: "FileTypes.Fasta", label: "fasta_in" }],
    outputTypes: [{ fileTypeId: "FileTypes.CHUNK", label: "chunk_json", defaultName: "fasta.chunks.json" }],
    driver: { exe: "scatter-fasta" },
    scatter: { chunkKeys: ["$chunk.fasta_id"], maxNchunks },
    ...overrides,
  });
}

function gatherFasta(overrides: Partial<ToolContractInput> = {}) {
  return defineToolContract({
    toolContractId: "dev_tools.tasks.gather_fasta",
    version: "0.1.0",
    inputTypes: [{ fileTypeId: "FileTypes.CHUNK", label: "chunk_json" }],
    outputTypes: [{ fileTypeId: "FileTypes.Fasta", label: "fasta_out", defaultName: "gathered.fasta" }],
    driver: { exe: "gather-fasta" },
    gather: { chunkKey: "$chunk.fasta_id" },
    ...overrides,
  });
}

const standard = defineToolContract({
  toolContractId: "dev_tools.tasks.filter_fasta",
  version: "0.1.0",
  inputTypes: [{ fileTypeId: "FileTypes.Fasta", label: "fasta_in" }],
  outputTypes: [{ fileTypeId: "FileTypes.Fasta", label: "fasta_out" }],
  driver: { exe: "filter-fasta" },
});

const opts = { outputDir: "/out", maxNproc: 4, tmpDir: "/scratch", invocationId: "inv1" };

function fastaChunks(n: number) {
  return Array.from({ length: n }, (_, i) => createChunk(`c${i}`, { "$chunk.fasta_id": `/work/chunk-${i}.fasta` }));
}

describe("resolveScatterToolContract", () => {
  it("resolves the chunk ceiling and defaults nchunks to it", () => {
    const rtc = resolveScatterToolContract(scatterFasta("$max_nchunks"), ["/data/a.fasta"], { ...opts, maxNchunks: 12 });
    expect(rtc.scatter).toEqual({ chunkKeys: ["$chunk.fasta_id"], maxNchunks: 12, nchunks: 12 });
    expect(rtc.outputFiles).toEqual(["/out/fasta.chunks.json"]);
  });

  it("lowers a literal maximum to the caller's ceiling", () => {
    const rtc = resolveScatterToolContract(scatterFasta(50), ["/data/a.fasta"], { ...opts, maxNchunks: 24 });
    expect(rtc.scatter?.maxNchunks).toBe(24);
  });

  it("accepts a requested count within the maximum", () => {
    const rtc = resolveScatterToolContract(scatterFasta(3), ["/data/a.fasta"], { ...opts, maxNchunks: 24, nchunks: 2 });
    expect(rtc.scatter?.nchunks).toBe(2);
  });

  it("fails when more chunks are requested than allowed", () => {
    expect(() =>
      resolveScatterToolContract(scatterFasta(3), ["/data/a.fasta"], { ...opts, maxNchunks: 24, nchunks: 5 }),
    ).toThrow(ChunkCountExceededError);
  });

  it("rejects a non-positive chunk count", () => {
    expect(() =>
      resolveScatterToolContract(scatterFasta(3), ["/data/a.fasta"], { ...opts, maxNchunks: 24, nchunks: 0 }),
    ).toThrow(ResourceBoundError);
  });

  it("refuses non-scatter contracts", () => {
    expect(() => resolveScatterToolContract(standard, ["/data/a.fasta"], { ...opts, maxNchunks: 3 })).toThrow(
      InvalidContractError,
    );
  });
});

describe("checkScatterOutput", () => {
  const rtc = resolveScatterToolContract(scatterFasta(3), ["/data/a.fasta"], { ...opts, maxNchunks: 24 });

  it("accepts up to the maximum", () => {
    expect(() => checkScatterOutput(rtc, fastaChunks(3))).not.toThrow();
  });

  it("fails when the task produced more chunks than allowed", () => {
    try {
      checkScatterOutput(rtc, fastaChunks(5));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ChunkCountExceededError);
      if (!(err instanceof ChunkCountExceededError)) return;
      expect(err.nchunks).toBe(5);
      expect(err.maxNchunks).toBe(3);
    }
  });

  it("fails on an empty chunk list", () => {
    expect(() => checkScatterOutput(rtc, [])).toThrow(InvalidChunkError);
  });

  it("fails when promised keys are missing", () => {
    expect(() => checkScatterOutput(rtc, [createChunk("c0", { "$chunk.other_id": "/a" })])).toThrow(ChunkKeySkewError);
  });

  it("refuses a non-scatter resolved contract", () => {
    const plain = resolveContract(standard, ["/data/a.fasta"], opts);
    expect(() => checkScatterOutput(plain, fastaChunks(1))).toThrow(InvalidContractError);
  });
});

describe("resolveGatherFromChunks", () => {
  it("records chunk files in chunk list order", () => {
    const chunks = [
      createChunk("c2", { "$chunk.fasta_id": "/work/chunk-2.fasta" }),
      createChunk("c0", { "$chunk.fasta_id": "/work/chunk-0.fasta" }),
      createChunk("c1", { "$chunk.fasta_id": "/work/chunk-1.fasta" }),
    ];
    const rtc = resolveGatherFromChunks(gatherFasta(), "/work/fasta.chunks.json", chunks, opts);
    expect(rtc.inputFiles).toEqual(["/work/fasta.chunks.json"]);
    expect(rtc.outputFiles).toEqual(["/out/gathered.fasta"]);
    expect(rtc.gather).toEqual({
      chunkKey: "$chunk.fasta_id",
      chunkFiles: ["/work/chunk-2.fasta", "/work/chunk-0.fasta", "/work/chunk-1.fasta"],
    });
  });

  it("fails on an empty chunk list", () => {
    expect(() => resolveGatherFromChunks(gatherFasta(), "/work/x.json", [], opts)).toThrow(InvalidChunkError);
  });

  it("fails when a chunk lacks the gathered key", () => {
    const chunks = [
      createChunk("c0", { "$chunk.report_id": "/work/r0.json" }),
      createChunk("c1", { "$chunk.report_id": "/work/r1.json" }),
    ];
    expect(() => resolveGatherFromChunks(gatherFasta(), "/work/x.json", chunks, opts)).toThrow(ChunkKeySkewError);
  });

  it("refuses non-gather contracts", () => {
    expect(() => resolveGatherFromChunks(standard, "/work/x.json", fastaChunks(1), opts)).toThrow(InvalidContractError);
  });

  it("loads the chunk list from disk", async () => {
    const path = join(CHUNKS, "fasta.chunks.json");
    const rtc = await resolveGatherToolContract(gatherFasta(), path, opts);
    expect(rtc.gather?.chunkFiles).toEqual(["/work/chunk-2.fasta", "/work/chunk-0.fasta", "/work/chunk-1.fasta"]);
  });
});

describe("resolveContract", () => {
  it("dispatches standard contracts", () => {
    const rtc = resolveContract(standard, ["/data/a.fasta"], opts);
    expect(rtc.scatter).toBeUndefined();
    expect(rtc.gather).toBeUndefined();
  });

  it("dispatches scatter contracts", () => {
    const rtc = resolveContract(scatterFasta(3), ["/data/a.fasta"], { ...opts, maxNchunks: 24 });
    expect(rtc.scatter?.nchunks).toBe(3);
  });

  it("requires a chunk ceiling for scatter contracts", () => {
    expect(() => resolveContract(scatterFasta(3), ["/data/a.fasta"], opts)).toThrow(ResourceBoundError);
  });

  it("dispatches gather contracts", () => {
    const rtc = resolveContract(gatherFasta(), ["/work/fasta.chunks.json"], { ...opts, chunks: fastaChunks(2) });
    expect(rtc.gather?.chunkFiles).toEqual(["/work/chunk-0.fasta", "/work/chunk-1.fasta"]);
  });

  it("requires one chunk list path and the loaded chunks for gather contracts", () => {
    expect(() => resolveContract(gatherFasta(), [], { ...opts, chunks: fastaChunks(1) })).toThrow(ArityError);
    expect(() => resolveContract(gatherFasta(), ["/work/x.json"], opts)).toThrow(InvalidContractError);
  });

  it("never gathers into more than one output", () => {
    // Built past the linter to reach the resolver's own check.
    const tc = { ...gatherFasta(), outputTypes: [...gatherFasta().outputTypes, ...gatherFasta().outputTypes] };
    expect(() => resolveContract(tc, ["/work/x.json"], { ...opts, chunks: fastaChunks(1) })).toThrow(MultipleOutputsError);
  });
});
