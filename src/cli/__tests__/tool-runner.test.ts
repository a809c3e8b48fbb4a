import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createToolProgram } from "../tool-runner.js";
import type { ToolContract } from "../../schemas/tool-contract.js";
import type { ResolvedToolContract } from "../../schemas/resolved-tool-contract.js";
import { loadToolContract, toolContractFromDocument, writeResolvedToolContract } from "../../io/tool-contract-io.js";
import { resolveToolContract } from "../../resolver/resolve.js";
import { ArityError, ChunkCountExceededError, TypeMismatchError } from "../../errors/index.js";

const CONTRACTS = fileURLToPath(new URL("../../../tests/fixtures/contracts/", import.meta.url));
const CHUNKS = fileURLToPath(new URL("../../../tests/fixtures/chunks/", import.meta.url));
const LENGTH = "dev_tools.task_options.length";

describe("createToolProgram", () => {
  let tmpDir: string;
  let filter: ToolContract;
  let received: ResolvedToolContract[];
  const handler = (rtc: ResolvedToolContract) => {
    received.push(rtc);
  };

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "toolcontract-runner-"));
    filter = await loadToolContract(join(CONTRACTS, "filter_fasta.json"));
    received = [];
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("emits the tool contract document", async () => {
    const write = vi.fn();
    await createToolProgram(filter, handler, { write }).parseAsync(["--emit-tool-contract"], { from: "user" });

    expect(received).toEqual([]);
    expect(write).toHaveBeenCalledOnce();
    const emitted = JSON.parse(String(write.mock.calls[0]?.[0]));
    expect(toolContractFromDocument(emitted, "emitted")).toEqual(filter);
  });

  it("resolves from positional paths and option flags", async () => {
    await createToolProgram(filter, handler, { tmpDir: "/scratch" }).parseAsync(
      ["/tmp/a.fasta", "--output-dir", "/out", `--${LENGTH}`, "40", "--invocation-id", "inv1"],
      { from: "user" },
    );

    expect(received).toHaveLength(1);
    const [rtc] = received;
    expect(rtc?.inputFiles).toEqual(["/tmp/a.fasta"]);
    expect(rtc?.outputFiles).toEqual(["/out/file.fasta"]);
    expect(rtc?.options).toEqual({ [LENGTH]: { type: "int", value: 40 } });
    expect(rtc?.resources[0]).toEqual(["$tmpdir", "/scratch/dev_tools-filter_fasta-inv1/tmpdir-0"]);
  });

  it("uses option defaults and explicit output paths", async () => {
    await createToolProgram(filter, handler).parseAsync(["/tmp/a.fasta", "/tmp/b.fasta"], { from: "user" });
    expect(received[0]?.outputFiles).toEqual(["/tmp/b.fasta"]);
    expect(received[0]?.options[LENGTH]).toEqual({ type: "int", value: 25 });
  });

  it("rejects mistyped option flags", async () => {
    await expect(
      createToolProgram(filter, handler).parseAsync(["/tmp/a.fasta", `--${LENGTH}`, "forty"], { from: "user" }),
    ).rejects.toThrow(TypeMismatchError);
  });

  it("rejects missing inputs", async () => {
    await expect(createToolProgram(filter, handler).parseAsync([], { from: "user" })).rejects.toThrow(ArityError);
  });

  it("rejects too many output paths", async () => {
    await expect(
      createToolProgram(filter, handler).parseAsync(["/tmp/a.fasta", "/tmp/b.fasta", "/tmp/c.fasta"], { from: "user" }),
    ).rejects.toThrow(ArityError);
  });

  it("runs from a resolved tool contract document", async () => {
    const rtc = resolveToolContract(filter, ["/tmp/a.fasta"], {
      outputDir: "/out",
      maxNproc: 2,
      tmpDir: "/scratch",
      invocationId: "inv1",
      optionOverrides: { [LENGTH]: 12 },
    });
    const path = join(tmpDir, "rtc.json");
    await writeResolvedToolContract(rtc, path);

    await createToolProgram(filter, handler).parseAsync(["--resolved-tool-contract", path], { from: "user" });
    expect(received).toEqual([rtc]);
  });

  it("takes a chunk count for scatter tools", async () => {
    const scatter = await loadToolContract(join(CONTRACTS, "scatter_fasta.json"));
    await createToolProgram(scatter, handler).parseAsync(["/tmp/a.fasta", "--nchunks", "2"], { from: "user" });
    expect(received[0]?.scatter).toEqual({ chunkKeys: ["$chunk.fasta_id"], maxNchunks: 3, nchunks: 2 });

    await expect(
      createToolProgram(scatter, handler).parseAsync(["/tmp/a.fasta", "--nchunks", "5"], { from: "user" }),
    ).rejects.toThrow(ChunkCountExceededError);
  });

  it("loads the chunk list for gather tools", async () => {
    const gather = await loadToolContract(join(CONTRACTS, "gather_fasta.json"));
    await createToolProgram(gather, handler).parseAsync(
      [join(CHUNKS, "fasta.chunks.json"), "--output-dir", "/out"],
      { from: "user" },
    );
    expect(received[0]?.outputFiles).toEqual(["/out/gathered.fasta"]);
    expect(received[0]?.gather?.chunkFiles).toEqual([
      "/work/chunk-2.fasta",
      "/work/chunk-0.fasta",
      "/work/chunk-1.fasta",
    ]);
  });
});
