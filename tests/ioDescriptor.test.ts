import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { ConfigurationError } from "../src/core/errors.js";
import { buildIoDescriptor, inferSampleId } from "../src/io/ioDescriptor.js";
import { parseIoRequest } from "../src/io/ioRequest.js";
import { expandInputPatterns } from "../src/io/inputPatterns.js";
import { DefaultStorageTransfer } from "../src/storage/storageTransfer.js";
import type { TemplateDefaults } from "../src/templates/template.js";

const noDefaults: TemplateDefaults = { outputFile: null, alternateInputs: [], alternateOutputs: [] };

describe("buildIoDescriptor", () => {
  it("keeps full paths and alternates given without a folder", () => {
    const io = buildIoDescriptor(
      parseIoRequest({
        sampleid: "MYSAMPLE",
        program_name: "mpileup",
        input: "s3://bams/my.bam",
        output: "s3://pileup/my.pileup",
        alternate_inputs: "input1.fasta,input2.bed",
        dryrun: ""
      })
    );
    expect(io).toEqual({
      sampleId: "MYSAMPLE",
      primaryInputs: ["s3://bams/my.bam"],
      primaryOutputs: ["s3://pileup/my.pileup"],
      alternateInputs: ["input1.fasta", "input2.bed"],
      alternateOutputs: [],
      baseArgumentsOverride: "",
      options: "",
      dryRun: true
    });
    expect(Object.isFrozen(io)).toBe(true);
    expect(Object.isFrozen(io.primaryInputs)).toBe(true);
  });

  it("joins bare names onto inputdir and outputdir", () => {
    const io = buildIoDescriptor(
      parseIoRequest({
        sampleid: "MYSAMPLE",
        input: "my.bam",
        output: "my.pileup",
        inputdir: "s3://bams",
        outputdir: "s3://pileup",
        alternate_inputs: "s3://fasta/input1.fasta,input2.bed"
      })
    );
    expect(io.primaryInputs).toEqual(["s3://bams/my.bam"]);
    expect(io.primaryOutputs).toEqual(["s3://pileup/my.pileup"]);
    expect(io.alternateInputs).toEqual(["s3://fasta/input1.fasta", "s3://bams/input2.bed"]);
    expect(io.dryRun).toBe(false);
  });

  it("requires inputdir for bare input names", () => {
    expect(() => buildIoDescriptor(parseIoRequest({ input: "my.bam", output: "s3://out/my.sam" }))).toThrow(
      "inputdir needs to be specified for input my.bam"
    );
    expect(() => buildIoDescriptor(parseIoRequest({ input: "/in/my.bam", output: "my.sam" }))).toThrow(
      "outputdir needs to be specified for output my.sam"
    );
  });

  it("infers the sample id from the first input", () => {
    const io = buildIoDescriptor(
      parseIoRequest({ input: ["s3://fastq/SAMPLE7.R1.fastq.gz", "s3://fastq/SAMPLE7.R2.fastq.gz"], output: "/out/x.sam" })
    );
    expect(io.sampleId).toBe("SAMPLE7");
    expect(inferSampleId([])).toBe("");
    const alt = buildIoDescriptor(parseIoRequest({ input: "/in/a.bam", output: "/out/a.sam", sample_id: "S2" }));
    expect(alt.sampleId).toBe("S2");
  });

  it("names folder outputs from the template default", () => {
    const defaults: TemplateDefaults = { outputFile: "{sample_id}.sam", alternateInputs: [], alternateOutputs: [] };
    const request = parseIoRequest({ sampleid: "MYSAMPLE", input: "s3://fastq/my.fastq", output: "s3://align/run1" });
    expect(buildIoDescriptor(request, { defaults }).primaryOutputs).toEqual(["s3://align/run1/MYSAMPLE.sam"]);
    expect(buildIoDescriptor(request, { defaults: noDefaults }).primaryOutputs).toEqual(["s3://align/run1/"]);
  });

  it("falls back to outputdir when no output is named", () => {
    const io = buildIoDescriptor(parseIoRequest({ input: "/in/run/", outputdir: "/data/bcl_out" }));
    expect(io.primaryOutputs).toEqual(["/data/bcl_out/"]);
    expect(() => buildIoDescriptor(parseIoRequest({ input: "/in/run/" }))).toThrow(ConfigurationError);
  });

  it("takes alternates from template defaults when the request has none", () => {
    const defaults: TemplateDefaults = {
      outputFile: null,
      alternateInputs: ["ref.fasta", "s3://refs/targets.bed"],
      alternateOutputs: ["metrics.txt"]
    };
    const io = buildIoDescriptor(
      parseIoRequest({ input: "a.bam", output: "a.sam", inputdir: "/data/in/", outputdir: "/data/out/" }),
      { defaults }
    );
    expect(io.alternateInputs).toEqual(["/data/in/ref.fasta", "s3://refs/targets.bed"]);
    expect(io.alternateOutputs).toEqual(["/data/out/metrics.txt"]);

    const explicit = buildIoDescriptor(
      parseIoRequest({ input: "/in/a.bam", output: "/out/a.sam", alternate_inputs: [] }),
      { defaults }
    );
    expect(explicit.alternateInputs).toEqual([]);
  });

  it("reads dry-run flags and argument overrides", () => {
    const build = (extra: Record<string, unknown>) =>
      buildIoDescriptor(parseIoRequest({ input: "/in/a.bam", output: "/out/a.sam", ...extra }));
    expect(build({ dryrun: true }).dryRun).toBe(true);
    expect(build({ dryrun: "true" }).dryRun).toBe(true);
    expect(build({ dryrun: false }).dryRun).toBe(false);
    expect(build({ dryrun: "false" }).dryRun).toBe(false);
    expect(build({ dryrun: "" }).dryRun).toBe(true);
    expect(build({ dryrun: "no" }).dryRun).toBe(false);
    expect(build({ dryrun: "0" }).dryRun).toBe(false);
    expect(build({ pargs: "  -x 1 ", options: "--fast" })).toMatchObject({
      baseArgumentsOverride: "-x 1",
      options: "--fast"
    });
  });

  it("needs an explicit sample id for pattern inputs", () => {
    const defaults: TemplateDefaults = { outputFile: "{sample_id}.sam", alternateInputs: [], alternateOutputs: [] };
    const request = parseIoRequest({ input: "/reads/^.fastq", output: "/out/run1" });
    expect(() => buildIoDescriptor(request, { defaults })).toThrow(ConfigurationError);
    expect(() => buildIoDescriptor(request, { defaults })).toThrow(
      "sampleid needs to be specified for input pattern /reads/^.fastq"
    );

    const named = buildIoDescriptor(parseIoRequest({ sample_id: "run1", input: "/reads/^.fastq", output: "/out/run1" }), {
      defaults
    });
    expect(named.sampleId).toBe("run1");
    expect(named.primaryOutputs).toEqual(["/out/run1/run1.sam"]);
  });

  it("rejects malformed requests", () => {
    expect(() => parseIoRequest({ input: 5, output: "/out/a.sam" })).toThrow(/invalid io request: input/);
  });
});

describe("expandInputPatterns", () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "module-runner-patterns-"));
    const reads = path.join(tmpDir, "reads");
    await mkdir(reads);
    for (const name of ["a_R1.fastq.gz", "a_R2.fastq.gz", "notes.txt"]) {
      await writeFile(path.join(reads, name), name, "utf8");
    }
  });

  afterAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("lists the folder for caret and star entries", async () => {
    const transfer = new DefaultStorageTransfer({ objectStore: null });
    const reads = path.join(tmpDir, "reads");
    const io = buildIoDescriptor(
      parseIoRequest({ sampleid: "a", input: `${reads}/^.fastq.gz,/keep/me.bam`, output: "/out/a.sam" })
    );
    const expanded = await expandInputPatterns(io, transfer);
    expect(expanded.primaryInputs).toEqual([`${reads}/a_R1.fastq.gz`, `${reads}/a_R2.fastq.gz`, "/keep/me.bam"]);

    const all = await expandInputPatterns(
      buildIoDescriptor(parseIoRequest({ sampleid: "a", input: `${reads}/*`, output: "/out/a.sam" })),
      transfer
    );
    expect(all.primaryInputs).toEqual([`${reads}/a_R1.fastq.gz`, `${reads}/a_R2.fastq.gz`, `${reads}/notes.txt`]);
  });

  it("fails when a pattern matches no files", async () => {
    const reads = path.join(tmpDir, "reads");
    const io = buildIoDescriptor(parseIoRequest({ sampleid: "a", input: `${reads}/^.bam`, output: "/out/a.sam" }));
    const expanding = expandInputPatterns(io, new DefaultStorageTransfer({ objectStore: null }));
    await expect(expanding).rejects.toBeInstanceOf(ConfigurationError);
    await expect(expandInputPatterns(io, new DefaultStorageTransfer({ objectStore: null }))).rejects.toThrow(
      `input pattern ${reads}/^.bam matched no files`
    );
  });

  it("returns the same descriptor when nothing needs expanding", async () => {
    const io = buildIoDescriptor(parseIoRequest({ input: "/in/a.bam", output: "/out/a.sam" }));
    expect(await expandInputPatterns(io, new DefaultStorageTransfer({ objectStore: null }))).toBe(io);
  });
});
