import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { mkdtemp, rm, stat } from "fs/promises";
import os from "os";
import path from "path";
import { ConfigurationError } from "../src/core/errors.js";
import { createJobWorkspace } from "../src/execution/workspace.js";

describe("job workspace", () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "module-runner-ws-"));
  });

  afterAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("creates in, out and meta directories under the job id", async () => {
    const ws = await createJobWorkspace(tmpDir, "job_abc");
    const root = path.join(tmpDir, "job_abc");
    expect(ws).toEqual({
      rootDir: root,
      inDir: `${root}/in/`,
      outDir: `${root}/out/`,
      metaDir: `${root}/meta/`
    });
    expect((await stat(ws.outDir)).isDirectory()).toBe(true);
  });

  it("rejects job ids that leave the working directory", async () => {
    await expect(createJobWorkspace(tmpDir, "../elsewhere")).rejects.toBeInstanceOf(ConfigurationError);
    await expect(createJobWorkspace(tmpDir, ".")).rejects.toThrow(/escapes the working directory/);
  });
});
