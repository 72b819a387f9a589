import { spawn } from "child_process";
import { createWriteStream, type WriteStream } from "fs";
import { once } from "events";
import type { ExecutionResources, ExecutionResult, ProcessSpec, RunnerBackend } from "./types.js";

const MAX_CAPTURE_BYTES = 1024 * 1024;

/** Keeps at most MAX_CAPTURE_BYTES of a stream; the rest is dropped and flagged. */
class CappedCapture {
  private readonly chunks: Buffer[] = [];
  private bytes = 0;
  private truncated = false;

  constructor(private readonly label: "stdout" | "stderr") {}

  push(chunk: Buffer): void {
    if (this.truncated) return;
    const room = MAX_CAPTURE_BYTES - this.bytes;
    if (chunk.byteLength > room) {
      if (room > 0) this.chunks.push(chunk.subarray(0, room));
      this.bytes = MAX_CAPTURE_BYTES;
      this.truncated = true;
      return;
    }
    this.chunks.push(chunk);
    this.bytes += chunk.byteLength;
  }

  text(timedOut: boolean): string {
    return (
      Buffer.concat(this.chunks).toString("utf8") +
      (this.truncated ? `\n[${this.label} truncated]\n` : "") +
      (timedOut ? "\n[timeout]\n" : "")
    );
  }
}

export class LocalProcessRunner implements RunnerBackend {
  async execute(spec: ProcessSpec, resources: ExecutionResources): Promise<ExecutionResult> {
    const [command, ...args] = spec.argv;
    if (!command) throw new Error("process argv must be non-empty");
    resources.signal?.throwIfAborted();
    const startedAt = new Date().toISOString();

    let sink: WriteStream | null = null;
    if (spec.stdoutPath) {
      sink = createWriteStream(spec.stdoutPath);
      await once(sink, "open");
    }

    const child = spawn(command, args, {
      cwd: spec.cwd,
      env: { ...process.env, ...spec.env },
      stdio: ["ignore", "pipe", "pipe"] as const
    });

    const stdout = new CappedCapture("stdout");
    const stderr = new CappedCapture("stderr");
    if (sink) child.stdout.pipe(sink);
    else child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    let timedOut = false;
    let aborted = false;
    const timeoutMs = Math.max(0, Math.floor(resources.timeoutSeconds * 1000));
    const timeout =
      timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            child.kill("SIGKILL");
          }, timeoutMs)
        : null;
    const onAbort = (): void => {
      aborted = true;
      child.kill("SIGKILL");
    };
    resources.signal?.addEventListener("abort", onAbort, { once: true });

    const exitCode = await new Promise<number | null>((resolve, reject) => {
      child.on("error", reject);
      child.on("close", (code: number | null) => resolve(code));
    })
      .catch((e: unknown) => {
        sink?.destroy();
        throw e;
      })
      .finally(() => {
        if (timeout) clearTimeout(timeout);
        resources.signal?.removeEventListener("abort", onAbort);
      });

    if (sink && !sink.writableFinished) await once(sink, "finish");

    const finishedAt = new Date().toISOString();

    return {
      exitCode,
      stdout: stdout.text(timedOut),
      stderr: stderr.text(timedOut),
      startedAt,
      finishedAt,
      timedOut,
      aborted
    };
  }
}
