import type { JsonObject } from "../core/json.js";

export type JobState =
  | "PENDING_TEMPLATE"
  | "RESOLVED_INSTANCE"
  | "STAGED"
  | "ASSEMBLED"
  | "EXECUTED"
  | "DRY_RUN_SKIPPED"
  | "UPLOADED"
  | "DONE"
  | "FAILED";

const TRANSITIONS: Record<JobState, readonly JobState[]> = {
  PENDING_TEMPLATE: ["RESOLVED_INSTANCE"],
  RESOLVED_INSTANCE: ["STAGED"],
  STAGED: ["ASSEMBLED"],
  ASSEMBLED: ["EXECUTED", "DRY_RUN_SKIPPED"],
  EXECUTED: ["UPLOADED"],
  DRY_RUN_SKIPPED: ["DONE"],
  UPLOADED: ["DONE"],
  DONE: [],
  FAILED: []
};

export function canTransition(from: JobState, to: JobState): boolean {
  if (to === "FAILED") return from !== "DONE" && from !== "FAILED";
  return TRANSITIONS[from].includes(to);
}

export class IllegalTransitionError extends Error {
  constructor(
    readonly from: JobState,
    readonly to: JobState
  ) {
    super(`illegal job transition ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
  }
}

export interface JobEvent {
  ts: string;
  kind: string;
  message: string;
  data: JsonObject | null;
}

export type JobEventSink = (line: string) => void;

export const stderrSink: JobEventSink = (line) => {
  process.stderr.write(`${line}\n`);
};

/** One job's state and JSON-line event log. */
export class JobRun {
  private current: JobState = "PENDING_TEMPLATE";
  private readonly events: JobEvent[] = [];

  constructor(
    readonly jobId: string,
    readonly moduleName: string,
    private readonly sink: JobEventSink = stderrSink
  ) {}

  get state(): JobState {
    return this.current;
  }

  get isTerminal(): boolean {
    return this.current === "DONE" || this.current === "FAILED";
  }

  event(kind: string, message: string, data: JsonObject | null = null): void {
    const ev: JobEvent = { ts: new Date().toISOString(), kind, message, data };
    this.events.push(ev);
    this.sink(JSON.stringify({ job_id: this.jobId, ...ev }));
  }

  transition(to: JobState, data: JsonObject | null = null): void {
    if (!canTransition(this.current, to)) throw new IllegalTransitionError(this.current, to);
    const from = this.current;
    this.current = to;
    this.event(`job.${to.toLowerCase()}`, `${from} -> ${to}`, data);
  }

  fail(error: string): void {
    this.transition("FAILED", { error });
  }

  eventLog(): readonly JobEvent[] {
    return this.events;
  }

  logLines(): string {
    return this.events.map((e) => JSON.stringify(e)).join("\n") + "\n";
  }
}
