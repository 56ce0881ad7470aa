// src/pipeline/state.ts
// Per-object processing state machine.
//
//   discovered → claimed → retrieving → transcribing → analyzing
//              → enriching → persisting → recording → processed
//
// Every non-terminal state may also move to `failed`; `discovered` may move
// to `skipped` (already processed, or claimed by another worker).

/* ---------- States ---------- */

export type PipelineState =
  | "discovered"
  | "claimed"
  | "retrieving"
  | "transcribing"
  | "analyzing"
  | "enriching"
  | "persisting"
  | "recording"
  | "processed"
  | "failed"
  | "skipped";

export type TerminalState = Extract<PipelineState, "processed" | "failed" | "skipped">;

/* ---------- Transition table ---------- */

export const TRANSITIONS: Readonly<Record<PipelineState, readonly PipelineState[]>> = {
  discovered: ["claimed", "skipped", "failed"],
  claimed: ["retrieving", "skipped", "failed"],
  retrieving: ["transcribing", "failed"],
  transcribing: ["analyzing", "failed"],
  analyzing: ["enriching", "failed"],
  enriching: ["persisting", "failed"],
  persisting: ["recording", "failed"],
  recording: ["processed", "failed"],
  processed: [],
  failed: [],
  skipped: [],
};

export function isTerminal(state: PipelineState): state is TerminalState {
  return TRANSITIONS[state].length === 0;
}

export function canTransition(from: PipelineState, to: PipelineState): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Thrown on a transition the table does not allow */
export class IllegalTransitionError extends Error {
  constructor(from: PipelineState, to: PipelineState) {
    super(`Illegal pipeline transition: ${from} → ${to}`);
    this.name = "IllegalTransitionError";
  }
}

/* ---------- Tracker ---------- */

export interface StateChange {
  from: PipelineState;
  to: PipelineState;
  at: number;
}

/**
 * Tracks one object's progress through the pipeline and keeps its history.
 */
export class PipelineStateTracker {
  private current: PipelineState = "discovered";
  private readonly changes: StateChange[] = [];

  constructor(
    private readonly onChange?: (change: StateChange) => void,
    private readonly now: () => number = Date.now
  ) {}

  get state(): PipelineState {
    return this.current;
  }

  get history(): readonly StateChange[] {
    return this.changes;
  }

  transition(to: PipelineState): void {
    const from = this.current;
    if (!canTransition(from, to)) {
      throw new IllegalTransitionError(from, to);
    }
    const change: StateChange = { from, to, at: this.now() };
    this.current = to;
    this.changes.push(change);
    this.onChange?.(change);
  }
}
