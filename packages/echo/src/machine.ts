/**
 * Session lifecycle.
 *
 * ```
 * idle ─▶ reading ⇄ writing
 *   └────────┴─────────┴──▶ stopping
 * (any) ─▶ closing-handles ─▶ closing-loop ─▶ done
 * ```
 */

export type SessionState =
  | "idle"
  | "reading"
  | "writing"
  | "stopping"
  | "closing-handles"
  | "closing-loop"
  | "done";

export type SessionEvent =
  | "read_started"
  | "write_submitted"
  | "write_completed"
  | "stop_requested"
  | "handles_closing"
  | "handles_closed"
  | "loop_closed";

/** Next state for `event`. Events that do not apply leave the state as it is. */
export function transition(state: SessionState, event: SessionEvent): SessionState {
  switch (event) {
    case "read_started":
      return state === "idle" ? "reading" : state;
    case "write_submitted":
      return state === "idle" || state === "reading" ? "writing" : state;
    case "write_completed":
      return state === "writing" ? "reading" : state;
    case "stop_requested":
      return state === "idle" || state === "reading" || state === "writing" ? "stopping" : state;
    case "handles_closing":
      return state === "done" ? state : "closing-handles";
    case "handles_closed":
      return state === "closing-handles" ? "closing-loop" : state;
    case "loop_closed":
      return state === "closing-loop" ? "done" : state;
  }
}

export function isDone(state: SessionState): boolean {
  return state === "done";
}
