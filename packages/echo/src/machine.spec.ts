import { transition, type SessionEvent, type SessionState } from "./machine.js";

const STATES: SessionState[] = [
  "idle",
  "reading",
  "writing",
  "stopping",
  "closing-handles",
  "closing-loop",
  "done",
];

const EVENTS: SessionEvent[] = [
  "read_started",
  "write_submitted",
  "write_completed",
  "stop_requested",
  "handles_closing",
  "handles_closed",
  "loop_closed",
];

const TABLE: Array<[SessionState, SessionEvent, SessionState]> = [
  ["idle", "read_started", "reading"],
  ["idle", "write_submitted", "writing"],
  ["reading", "write_submitted", "writing"],
  ["writing", "write_completed", "reading"],
  ["idle", "stop_requested", "stopping"],
  ["reading", "stop_requested", "stopping"],
  ["writing", "stop_requested", "stopping"],
  ["idle", "handles_closing", "closing-handles"],
  ["reading", "handles_closing", "closing-handles"],
  ["writing", "handles_closing", "closing-handles"],
  ["stopping", "handles_closing", "closing-handles"],
  ["closing-handles", "handles_closing", "closing-handles"],
  ["closing-loop", "handles_closing", "closing-handles"],
  ["closing-handles", "handles_closed", "closing-loop"],
  ["closing-loop", "loop_closed", "done"],
];

describe("transition", () => {
  it.each(TABLE)("%s --%s--> %s", (from, event, to) => {
    expect(transition(from, event)).toBe(to);
  });

  it("leaves every other pair unchanged", () => {
    for (const from of STATES) {
      for (const event of EVENTS) {
        const listed = TABLE.some(([f, e]) => f === from && e === event);
        if (!listed) {
          expect(transition(from, event), `${from} --${event}-->`).toBe(from);
        }
      }
    }
  });

  it("walks a full session", () => {
    const events: SessionEvent[] = [
      "read_started",
      "write_submitted",
      "write_completed",
      "stop_requested",
      "write_completed",
      "handles_closing",
      "handles_closed",
      "loop_closed",
    ];
    expect(events.reduce<SessionState>(transition, "idle")).toBe("done");
  });
});
