import { describe, it, expect } from "vitest";
import {
  BusyError,
  EchoError,
  InitError,
  ModeError,
  RuntimeError,
  StartError,
  WriteError,
  isEchoError,
  toEchoError,
} from "./errors.js";
import { UV_EBADF, UV_EBUSY, UV_EIO, UV_ENOTTY, UV_EOF, statusDescription, statusName } from "./status.js";

describe("EchoError", () => {
  it("formats operation, description and name", () => {
    const error = new RuntimeError("read", UV_EOF);
    expect(error.message).toBe("Error calling read: end of file (EOF)");
    expect(error.operation).toBe("read");
    expect(error.status).toBe(UV_EOF);
    expect(error.statusName).toBe("EOF");
    expect(error.description).toBe("end of file");
  });

  it("describes arbitrary negative statuses from the error map", () => {
    const error = new RuntimeError("read", -1);
    expect(error.message).toBe(
      `Error calling read: ${statusDescription(-1)} (${statusName(-1)})`,
    );
  });

  it("tags each subclass with name and kind", () => {
    const cases: Array<[EchoError, string, string]> = [
      [new InitError("bind_terminal_input", UV_EBADF), "InitError", "init"],
      [new ModeError("set_raw_mode", UV_ENOTTY), "ModeError", "mode"],
      [new StartError("start_reading", UV_EBADF), "StartError", "start"],
      [new BusyError("submit_write"), "BusyError", "busy"],
      [new WriteError("submit_write", UV_EBADF), "WriteError", "write"],
      [new RuntimeError("run", UV_EIO), "RuntimeError", "runtime"],
    ];

    for (const [error, name, kind] of cases) {
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(EchoError);
      expect(error.name).toBe(name);
      expect(error.kind).toBe(kind);
    }
  });

  it("BusyError always reports EBUSY", () => {
    const error = new BusyError("submit_write");
    expect(error.status).toBe(UV_EBUSY);
    expect(error.message).toBe("Error calling submit_write: resource busy or locked (EBUSY)");
  });
});

describe("isEchoError", () => {
  it("recognizes the taxonomy only", () => {
    expect(isEchoError(new ModeError("set_raw_mode", UV_ENOTTY))).toBe(true);
    expect(isEchoError(new Error("plain"))).toBe(false);
    expect(isEchoError({ operation: "read", status: UV_EOF })).toBe(false);
  });
});

describe("toEchoError", () => {
  it("passes echo errors through unchanged", () => {
    const error = new StartError("start_reading", UV_EBADF);
    expect(toEchoError(error, "other")).toBe(error);
  });

  it("wraps foreign errors as RuntimeError", () => {
    const wrapped = toEchoError(Object.assign(new Error("bad fd"), { code: "EBADF" }), "close_loop");
    expect(wrapped).toBeInstanceOf(RuntimeError);
    expect(wrapped.operation).toBe("close_loop");
    expect(wrapped.status).toBe(UV_EBADF);
  });

  it("wraps non-errors with EIO", () => {
    const wrapped = toEchoError("string failure", "run");
    expect(wrapped.status).toBe(UV_EIO);
    expect(wrapped.message).toBe("Error calling run: i/o error (EIO)");
  });
});
