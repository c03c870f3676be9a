import { describe, it, expect } from "vitest";
import {
  UV_EBADF,
  UV_EBUSY,
  UV_EINVAL,
  UV_EIO,
  UV_ENOTTY,
  UV_EOF,
  isFailure,
  statusCode,
  statusDescription,
  statusFromError,
  statusName,
} from "./status.js";

describe("status codes", () => {
  it("uses libuv's fixed EOF code", () => {
    expect(UV_EOF).toBe(-4095);
    expect(statusName(UV_EOF)).toBe("EOF");
    expect(statusDescription(UV_EOF)).toBe("end of file");
  });

  it("resolves codes by name", () => {
    expect(statusCode("EBUSY")).toBe(UV_EBUSY);
    expect(statusName(UV_EBUSY)).toBe("EBUSY");
    expect(statusDescription(UV_EBUSY)).toBe("resource busy or locked");
    expect(statusDescription(UV_EINVAL)).toBe("invalid argument");
  });

  it("all error codes are negative", () => {
    for (const code of [UV_EOF, UV_EBUSY, UV_EINVAL, UV_EBADF, UV_ENOTTY, UV_EIO]) {
      expect(code).toBeLessThan(0);
      expect(isFailure(code)).toBe(true);
    }
    expect(isFailure(0)).toBe(false);
  });

  it("throws for unknown names", () => {
    expect(() => statusCode("ENOTANERROR")).toThrow(RangeError);
  });

  it("falls back for unknown codes", () => {
    expect(statusName(-987654)).toBe("Unknown system error -987654");
    expect(statusDescription(-987654)).toBe("unknown error -987654");
  });
});

describe("statusFromError", () => {
  it("takes a negative errno as-is", () => {
    expect(statusFromError({ errno: UV_EBADF, code: "EBADF" })).toBe(UV_EBADF);
  });

  it("negates a positive errno", () => {
    expect(statusFromError({ errno: -UV_EBADF })).toBe(UV_EBADF);
  });

  it("maps a libuv code name", () => {
    expect(statusFromError({ code: "ENOTTY" })).toBe(UV_ENOTTY);
  });

  it("prefers the wrapped system code over a Node error code", () => {
    const error = { code: "ERR_TTY_INIT_FAILED", info: { code: "EINVAL" } };
    expect(statusFromError(error)).toBe(UV_EINVAL);
  });

  it("maps anything else to EIO", () => {
    expect(statusFromError(new Error("boom"))).toBe(UV_EIO);
    expect(statusFromError({ code: "ERR_SOMETHING" })).toBe(UV_EIO);
    expect(statusFromError("nope")).toBe(UV_EIO);
    expect(statusFromError(null)).toBe(UV_EIO);
  });
});
