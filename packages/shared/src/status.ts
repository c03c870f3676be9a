/**
 * Runtime status codes.
 *
 * The event loop reports outcomes the way libuv does: `0` for success and a
 * negative error code otherwise. Names and descriptions come from the libuv
 * error map Node exposes, so `-4095` reads as `EOF` / `end of file` on every
 * platform.
 */

import { getSystemErrorMap } from "node:util";

/** A runtime status: 0 on success, a negative libuv error code on failure. */
export type Status = number;

const errorMap = getSystemErrorMap();

const codesByName = new Map<string, Status>(
  [...errorMap.entries()].map(([code, [name]]) => [name, code]),
);

/** Look up the status code for a libuv error name such as `"EBUSY"`. */
export function statusCode(name: string): Status {
  const code = codesByName.get(name);
  if (code === undefined) {
    throw new RangeError(`Unknown runtime error name: ${name}`);
  }
  return code;
}

export const UV_EOF: Status = statusCode("EOF");
export const UV_EBUSY: Status = statusCode("EBUSY");
export const UV_EINVAL: Status = statusCode("EINVAL");
export const UV_EBADF: Status = statusCode("EBADF");
export const UV_EALREADY: Status = statusCode("EALREADY");
export const UV_ENOBUFS: Status = statusCode("ENOBUFS");
export const UV_ENOTTY: Status = statusCode("ENOTTY");
export const UV_EIO: Status = statusCode("EIO");

export function isFailure(status: Status): boolean {
  return status < 0;
}

/** Symbolic name of a status, e.g. `EOF`. */
export function statusName(status: Status): string {
  return errorMap.get(status)?.[0] ?? `Unknown system error ${status}`;
}

/** Human-readable description of a status, e.g. `end of file`. */
export function statusDescription(status: Status): string {
  return errorMap.get(status)?.[1] ?? `unknown error ${status}`;
}

/**
 * Derive a status from a thrown or emitted Node error.
 *
 * System errors carry a negative `errno`; some wrap the underlying code under
 * `info`. Anything unrecognised maps to `EIO`.
 */
export function statusFromError(error: unknown): Status {
  if (typeof error !== "object" || error === null) {
    return UV_EIO;
  }

  if ("errno" in error && typeof error.errno === "number" && error.errno !== 0) {
    return error.errno < 0 ? error.errno : -error.errno;
  }

  const info = "info" in error ? error.info : undefined;
  for (const source of [info, error]) {
    if (typeof source === "object" && source !== null && "code" in source) {
      const code = source.code;
      if (typeof code === "string" && codesByName.has(code)) {
        return statusCode(code);
      }
    }
  }

  return UV_EIO;
}
