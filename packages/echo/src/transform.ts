/**
 * Keystroke echo transform.
 *
 * Maps raw terminal input to bytes that are safe and visible when echoed:
 *
 * | input          | output             |
 * | -------------- | ------------------ |
 * | `\r`           | `\n`               |
 * | 0x00-0x1A      | `^` + `0x40 \| b`  |
 * | 0x1B-0x1F      | `^` + `0x50 \| b`  |
 * | 0x7F           | `\d`               |
 * | anything else  | unchanged          |
 *
 * Tab passes through. Output always ends with a single 0x00 byte, which is
 * written along with the rest.
 */

export const CTRL_C = 0x03;

const TAB = 0x09;
const LF = 0x0a;
const CR = 0x0d;
const DEL = 0x7f;
const CARET = 0x5e;
const BACKSLASH = 0x5c;
const LOWER_D = 0x64;
const SENTINEL = 0x00;

export interface EchoOutput {
  /** Escaped bytes, sentinel included. */
  bytes: Uint8Array;
  /** Input contained Ctrl-C. */
  terminate: boolean;
}

export function echoTransform(input: Uint8Array): EchoOutput {
  const out = new Uint8Array(input.length * 2 + 1);
  let length = 0;
  let terminate = false;

  for (const byte of input) {
    if (byte === CR) {
      out[length++] = LF;
    } else if (byte <= 0x1a && byte !== TAB) {
      if (byte === CTRL_C) terminate = true;
      out[length++] = CARET;
      out[length++] = 0x40 | byte;
    } else if (byte >= 0x1b && byte <= 0x1f) {
      out[length++] = CARET;
      out[length++] = 0x50 | byte;
    } else if (byte === DEL) {
      out[length++] = BACKSLASH;
      out[length++] = LOWER_D;
    } else {
      out[length++] = byte;
    }
  }
  out[length++] = SENTINEL;

  return { bytes: out.slice(0, length), terminate };
}
