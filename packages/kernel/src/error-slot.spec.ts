import { ErrorSlot } from "./error-slot.js";

describe("ErrorSlot", () => {
  it("starts empty", () => {
    const slot = new ErrorSlot();
    expect(slot.isSet).toBe(false);
    expect(slot.value).toBeUndefined();
  });

  it("keeps the first error", () => {
    const slot = new ErrorSlot();
    const first = new Error("first");
    const second = new Error("second");

    expect(slot.record(first)).toBe(true);
    expect(slot.record(second)).toBe(false);
    expect(slot.value).toBe(first);
  });

  it("reads are non-destructive", () => {
    const slot = new ErrorSlot<RangeError>();
    const error = new RangeError("out");
    slot.record(error);

    expect(slot.value).toBe(error);
    expect(slot.value).toBe(error);
    expect(slot.isSet).toBe(true);
  });
});
