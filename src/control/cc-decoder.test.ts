import { describe, expect, it } from "vitest";
import { decodeControlChange, parseMidiStream, type ControlMapping } from "./cc-decoder.js";

const mapping: ControlMapping = {
  playController: 117,
  recordController: 118,
  valueMode: "threshold",
  threshold: 64,
};

describe("parseMidiStream", () => {
  it("splits complete messages", () => {
    expect(parseMidiStream([0xb0, 117, 127, 0xb0, 118, 0])).toEqual([
      [0xb0, 117, 127],
      [0xb0, 118, 0],
    ]);
  });

  it("applies running status", () => {
    expect(parseMidiStream([0xb2, 117, 127, 118, 127])).toEqual([
      [0xb2, 117, 127],
      [0xb2, 118, 127],
    ]);
  });

  it("skips realtime bytes inside a message", () => {
    expect(parseMidiStream([0xb0, 0xf8, 117, 0xfa, 100])).toEqual([[0xb0, 117, 100]]);
  });

  it("skips sysex and resumes afterwards", () => {
    expect(parseMidiStream([0xf0, 0x7e, 0x01, 0x02, 0xf7, 0xb0, 118, 64])).toEqual([[0xb0, 118, 64]]);
  });

  it("handles one-byte program changes and drops truncated tails", () => {
    expect(parseMidiStream([0xc0, 5, 0xb0, 117])).toEqual([[0xc0, 5]]);
  });

  it("ignores data bytes with no status", () => {
    expect(parseMidiStream([117, 127, 0xb0, 117, 0])).toEqual([[0xb0, 117, 0]]);
  });
});

describe("decodeControlChange", () => {
  it("maps the play controller to a play event", () => {
    expect(decodeControlChange([0xb0, 117, 127], mapping, 1000)).toEqual({
      kind: "event",
      event: { signal: "play", value: "on", receivedAt: 1000 },
    });
  });

  it("uses the threshold to decide on or off", () => {
    const high = decodeControlChange([0xb0, 118, 64], mapping, 5);
    const low = decodeControlChange([0xb0, 118, 63], mapping, 6);

    expect(high).toEqual({ kind: "event", event: { signal: "record", value: "on", receivedAt: 5 } });
    expect(low).toEqual({ kind: "event", event: { signal: "record", value: "off", receivedAt: 6 } });
  });

  it("accepts only 0 and 127 in binary mode", () => {
    const binary: ControlMapping = { ...mapping, valueMode: "binary" };

    expect(decodeControlChange([0xb0, 117, 0], binary, 1)).toEqual({
      kind: "event",
      event: { signal: "play", value: "off", receivedAt: 1 },
    });
    expect(decodeControlChange([0xb0, 117, 90], binary, 1)).toEqual({
      kind: "malformed",
      reason: "CC 117 value 90 is neither 0 nor 127",
    });
  });

  it("ignores other controllers and other message types", () => {
    expect(decodeControlChange([0xb0, 7, 100], mapping)).toEqual({ kind: "ignored" });
    expect(decodeControlChange([0x90, 117, 100], mapping)).toEqual({ kind: "ignored" });
  });

  it("filters by channel when one is configured", () => {
    const channelTwo: ControlMapping = { ...mapping, channel: 2 };

    expect(decodeControlChange([0xb0, 117, 127], channelTwo)).toEqual({ kind: "ignored" });
    expect(decodeControlChange([0xb1, 117, 127], channelTwo, 3)).toEqual({
      kind: "event",
      event: { signal: "play", value: "on", receivedAt: 3 },
    });
  });

  it("reports truncated and out-of-range messages", () => {
    expect(decodeControlChange([0xb0, 117], mapping)).toEqual({
      kind: "malformed",
      reason: "Control change needs 2 data bytes, got 1",
    });
    expect(decodeControlChange([0xb0, 117, 200], mapping)).toEqual({
      kind: "malformed",
      reason: "Data byte out of range in [176, 117, 200]",
    });
  });
});
