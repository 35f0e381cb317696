import { describe, expect, it } from "vitest";
import { controlEvent, type Signal, type SignalValue } from "./control-event.js";
import { TransportStateMachine } from "./transport-state.js";

function engaged(machine: TransportStateMachine): void {
  machine.apply(controlEvent("record", "on", 0));
  machine.apply(controlEvent("play", "on", 10));
  expect(machine.settle(260)).toBe(true);
}

describe("TransportStateMachine", () => {
  it("emits a single transition once record and play settle", () => {
    const machine = new TransportStateMachine(250);

    expect(machine.apply(controlEvent("record", "on", 0))).toBeNull();
    expect(machine.apply(controlEvent("play", "on", 10))).toBeNull();
    expect(machine.settle(200)).toBeNull();
    expect(machine.settle(259)).toBeNull();
    expect(machine.settle(260)).toBe(true);
    expect(machine.settle(400)).toBeNull();
    expect(machine.active).toBe(true);
  });

  it("does not engage on play alone", () => {
    const machine = new TransportStateMachine(250);

    machine.apply(controlEvent("play", "on", 0));

    expect(machine.settle(1000)).toBeNull();
    expect(machine.snapshot()).toEqual({ active: false, pendingTarget: null, lastChangeAt: 0 });
  });

  it("absorbs repeated identical events", () => {
    const machine = new TransportStateMachine(250);
    machine.apply(controlEvent("record", "on", 0));
    for (let i = 0; i < 5; i += 1) {
      expect(machine.apply(controlEvent("play", "on", 10 + i))).toBeNull();
    }

    expect(machine.settle(264)).toBe(true);
    expect(machine.apply(controlEvent("play", "on", 300))).toBeNull();
    expect(machine.settle(600)).toBeNull();
  });

  it("releases when either signal drops", () => {
    const machine = new TransportStateMachine(250);
    engaged(machine);

    machine.apply(controlEvent("record", "off", 300));

    expect(machine.pendingTarget).toBe(false);
    expect(machine.settle(549)).toBeNull();
    expect(machine.settle(550)).toBe(false);
  });

  it("swallows a play flicker inside the window", () => {
    const machine = new TransportStateMachine(250);
    engaged(machine);

    machine.apply(controlEvent("play", "off", 300));
    machine.apply(controlEvent("play", "on", 320));

    expect(machine.pendingTarget).toBeNull();
    expect(machine.settle(570)).toBeNull();
    expect(machine.active).toBe(true);
  });

  it("collapses opposite edges on different signals into one transition", () => {
    const machine = new TransportStateMachine(250);
    engaged(machine);

    machine.apply(controlEvent("record", "off", 300));
    machine.apply(controlEvent("play", "off", 310));

    expect(machine.settle(555)).toBeNull();
    expect(machine.settle(560)).toBe(false);
    expect(machine.settle(900)).toBeNull();
  });

  it("restarts the window on every event", () => {
    const machine = new TransportStateMachine(250);
    machine.apply(controlEvent("record", "on", 0));
    machine.apply(controlEvent("play", "on", 200));

    expect(machine.settle(300)).toBeNull();
    expect(machine.remainingMs(300)).toBe(150);
    expect(machine.settle(450)).toBe(true);
  });

  it("settles an elapsed change when the next event arrives", () => {
    const machine = new TransportStateMachine(250);
    machine.apply(controlEvent("record", "on", 0));
    machine.apply(controlEvent("play", "on", 10));

    expect(machine.apply(controlEvent("play", "on", 1000))).toBe(true);
    expect(machine.settle(2000)).toBeNull();
  });

  it("emits immediately with a zero window", () => {
    const machine = new TransportStateMachine(0);

    expect(machine.apply(controlEvent("record", "on", 0))).toBeNull();
    expect(machine.apply(controlEvent("play", "on", 5))).toBe(true);
    expect(machine.apply(controlEvent("play", "off", 6))).toBe(false);
  });

  it("starts from the given initial state", () => {
    const machine = new TransportStateMachine(250, true);

    machine.apply(controlEvent("play", "on", 0));

    expect(machine.settle(250)).toBe(false);
  });

  it("rejects a negative window", () => {
    expect(() => new TransportStateMachine(-1)).toThrow(RangeError);
  });

  it("settles to the AND of the latest value of each signal", () => {
    let seed = 7;
    const next = (): number => {
      seed = (seed * 1103515245 + 12345) % 2147483648;
      return seed / 2147483648;
    };

    for (let run = 0; run < 200; run += 1) {
      const machine = new TransportStateMachine(250);
      const latest: Record<Signal, boolean> = { play: false, record: false };
      let at = 0;
      const length = 1 + Math.floor(next() * 12);
      for (let i = 0; i < length; i += 1) {
        const signal: Signal = next() < 0.5 ? "play" : "record";
        const value: SignalValue = next() < 0.5 ? "on" : "off";
        at += Math.floor(next() * 400);
        latest[signal] = value === "on";
        machine.apply(controlEvent(signal, value, at));
      }
      machine.settle(at + 250);

      expect(machine.active).toBe(latest.play && latest.record);
    }
  });
});
