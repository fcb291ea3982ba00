import { describe, expect, it } from "vitest";
import { deepEqual, reuseIfEqual, shareRecord } from "../core/equality";
import { msg } from "../core/messages";
import { initialModel } from "../core/model";
import { createPropsSelector, propsEqual, toProps } from "../core/props";
import { transition } from "../core/update";
import { makeHand } from "./helpers";

const loaded = transition(initialModel(), msg.loadHand(makeHand(), "REPLAY")).model;

describe("deepEqual", () => {
  it("compares plain data by value", () => {
    expect(deepEqual({ a: [1, { b: "x" }] }, { a: [1, { b: "x" }] })).toBe(true);
    expect(deepEqual({ a: [1, 2] }, { a: [1, 2, 3] })).toBe(false);
    expect(deepEqual({ a: 1 }, { b: 1 })).toBe(false);
    expect(deepEqual([], {})).toBe(false);
    expect(deepEqual(null, {})).toBe(false);
    expect(deepEqual(Number.NaN, Number.NaN)).toBe(true);
  });

  it("keeps the previous reference when values match", () => {
    const prev = ["AS", "KD"];
    expect(reuseIfEqual(prev, ["AS", "KD"])).toBe(prev);
    const prevRecord = { 1: { stack: 10 }, 2: { stack: 20 } };
    const next = shareRecord(prevRecord, { 1: { stack: 10 }, 2: { stack: 25 } });
    expect(next).not.toBe(prevRecord);
    expect(next[1]).toBe(prevRecord[1]);
    expect(shareRecord(prevRecord, { 1: { stack: 10 }, 2: { stack: 20 } })).toBe(prevRecord);
  });
});

describe("toProps", () => {
  it("lists seats in seat order with their number", () => {
    const props = toProps(loaded);
    expect(props.seats.map((s) => [s.seat, s.name])).toEqual([
      [0, "Alice"],
      [1, "Bob"],
      [2, "Cara"],
    ]);
    expect(props.reviewLength).toBe(8);
    expect(props.sessionMode).toBe("REPLAY");
  });
});

describe("createPropsSelector", () => {
  it("returns the same Props for a value-equal model", () => {
    const select = createPropsSelector();
    const first = select(loaded);
    expect(select({ ...loaded })).toBe(first);
  });

  it("ignores model fields the view does not render", () => {
    const select = createPropsSelector();
    const first = select(loaded);
    expect(select({ ...loaded, txId: loaded.txId + 5, engineBusy: true })).toBe(first);
  });

  it("produces new Props when something visible changes", () => {
    const select = createPropsSelector();
    const first = select(loaded);
    const next = select(transition(loaded, msg.themeChanged("midnight")).model);
    expect(next).not.toBe(first);
    expect(next.themeId).toBe("midnight");
    expect(propsEqual(first, toProps(loaded))).toBe(true);
  });
});
