/**
 * Record Store Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { MemoryRecordStore, readRecord, writeRecord } from "../store/record-store.js";
import { incentiveCreditCodec } from "../codec/records.js";
import { ALICE, BOB } from "./helpers.js";

describe("MemoryRecordStore", () => {
  let store: MemoryRecordStore;

  beforeEach(() => {
    store = new MemoryRecordStore();
  });

  it("should apply transaction writes when the callback returns", () => {
    const result = store.transaction(() => {
      store.putBytes("a", new Uint8Array([1, 2, 3]));
      return "done";
    });

    expect(result).toBe("done");
    expect(store.getBytes("a")).toEqual(new Uint8Array([1, 2, 3]));
    expect(store.getStatistics()).toEqual({ records: 1, committed: 1, aborted: 0 });
  });

  it("should discard transaction writes when the callback throws", () => {
    store.putBytes("a", new Uint8Array([1]));

    expect(() =>
      store.transaction(() => {
        store.putBytes("a", new Uint8Array([9]));
        store.putBytes("b", new Uint8Array([9]));
        throw new Error("rejected");
      })
    ).toThrow("rejected");

    expect(store.getBytes("a")).toEqual(new Uint8Array([1]));
    expect(store.has("b")).toBe(false);
    expect(store.getStatistics()).toEqual({ records: 1, committed: 0, aborted: 1 });
  });

  it("should read its own uncommitted writes inside a transaction", () => {
    store.transaction(() => {
      store.putBytes("a", new Uint8Array([4]));
      expect(store.has("a")).toBe(true);
      expect(store.getBytes("a")).toEqual(new Uint8Array([4]));
    });
  });

  it("should join a nested transaction to the outer one", () => {
    expect(() =>
      store.transaction(() => {
        store.transaction(() => {
          store.putBytes("inner", new Uint8Array([1]));
        });
        throw new Error("outer failed");
      })
    ).toThrow("outer failed");

    expect(store.has("inner")).toBe(false);
  });

  it("should hand out copies of stored bytes", () => {
    const original = new Uint8Array([5, 6]);
    store.putBytes("a", original);
    original[0] = 0;

    const read = store.getBytes("a");
    if (read) read[1] = 0;

    expect(store.getBytes("a")).toEqual(new Uint8Array([5, 6]));
  });

  it("should read and write records through a codec", () => {
    writeRecord(store, incentiveCreditCodec, "credit", { owner: ALICE, amount: 42n });

    expect(readRecord(store, incentiveCreditCodec, "credit")).toEqual({ owner: ALICE, amount: 42n });
    expect(readRecord(store, incentiveCreditCodec, BOB)).toBeUndefined();
    expect(store.size).toBe(1);
  });
});
