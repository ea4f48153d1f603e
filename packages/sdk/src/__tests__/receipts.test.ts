/**
 * Receipt Store Tests
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ZodError } from "zod";
import {
  FileReceiptStore,
  InMemoryReceiptStore,
  markRevealed,
  receiptId,
  type VoteReceipt,
} from "../receipts/index.js";

const receipt = (voterByte: string): VoteReceipt => ({
  proposal: `0x${"0a".repeat(32)}`,
  voter: `0x${voterByte.repeat(32)}`,
  vote: true,
  salt: `0x${"a1".repeat(32)}`,
  commitment: `0x${"c0".repeat(32)}`,
  delegated: false,
  committedAt: "2026-01-01T00:00:00.000Z",
});

describe("receiptId", () => {
  it("should join both keys without their prefix", () => {
    expect(receiptId("0xAB", "0xCD")).toBe("ab-cd");
  });
});

describe("FileReceiptStore", () => {
  let dir: string;
  let store: FileReceiptStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "receipts-"));
    store = new FileReceiptStore(path.join(dir, "nested"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should write one file per proposal and voter", async () => {
    const saved = receipt("22");
    await store.save(saved);

    const files = await fs.readdir(path.join(dir, "nested"));
    expect(files).toEqual([`${"0a".repeat(32)}-${"22".repeat(32)}.json`]);
    expect(await store.load(saved.proposal, saved.voter)).toEqual(saved);
  });

  it("should return null for a missing receipt", async () => {
    expect(await store.load(`0x${"0a".repeat(32)}`, `0x${"99".repeat(32)}`)).toBeNull();
  });

  it("should list nothing before the directory exists", async () => {
    expect(await store.list()).toEqual([]);
  });

  it("should list receipts and skip other files", async () => {
    await store.save(receipt("33"));
    await store.save(receipt("22"));
    await fs.writeFile(path.join(dir, "nested", "notes.txt"), "ignored", "utf-8");

    const voters = (await store.list()).map((r) => r.voter);

    expect(voters).toEqual([`0x${"22".repeat(32)}`, `0x${"33".repeat(32)}`]);
  });

  it("should replace a receipt when it is marked revealed", async () => {
    const saved = receipt("22");
    await store.save(saved);

    await markRevealed(store, saved, new Date("2026-01-02T00:00:00.000Z"));

    expect((await store.load(saved.proposal, saved.voter))?.revealedAt).toBe("2026-01-02T00:00:00.000Z");
    expect(await store.list()).toHaveLength(1);
  });

  it("should remove a receipt", async () => {
    const saved = receipt("22");
    await store.save(saved);

    await store.remove(saved.proposal, saved.voter);
    await store.remove(saved.proposal, saved.voter);

    expect(await store.load(saved.proposal, saved.voter)).toBeNull();
  });

  it("should refuse a receipt with a malformed salt", async () => {
    await expect(store.save({ ...receipt("22"), salt: "0x1234" })).rejects.toThrow(ZodError);
    expect(await store.list()).toEqual([]);
  });

  it("should refuse a corrupted file on load", async () => {
    const saved = receipt("22");
    await store.save(saved);
    await fs.writeFile(path.join(dir, "nested", `${receiptId(saved.proposal, saved.voter)}.json`), "{}", "utf-8");

    await expect(store.load(saved.proposal, saved.voter)).rejects.toThrow(ZodError);
  });
});

describe("InMemoryReceiptStore", () => {
  it("should hand out copies", async () => {
    const store = new InMemoryReceiptStore();
    const saved = receipt("22");
    await store.save(saved);

    const loaded = await store.load(saved.proposal, saved.voter);
    if (loaded) loaded.vote = false;

    expect((await store.load(saved.proposal, saved.voter))?.vote).toBe(true);
  });
});
