/**
 * Vote Receipts
 *
 * A receipt holds the salt a voter needs to reveal. Without it the
 * committed vote can never be counted, so receipts are written to disk
 * before the commit is submitted.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { z } from "zod";
import { bytes32Schema, identitySchema, sdkLogger } from "@sealvote/shared";

const receiptLogger = sdkLogger.child({ component: "receipt-store" });

// ============================================
// SCHEMA
// ============================================

export const voteReceiptSchema = z.object({
  proposal: bytes32Schema,
  voter: identitySchema,
  vote: z.boolean(),
  salt: bytes32Schema,
  commitment: bytes32Schema,
  keeper: identitySchema.optional(),
  delegated: z.boolean().default(false),
  committedAt: z.string().datetime(),
  revealedAt: z.string().datetime().optional(),
});

export type VoteReceipt = z.infer<typeof voteReceiptSchema>;

export function receiptId(proposal: string, voter: string): string {
  return `${proposal.slice(2).toLowerCase()}-${voter.slice(2).toLowerCase()}`;
}

// ============================================
// STORE INTERFACE
// ============================================

export interface ReceiptStore {
  save(receipt: VoteReceipt): Promise<void>;
  load(proposal: string, voter: string): Promise<VoteReceipt | null>;
  list(): Promise<VoteReceipt[]>;
  remove(proposal: string, voter: string): Promise<void>;
}

export async function markRevealed(
  store: ReceiptStore,
  receipt: VoteReceipt,
  at: Date = new Date()
): Promise<VoteReceipt> {
  const revealed = { ...receipt, revealedAt: at.toISOString() };
  await store.save(revealed);
  return revealed;
}

// ============================================
// IN-MEMORY
// ============================================

export class InMemoryReceiptStore implements ReceiptStore {
  private readonly receipts = new Map<string, VoteReceipt>();

  async save(receipt: VoteReceipt): Promise<void> {
    this.receipts.set(receiptId(receipt.proposal, receipt.voter), { ...receipt });
  }

  async load(proposal: string, voter: string): Promise<VoteReceipt | null> {
    const receipt = this.receipts.get(receiptId(proposal, voter));
    return receipt ? { ...receipt } : null;
  }

  async list(): Promise<VoteReceipt[]> {
    return Array.from(this.receipts.values(), (receipt) => ({ ...receipt }));
  }

  async remove(proposal: string, voter: string): Promise<void> {
    this.receipts.delete(receiptId(proposal, voter));
  }
}

// ============================================
// FILE SYSTEM
// ============================================

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * One JSON file per proposal/voter pair under basePath.
 */
export class FileReceiptStore implements ReceiptStore {
  constructor(private readonly basePath: string) {}

  private filePath(proposal: string, voter: string): string {
    return path.join(this.basePath, `${receiptId(proposal, voter)}.json`);
  }

  async save(receipt: VoteReceipt): Promise<void> {
    const validated = voteReceiptSchema.parse(receipt);
    const filePath = this.filePath(validated.proposal, validated.voter);
    const tempPath = `${filePath}.tmp`;

    await fs.mkdir(this.basePath, { recursive: true });
    await fs.writeFile(tempPath, JSON.stringify(validated, null, 2), "utf-8");
    await fs.rename(tempPath, filePath);

    receiptLogger.debug(
      { proposal: validated.proposal, voter: validated.voter, filePath },
      "Vote receipt saved"
    );
  }

  async load(proposal: string, voter: string): Promise<VoteReceipt | null> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath(proposal, voter), "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
    return voteReceiptSchema.parse(JSON.parse(content));
  }

  async list(): Promise<VoteReceipt[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.basePath);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const receipts: VoteReceipt[] = [];
    for (const entry of entries.filter((name) => name.endsWith(".json")).sort()) {
      const content = await fs.readFile(path.join(this.basePath, entry), "utf-8");
      receipts.push(voteReceiptSchema.parse(JSON.parse(content)));
    }
    return receipts;
  }

  async remove(proposal: string, voter: string): Promise<void> {
    await fs.rm(this.filePath(proposal, voter), { force: true });
  }
}
