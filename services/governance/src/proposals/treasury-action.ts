import { DEFAULT_IDENTITY } from "@sealvote/shared";
import { ValidationError } from "../errors/index.js";
import type { TreasuryAction, TreasuryActionInput } from "../types.js";

function invalid(reason: string, input: TreasuryActionInput): ValidationError {
  return new ValidationError("INVALID_TREASURY_ACTION", reason, { kind: input.kind });
}

/**
 * Checks the kind-specific shape of a treasury action and narrows it.
 * Runs at proposal creation and again right before execution.
 */
export function validateTreasuryAction(input: TreasuryActionInput): TreasuryAction {
  if (input.recipient === DEFAULT_IDENTITY) {
    throw invalid("Treasury action needs a recipient", input);
  }

  switch (input.kind) {
    case "send_native":
      if (input.amount === 0n) throw invalid("Native transfer amount must be positive", input);
      if (input.tokenMint !== undefined) throw invalid("Native transfer cannot name a token mint", input);
      return { kind: "send_native", amount: input.amount, recipient: input.recipient };

    case "send_token":
      if (input.amount === 0n) throw invalid("Token transfer amount must be positive", input);
      if (input.tokenMint === undefined || input.tokenMint === DEFAULT_IDENTITY) {
        throw new ValidationError("TOKEN_MINT_REQUIRED", "Token transfer requires a token mint", {
          kind: input.kind,
        });
      }
      return {
        kind: "send_token",
        amount: input.amount,
        recipient: input.recipient,
        tokenMint: input.tokenMint,
      };

    case "custom":
      if (input.amount !== 0n) throw invalid("Custom action must carry a zero amount", input);
      if (input.tokenMint !== undefined) throw invalid("Custom action cannot name a token mint", input);
      return { kind: "custom", amount: 0n, recipient: input.recipient };
  }
}
