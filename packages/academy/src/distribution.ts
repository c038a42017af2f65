/**
 * Integer payout splitting.
 *
 * Rules:
 * - Each payout is floored independently
 * - The remainder (amount - sum of payouts) stays with the payer
 * - Payouts keep the order of the recipients
 * - No value is created: totalDistributed <= amount, always
 */

import type { Account, Amount, BasisPoints } from "@collegium/types";
import { TOTAL_BASIS_POINTS } from "@collegium/types";
import { mulDivFloor, sumAmounts } from "@collegium/ledger";
import { AcademyError } from "./errors.js";
import type { Payout, SplitResult } from "./types.js";

export interface ShareRecipient {
  readonly to: Account;
  readonly share: BasisPoints;
}

export interface WeightRecipient {
  readonly to: Account;
  readonly weight: bigint;
}

/**
 * Split `amount` by basis points: `floor(amount * share / 10000)` each.
 * Shares are not required to sum to 10000 here; the catalog enforces that.
 */
export function splitByBasisPoints(
  amount: Amount,
  recipients: readonly ShareRecipient[],
): SplitResult {
  const payouts: Payout[] = recipients.map((r) => ({
    to: r.to,
    amount: mulDivFloor(amount, BigInt(r.share), BigInt(TOTAL_BASIS_POINTS)),
  }));
  return settle(amount, payouts);
}

/**
 * Split `amount` proportionally to integer weights:
 * `floor(amount * weight / totalWeight)` each.
 *
 * @throws AcademyError NO_WEIGHT when every weight is zero
 */
export function splitByWeights(
  amount: Amount,
  recipients: readonly WeightRecipient[],
): SplitResult {
  const totalWeight = sumAmounts(recipients.map((r) => r.weight));
  if (totalWeight === 0n) {
    throw new AcademyError("NO_WEIGHT", "Total weight is zero; nothing to split by");
  }

  const payouts: Payout[] = recipients.map((r) => ({
    to: r.to,
    amount: mulDivFloor(amount, r.weight, totalWeight),
  }));
  return settle(amount, payouts);
}

function settle(amount: Amount, payouts: readonly Payout[]): SplitResult {
  const totalDistributed = sumAmounts(payouts.map((p) => p.amount));
  return { payouts, totalDistributed, remainder: amount - totalDistributed };
}
