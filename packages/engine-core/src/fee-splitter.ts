// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/engine-core/fee-splitter`
 * Purpose: Fee breakdown for a transfer amount with BIGINT floor division per component.
 * Scope: Pure function. Does not move tokens or read configuration.
 * Invariants:
 * - Only sells by non-exempt parties pay fees
 * - Each component is floor(amount * rate / 1000)
 * - net + totalFee === amount
 * Side-effects: none
 * @public
 */

import { FeeOverflowError } from "./errors";
import {
  FEE_DENOMINATOR,
  type FeeBreakdown,
  type FeeRates,
  type TransferClass,
} from "./model";

export function rateSum(rates: FeeRates): number {
  return rates.lpRate + rates.burnRate + rates.burnLpRate + rates.fundRate;
}

function share(amount: bigint, rate: number): bigint {
  return (amount * BigInt(rate)) / FEE_DENOMINATOR;
}

export function zeroFee(amount: bigint): FeeBreakdown {
  return {
    lpFee: 0n,
    burnFee: 0n,
    burnLpFee: 0n,
    fundFee: 0n,
    totalFee: 0n,
    net: amount,
  };
}

/**
 * Split a transfer amount into its fee components and the net the recipient receives.
 */
export function splitFee(
  amount: bigint,
  transferClass: TransferClass,
  rates: FeeRates,
  exempt: boolean
): FeeBreakdown {
  if (amount < 0n) {
    throw new RangeError(`Negative transfer amount: ${amount}`);
  }
  if (exempt || transferClass !== "sell") {
    return zeroFee(amount);
  }

  const lpFee = share(amount, rates.lpRate);
  const burnFee = share(amount, rates.burnRate);
  const burnLpFee = share(amount, rates.burnLpRate);
  const fundFee = share(amount, rates.fundRate);
  const totalFee = lpFee + burnFee + burnLpFee + fundFee;

  if (totalFee > amount) {
    throw new FeeOverflowError(
      `Fees ${totalFee} exceed transfer amount ${amount} (rates sum to ${rateSum(rates)}/1000)`
    );
  }

  return { lpFee, burnFee, burnLpFee, fundFee, totalFee, net: amount - totalFee };
}
