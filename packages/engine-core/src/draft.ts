// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/engine-core/draft`
 * Purpose: Working copy of everything one transfer may change: pending ledger operations plus staged engine state.
 * Scope: Opening and committing drafts. Planning logic lives in engine.ts and the component modules.
 * Invariants:
 * - DRAFT_ISOLATED: nothing in a draft is visible outside it until commitDraft()
 * - An abandoned draft leaves no trace (atomic rollback is "drop the draft")
 * - commitDraft() lands engine state first, then the ledger batch; ledger validation already ran on the overlay
 * Side-effects: none until commitDraft (which mutates the owning engine's components and the ledger)
 * @internal
 */

import type { Account } from "@dualpool/ids";
import {
  LedgerOverlay,
  type LedgerPort,
  type ListenerFailure,
} from "@dualpool/token-ledger";

import type { BurnLedger, BurnLedgerDraft } from "./burn-ledger";
import type { RewardDistributor } from "./distributor";
import type { HolderRegistry, HolderRegistryDraft } from "./holder-registry";
import type { DistributorCursor, PoolId } from "./model";
import type { VestingSchedule, VestingState } from "./vesting";

/** Scalar engine state that lives outside the component classes. */
export interface EngineFlags {
  /** false → LP distributor runs next, true → burn distributor */
  alternation: boolean;
  /** Sender observed transferring to the pair on the previous call */
  pendingPairSender: Account | null;
}

export interface EngineParts {
  readonly ledger: LedgerPort;
  readonly holders: HolderRegistry;
  readonly burns: BurnLedger;
  readonly distributors: Readonly<Record<PoolId, RewardDistributor>>;
  readonly vesting: VestingSchedule;
  readonly flags: EngineFlags;
}

export interface EngineDraft {
  readonly ledger: LedgerOverlay;
  readonly holders: HolderRegistryDraft;
  readonly burns: BurnLedgerDraft;
  cursors: Record<PoolId, DistributorCursor>;
  vesting: VestingState;
  flags: EngineFlags;
}

export function openDraft(parts: EngineParts): EngineDraft {
  return {
    ledger: new LedgerOverlay(parts.ledger),
    holders: parts.holders.stage(),
    burns: parts.burns.stage(),
    cursors: {
      lp: parts.distributors.lp.cursor(),
      burn: parts.distributors.burn.cursor(),
    },
    vesting: parts.vesting.state(),
    flags: { ...parts.flags },
  };
}

/** Lands the draft and returns the transfer-listener errors raised after it landed. */
export function commitDraft(
  parts: EngineParts,
  draft: EngineDraft
): readonly ListenerFailure[] {
  draft.holders.commit();
  draft.burns.commit();
  parts.distributors.lp.restore(draft.cursors.lp);
  parts.distributors.burn.restore(draft.cursors.burn);
  parts.vesting.restore(draft.vesting);
  parts.flags.alternation = draft.flags.alternation;
  parts.flags.pendingPairSender = draft.flags.pendingPairSender;
  return parts.ledger.applyBatch(draft.ledger.operations());
}
