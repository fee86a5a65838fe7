// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/engine-core/engine`
 * Purpose: Transfer interceptor that wraps every ledger transfer with fee, registry, reward and vesting steps.
 * Scope: Orchestration. Plans one call on an EngineDraft, then commits it in one step.
 * Invariants:
 * - CALL_ORDER: registry update → fee application → distributor alternation → vesting check → ledger commit
 * - CALL_ATOMIC: any failed precondition discards the draft; no fee sub-transfer, roster append or cursor move survives
 * - NO_REENTRY: a transfer started while another is in progress (e.g. from a transfer listener) is rejected
 * - ONE_DISTRIBUTOR_PER_CALL: a qualifying call runs exactly one distributor and flips the alternation flag
 * Side-effects: mutates the ledger and engine state on commit; logs through the injected logger
 * @public
 */

import type { Account } from "@dualpool/ids";
import { NULL_ACCOUNT, SINK_ACCOUNT } from "@dualpool/ids/well-known";
import {
  type ClockPort,
  type CodeInspectorPort,
  type LedgerPort,
  NullAccountError,
  type WeightSourcePort,
} from "@dualpool/token-ledger";

import { AdminController } from "./admin";
import { BurnLedger } from "./burn-ledger";
import {
  type EngineConfig,
  type EngineSettings,
  settingsFromConfig,
} from "./config";
import { RewardDistributor, type WeightedRoster } from "./distributor";
import {
  commitDraft,
  type EngineDraft,
  type EngineFlags,
  type EngineParts,
  openDraft,
} from "./draft";
import {
  ContractSellerError,
  ReentrantCallError,
  TradingNotOpenError,
} from "./errors";
import { splitFee } from "./fee-splitter";
import { HolderRegistry } from "./holder-registry";
import { type LoggerLike, silentLogger } from "./logger";
import type {
  DistributorCursor,
  FeeBreakdown,
  Payout,
  PoolId,
  Release,
  TransferClass,
  TransferReceipt,
} from "./model";
import { VestingSchedule, type VestingState } from "./vesting";

export interface EnginePorts {
  readonly ledger: LedgerPort;
  readonly weightSource: WeightSourcePort;
  readonly clock: ClockPort;
  readonly codeInspector: CodeInspectorPort;
  readonly logger?: LoggerLike;
}

interface TransferRequest {
  readonly spender: Account | null;
  readonly from: Account;
  readonly to: Account;
  readonly amount: bigint;
}

/** Read-only view of engine state for logs, replay summaries and tests. */
export interface EngineSnapshot {
  readonly holderCount: number;
  readonly burnerCount: number;
  readonly burnTotal: bigint;
  readonly cursors: Readonly<Record<PoolId, DistributorCursor>>;
  readonly nextDistributor: PoolId;
  readonly pendingPairSender: Account | null;
  readonly vesting: VestingState;
}

function stringifyFees(fees: FeeBreakdown): Record<string, string> {
  return {
    lpFee: fees.lpFee.toString(),
    burnFee: fees.burnFee.toString(),
    burnLpFee: fees.burnLpFee.toString(),
    fundFee: fees.fundFee.toString(),
    net: fees.net.toString(),
  };
}

export class DualPoolEngine {
  readonly settings: EngineSettings;
  readonly holders: HolderRegistry;
  readonly burns: BurnLedger;
  readonly distributors: Readonly<Record<PoolId, RewardDistributor>>;
  readonly vesting: VestingSchedule;
  readonly admin: AdminController;

  private readonly ledger: LedgerPort;
  private weightSource: WeightSourcePort;
  private readonly clock: ClockPort;
  private readonly codeInspector: CodeInspectorPort;
  private readonly logger: LoggerLike;
  private readonly flags: EngineFlags = {
    alternation: false,
    pendingPairSender: null,
  };
  private readonly parts: EngineParts;
  private busy = false;

  constructor(config: EngineConfig, ports: EnginePorts) {
    this.ledger = ports.ledger;
    this.weightSource = ports.weightSource;
    this.clock = ports.clock;
    this.codeInspector = ports.codeInspector;
    this.logger = ports.logger ?? silentLogger;

    const settings = settingsFromConfig(config, ports.weightSource.pairAccount());
    this.settings = settings;

    this.holders = new HolderRegistry({
      isExcluded: (account) => settings.rewardExcluded.has(account),
      hasCode: (account) => ports.codeInspector.hasCode(account),
    });
    this.burns = new BurnLedger();
    this.distributors = {
      lp: new RewardDistributor(
        "lp",
        () => settings.accounts.lpRewardPool,
        () => settings.distributors.lp
      ),
      burn: new RewardDistributor(
        "burn",
        () => settings.accounts.burnRewardPool,
        () => settings.distributors.burn
      ),
    };
    this.vesting = new VestingSchedule(
      (config.vesting?.allocations ?? []).map((a) => ({
        beneficiary: a.beneficiary,
        total: a.amount,
        cycleDays: a.cycleDays,
      })),
      () => settings.vestingStart,
      () => settings.accounts.engine
    );
    this.admin = new AdminController(
      config.owner,
      settings,
      this.logger,
      (source) => {
        this.weightSource = source;
      }
    );

    this.parts = {
      ledger: this.ledger,
      holders: this.holders,
      burns: this.burns,
      distributors: this.distributors,
      vesting: this.vesting,
      flags: this.flags,
    };
  }

  balanceOf(account: Account): bigint {
    return this.ledger.balanceOf(account);
  }

  approve(owner: Account, spender: Account, amount: bigint): void {
    this.ledger.approve(owner, spender, amount);
  }

  transfer(from: Account, to: Account, amount: bigint): TransferReceipt {
    return this.execute({ spender: null, from, to, amount });
  }

  transferFrom(
    spender: Account,
    from: Account,
    to: Account,
    amount: bigint
  ): TransferReceipt {
    return this.execute({ spender, from, to, amount });
  }

  snapshot(): EngineSnapshot {
    return {
      holderCount: this.holders.roster.length,
      burnerCount: this.burns.roster.length,
      burnTotal: this.burns.total(),
      cursors: {
        lp: this.distributors.lp.cursor(),
        burn: this.distributors.burn.cursor(),
      },
      nextDistributor: this.flags.alternation ? "burn" : "lp",
      pendingPairSender: this.flags.pendingPairSender,
      vesting: this.vesting.state(),
    };
  }

  private execute(request: TransferRequest): TransferReceipt {
    if (this.busy) {
      throw new ReentrantCallError();
    }
    this.busy = true;
    try {
      const draft = openDraft(this.parts);
      const receipt = this.planOrReject(draft, request);
      const listenerFailures = commitDraft(this.parts, draft);
      // Committed: from here on nothing may turn the call into a rejection
      for (const failure of listenerFailures) {
        this.logger.error(
          {
            from: failure.notification.from,
            to: failure.notification.to,
            amount: failure.notification.amount.toString(),
            err: failure.error,
          },
          "Transfer listener failed"
        );
      }
      this.logger.debug?.(
        {
          from: receipt.from,
          to: receipt.to,
          amount: receipt.amount.toString(),
          transferClass: receipt.transferClass,
          fees: stringifyFees(receipt.fees),
          distributor: receipt.distributor,
          payouts: receipt.payouts.length,
          releases: receipt.releases.length,
          listenerFailures: listenerFailures.length,
        },
        "Transfer committed"
      );
      return receipt;
    } finally {
      this.busy = false;
    }
  }

  private planOrReject(
    draft: EngineDraft,
    request: TransferRequest
  ): TransferReceipt {
    try {
      return this.plan(draft, request);
    } catch (error) {
      this.logger.warn(
        {
          from: request.from,
          to: request.to,
          amount: request.amount.toString(),
          err: error,
        },
        "Transfer rejected"
      );
      throw error;
    }
  }

  private plan(draft: EngineDraft, request: TransferRequest): TransferReceipt {
    const { spender, from, to, amount } = request;
    const settings = this.settings;
    const now = this.clock.now();

    if (from === NULL_ACCOUNT || to === NULL_ACCOUNT) {
      throw new NullAccountError("transfer");
    }
    if (amount < 0n) {
      throw new RangeError(`Negative transfer amount: ${amount}`);
    }
    if (spender !== null) {
      draft.ledger.push({ kind: "spendAllowance", owner: from, spender, amount });
    }

    // Registry update, deferred one call so pair settlement has landed
    const pending = draft.flags.pendingPairSender;
    if (pending !== null && this.weightSource.balanceOf(pending) > 0n) {
      draft.holders.addHolder(pending);
    }

    // Fee application
    const pair = settings.accounts.pair;
    const transferClass: TransferClass =
      to === pair ? "sell" : from === pair ? "buy" : "plain";
    const exempt = settings.feeExempt.has(from) || settings.feeExempt.has(to);

    if (!exempt && transferClass !== "plain") {
      if (now < settings.launchTime) {
        throw new TradingNotOpenError(settings.launchTime, now);
      }
      if (transferClass === "sell" && this.codeInspector.hasCode(from)) {
        throw new ContractSellerError(from);
      }
    }

    const fees = splitFee(amount, transferClass, settings.rates, exempt);
    const { accounts } = settings;
    const forwards: ReadonlyArray<readonly [Account, bigint]> = [
      [accounts.lpRewardPool, fees.lpFee],
      [SINK_ACCOUNT, fees.burnFee],
      [accounts.burnRewardPool, fees.burnLpFee],
      [accounts.treasury, fees.fundFee],
    ];
    for (const [destination, fee] of forwards) {
      if (fee > 0n) {
        draft.ledger.push({
          kind: "transfer",
          from,
          to: destination,
          amount: fee,
        });
      }
    }

    // Burn contributions: the seller's burn fee, or a direct send to the sink
    draft.burns.addBurnContribution(from, fees.burnFee);
    if (to === SINK_ACCOUNT && !settings.feeExempt.has(from)) {
      draft.burns.addBurnContribution(from, fees.net);
    }

    // Distributor alternation + vesting
    let distributor: PoolId | null = null;
    let payouts: readonly Payout[] = [];
    let releases: readonly Release[] = [];
    const internal =
      from === accounts.engine ||
      from === accounts.lpRewardPool ||
      from === accounts.burnRewardPool;

    if (!exempt && !internal) {
      distributor = draft.flags.alternation ? "burn" : "lp";
      const plan = this.distributors[distributor].plan(
        this.weightedRoster(draft, distributor),
        {
          ledger: draft.ledger,
          now,
          isExcluded: (account) => settings.rewardExcluded.has(account),
        },
        settings.batchSize,
        draft.cursors[distributor]
      );
      draft.cursors[distributor] = plan.cursor;
      payouts = plan.payouts;
      draft.flags.alternation = !draft.flags.alternation;

      const vesting = this.vesting.plan(draft.ledger, now, draft.vesting);
      draft.vesting = vesting.state;
      releases = vesting.releases;
    }

    // Ledger commit of the net amount
    draft.ledger.push({ kind: "transfer", from, to, amount: fees.net });

    draft.flags.pendingPairSender = to === pair ? from : null;

    return {
      from,
      to,
      amount,
      spender,
      transferClass,
      fees,
      holdersAdded: draft.holders.added(),
      burnContributions: draft.burns.contributions(),
      distributor,
      payouts,
      releases,
    };
  }

  private weightedRoster(draft: EngineDraft, pool: PoolId): WeightedRoster {
    if (pool === "lp") {
      return {
        roster: draft.holders.roster,
        weightOf: (account) => this.weightSource.balanceOf(account),
        totalWeight: () => this.weightSource.totalSupply(),
      };
    }
    return {
      roster: draft.burns.roster,
      weightOf: (account) => draft.burns.contributionOf(account),
      totalWeight: () => draft.burns.total(),
    };
  }
}
