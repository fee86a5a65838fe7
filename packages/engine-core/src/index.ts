// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/engine-core`
 * Purpose: Fee-bearing transfer engine with two reward distributors and a vesting schedule.
 * Scope: Re-exports the engine, its components, config, calendar and errors. Does not contain I/O or infrastructure code.
 * Invariants: No imports from services/. Ledger access only through @dualpool/token-ledger ports.
 * Side-effects: none
 * @public
 */

// Admin
export { AdminController } from "./admin";
// Components
export {
  BurnLedger,
  BurnLedgerDraft,
  type BurnLedgerReader,
} from "./burn-ledger";
// Calendar
export {
  addDays,
  addMonths,
  addYears,
  type CalendarDate,
  daysInMonth,
  diffDays,
  diffMonths,
  diffYears,
  fromDate,
  isLeapYear,
  subDays,
  subMonths,
  subYears,
  toDate,
} from "./calendar";
// Config
export {
  AccountSchema,
  AmountSchema,
  type EngineAccounts,
  type EngineConfig,
  type EngineConfigInput,
  EngineConfigSchema,
  type EngineSettings,
  FeeRatesSchema,
  formatIssues,
  parseEngineConfig,
  settingsFromConfig,
  TimestampSchema,
} from "./config";
export {
  type DistributionContext,
  type DistributionPlan,
  INITIAL_CURSOR,
  RewardDistributor,
  type SkipReason,
  type WeightedRoster,
} from "./distributor";
// Engine
export {
  DualPoolEngine,
  type EnginePorts,
  type EngineSnapshot,
} from "./engine";
// Errors
export {
  CalendarRangeError,
  ContractSellerError,
  FeeOverflowError,
  InvalidSettingError,
  isCalendarRangeError,
  isContractSellerError,
  isFeeOverflowError,
  isInvalidSettingError,
  isNotOwnerError,
  isReentrantCallError,
  isTradingNotOpenError,
  NotOwnerError,
  ReentrantCallError,
  TradingNotOpenError,
} from "./errors";
export { rateSum, splitFee, zeroFee } from "./fee-splitter";
export { lockedTotal, mintGenesis, type OpeningBalance } from "./genesis";
export {
  HolderRegistry,
  type HolderRegistryDeps,
  HolderRegistryDraft,
} from "./holder-registry";
export { type LoggerLike, silentLogger } from "./logger";
// Model types and enums
export type {
  BurnContribution,
  DistributorCursor,
  DistributorSettings,
  FeeBreakdown,
  FeeComponent,
  FeeRates,
  LockAllocation,
  Payout,
  PoolId,
  Release,
  TransferClass,
  TransferReceipt,
} from "./model";
export {
  FEE_COMPONENTS,
  FEE_DENOMINATOR,
  POOL_IDS,
  TRANSFER_CLASSES,
} from "./model";
export {
  type MutableRoster,
  Roster,
  RosterOverlay,
  type RosterReader,
} from "./roster";
export {
  type LockAllocationSeed,
  releasedAfter,
  VestingSchedule,
  type VestingPlan,
  type VestingState,
} from "./vesting";
