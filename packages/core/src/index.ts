// =============================================================================
// @tradeup/core — Public API
// =============================================================================

// Types
export type {
  AssetId,
  AssetSpec,
  DepositRecord,
  ChainTerms,
  AssetCustodyProvider,
  Minter,
  DepositNotice,
  AssetReceiver,
  RedemptionReceipt,
  TradeUpConfig,
  Logger,
} from './types.js';
export { ANY_ASSET_ID, ChainStatus } from './types.js';

// Core classes
export { TradeUpEscrow, DEPOSIT_ACKNOWLEDGEMENT, INTERFACE_IDS } from './escrow.js';
export { CustodyLedger } from './ledger.js';
export type { LedgerEntry } from './ledger.js';
export { RedemptionEngine } from './redemption.js';
export type { RedemptionEngineOptions } from './redemption.js';

// Status + config
export {
  evaluateStatus,
  matchesStarting,
  matchesFinal,
  isTerminal,
  describeStatus,
} from './status.js';
export { parseTtl, resolveTerms } from './config.js';

// Errors
export {
  TradeUpError,
  MalformedDepositError,
  DepositRejectedError,
  ChainActiveError,
  NothingToRedeemError,
  CustodyTransferError,
  MintFailedError,
  InvalidConfigError,
} from './errors.js';
export type { MalformedDepositReason } from './errors.js';
