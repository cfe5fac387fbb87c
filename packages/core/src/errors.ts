// =============================================================================
// TradeUp Custom Errors
// Typed errors for deposits, redemption and configuration
// =============================================================================

import type { Address } from 'viem';
import type { ChainStatus, RedemptionReceipt } from './types.js';

/**
 * Base error for all TradeUp errors.
 */
export class TradeUpError extends Error {
  public readonly code: string;

  constructor(message: string, code: string = 'TRADEUP_ERROR') {
    super(message);
    this.name = 'TradeUpError';
    this.code = code;
    // Fix prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type MalformedDepositReason = 'unexpected-data' | 'untrusted-caller' | 'not-in-custody';

/**
 * Thrown when a deposit notification cannot be trusted.
 * Raised before the ledger is touched.
 */
export class MalformedDepositError extends TradeUpError {
  public readonly reason: MalformedDepositReason;
  public readonly originalError?: unknown;

  constructor(message: string, reason: MalformedDepositReason, originalError?: unknown) {
    super(message, 'MALFORMED_DEPOSIT');
    this.name = 'MalformedDepositError';
    this.reason = reason;
    this.originalError = originalError;
  }
}

/**
 * Thrown when the acceptance gate refuses a deposit.
 */
export class DepositRejectedError extends TradeUpError {
  public readonly statusBefore: ChainStatus;
  public readonly statusAfter?: ChainStatus;

  constructor(message: string, statusBefore: ChainStatus, statusAfter?: ChainStatus) {
    super(message, 'DEPOSIT_REJECTED');
    this.name = 'DepositRejectedError';
    this.statusBefore = statusBefore;
    this.statusAfter = statusAfter;
  }
}

/**
 * Thrown for any redemption attempt while the chain is still active.
 */
export class ChainActiveError extends TradeUpError {
  constructor() {
    super('Chain is still active; redemption opens on success or expiry', 'CHAIN_ACTIVE');
    this.name = 'ChainActiveError';
  }
}

/**
 * Thrown by redeemAt when the caller has nothing to claim at the index.
 */
export class NothingToRedeemError extends TradeUpError {
  public readonly index: number;

  constructor(index: number, caller: Address) {
    super(`Nothing to redeem at index ${index} for ${caller}`, 'NOTHING_TO_REDEEM');
    this.name = 'NothingToRedeemError';
    this.index = index;
  }
}

/**
 * Thrown when the custody provider fails to move an asset during redemption.
 * The entry is left unconsumed.
 */
export class CustodyTransferError extends TradeUpError {
  public readonly index: number;
  public readonly originalError?: unknown;

  constructor(message: string, index: number, originalError?: unknown) {
    super(message, 'CUSTODY_TRANSFER_FAILED');
    this.name = 'CustodyTransferError';
    this.index = index;
    this.originalError = originalError;
  }
}

/**
 * Thrown when the minting collaborator fails after the trade transfer went through.
 * `receipt` describes the payout that did happen.
 */
export class MintFailedError extends TradeUpError {
  public readonly recipient: Address;
  public readonly receipt: RedemptionReceipt;
  public readonly originalError?: unknown;

  constructor(message: string, receipt: RedemptionReceipt, originalError?: unknown) {
    super(message, 'MINT_FAILED');
    this.name = 'MintFailedError';
    this.recipient = receipt.recipient;
    this.receipt = receipt;
    this.originalError = originalError;
  }
}

/**
 * Thrown when TradeUpConfig does not describe a usable chain.
 */
export class InvalidConfigError extends TradeUpError {
  public readonly field: string;

  constructor(message: string, field: string) {
    super(message, 'INVALID_CONFIG');
    this.name = 'InvalidConfigError';
    this.field = field;
  }
}
