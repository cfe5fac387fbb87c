// =============================================================================
// RedemptionEngine — pays out one ledger entry at a time once the chain is over
//
// Succeeded: entry i receives the asset at i-1; entry 0 wraps to the last one.
// Expired:   entry i receives its own asset back.
// =============================================================================

import type { Address } from 'viem';
import { isAddress, isAddressEqual } from 'viem';
import type { CustodyLedger } from './ledger.js';
import { ChainStatus } from './types.js';
import type {
  AssetCustodyProvider,
  DepositRecord,
  Logger,
  Minter,
  RedemptionReceipt,
} from './types.js';
import {
  ChainActiveError,
  CustodyTransferError,
  MintFailedError,
  NothingToRedeemError,
} from './errors.js';

export interface RedemptionEngineOptions {
  ledger: CustodyLedger;
  custody: AssetCustodyProvider;
  escrowAddress: Address;
  minter?: Minter;
  logger?: Logger;
}

export class RedemptionEngine {
  private ledger: CustodyLedger;
  private custody: AssetCustodyProvider;
  private escrowAddress: Address;
  private minter?: Minter;
  private logger?: Logger;

  constructor(options: RedemptionEngineOptions) {
    this.ledger = options.ledger;
    this.custody = options.custody;
    this.escrowAddress = options.escrowAddress;
    this.minter = options.minter;
    this.logger = options.logger;
  }

  /**
   * Redeem a single entry. Throws NothingToRedeemError when the caller is not
   * the depositor, the entry is consumed, or the index is out of range.
   */
  redeemAt(index: number, caller: Address, status: ChainStatus): RedemptionReceipt {
    this.assertNotActive(status);

    if (!this.canRedeem(index, caller)) {
      throw new NothingToRedeemError(index, caller);
    }
    return this.redeem(index, status);
  }

  /**
   * Best-effort batch: every index the caller can redeem, in ledger order.
   * Entries that fail the precondition are skipped without error. A failed
   * transfer leaves its entry claimable and the batch moves on; a failed mint
   * still counts as paid out.
   */
  redeemAll(caller: Address, status: ChainStatus): RedemptionReceipt[] {
    this.assertNotActive(status);

    const receipts: RedemptionReceipt[] = [];
    for (let i = 0; i < this.ledger.length; i++) {
      // Re-checked per index: a transfer hook may have redeemed later entries already
      if (!this.canRedeem(i, caller)) continue;
      try {
        receipts.push(this.redeem(i, status));
      } catch (err) {
        if (err instanceof MintFailedError) {
          receipts.push(err.receipt);
        } else if (!(err instanceof CustodyTransferError)) {
          throw err;
        }
      }
    }
    return receipts;
  }

  /**
   * Precondition: caller deposited the entry and it is not consumed yet.
   */
  canRedeem(index: number, caller: Address): boolean {
    if (!isAddress(caller, { strict: false })) return false;
    const record = this.ledger.at(index);
    if (!record) return false;
    return !record.consumed && isAddressEqual(record.depositor, caller);
  }

  // ---------------------------------------------------------------------------
  // Per-entry redemption
  // ---------------------------------------------------------------------------

  private redeem(index: number, status: ChainStatus): RedemptionReceipt {
    const records = this.ledger.snapshot();
    const cur = records[index];
    if (!cur) {
      throw new RangeError(`No ledger entry at index ${index}`);
    }

    // Consumed goes true before any external call; a re-entrant redemption
    // of this index now fails its precondition.
    this.ledger.markConsumed(index);

    const payout = this.selectPayout(records, index, status);
    if (!payout) {
      return { index, recipient: cur.depositor, kind: 'none', minted: false };
    }

    try {
      this.custody.transfer(payout.assetClass, payout.assetId, this.escrowAddress, cur.depositor);
    } catch (err) {
      this.ledger.restoreConsumed(index);
      const message = err instanceof Error ? err.message : String(err);
      this.log('error', `Transfer for entry ${index} failed`, { error: message });
      throw new CustodyTransferError(`Custody transfer failed: ${message}`, index, err);
    }

    const receipt: RedemptionReceipt = {
      index,
      recipient: cur.depositor,
      kind: status === ChainStatus.Succeeded ? 'trade' : 'refund',
      assetClass: payout.assetClass,
      assetId: payout.assetId,
      minted: false,
    };

    if (receipt.kind === 'trade' && this.minter) {
      try {
        this.minter.mintFor(cur.depositor);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        this.log('error', `Mint for ${cur.depositor} failed`, { index, error: message });
        throw new MintFailedError(`Minting failed: ${message}`, receipt, err);
      }
      receipt.minted = true;
    }

    return receipt;
  }

  /**
   * The asset owed to entry `index`, or undefined when the status pays nothing.
   */
  private selectPayout(
    records: readonly Readonly<DepositRecord>[],
    index: number,
    status: ChainStatus,
  ): Readonly<DepositRecord> | undefined {
    switch (status) {
      case ChainStatus.Expired:
        return records[index];
      case ChainStatus.Succeeded: {
        // Wrap-around: entry 0 is owed the final (winning) deposit
        const prev = index === 0 ? records.length - 1 : index - 1;
        return records[prev];
      }
      default:
        return undefined;
    }
  }

  private assertNotActive(status: ChainStatus): void {
    if (status === ChainStatus.Active) {
      throw new ChainActiveError();
    }
  }

  private log(level: 'info' | 'warn' | 'error', msg: string, data?: unknown): void {
    if (this.logger) {
      this.logger[level](`[TradeUp] ${msg}`, data);
    }
  }
}
