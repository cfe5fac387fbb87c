// =============================================================================
// TradeUpEscrow — Main entry point
// Notify -> Verify -> Gate -> Record ... Succeed | Expire -> Redeem
// =============================================================================

import type { Address, Hex } from 'viem';
import { isAddressEqual, size, toFunctionSelector } from 'viem';
import { resolveTerms } from './config.js';
import { CustodyLedger } from './ledger.js';
import { RedemptionEngine } from './redemption.js';
import { describeStatus, isTerminal } from './status.js';
import type {
  AssetReceiver,
  ChainStatus,
  ChainTerms,
  DepositNotice,
  DepositRecord,
  RedemptionReceipt,
  TradeUpConfig,
} from './types.js';
import { MalformedDepositError, MintFailedError, TradeUpError } from './errors.js';

/** Returned from onAssetReceived so the collection accepts the transfer. */
export const DEPOSIT_ACKNOWLEDGEMENT: Hex = toFunctionSelector(
  'onERC721Received(address,address,uint256,bytes)',
);

/** ERC-165 interface ids this escrow answers to. */
export const INTERFACE_IDS = {
  ERC165: '0x01ffc9a7',
  ASSET_RECEIVER: DEPOSIT_ACKNOWLEDGEMENT,
} as const;

const defaultClock = (): number => Math.floor(Date.now() / 1000);

export class TradeUpEscrow implements AssetReceiver {
  private config: TradeUpConfig;
  private clock: () => number;
  private ledger: CustodyLedger;
  private engine: RedemptionEngine;

  readonly terms: Readonly<ChainTerms>;

  constructor(config: TradeUpConfig) {
    this.config = config;
    this.clock = config.clock ?? defaultClock;
    this.terms = resolveTerms(config, this.clock());
    this.ledger = new CustodyLedger(this.terms);
    this.engine = new RedemptionEngine({
      ledger: this.ledger,
      custody: config.custody,
      escrowAddress: this.terms.address,
      minter: config.minter,
      logger: config.logger,
    });

    this.log('info', `Chain opened at ${this.terms.address}`, {
      starting: this.terms.starting,
      final: this.terms.final,
      expiresAt: this.terms.expiresAt,
    });
  }

  get address(): Address {
    return this.terms.address;
  }

  get expiresAt(): number {
    return this.terms.expiresAt;
  }

  // ---------------------------------------------------------------------------
  // Views
  // ---------------------------------------------------------------------------

  status(): ChainStatus {
    return this.ledger.status(this.clock());
  }

  get length(): number {
    return this.ledger.length;
  }

  recordAt(index: number): Readonly<DepositRecord> | undefined {
    return this.ledger.at(index);
  }

  records(): Readonly<DepositRecord>[] {
    return this.ledger.snapshot();
  }

  /**
   * Indices `caller` could redeem right now (empty while the chain is open).
   */
  claimable(caller: Address): number[] {
    if (!isTerminal(this.status())) return [];

    const indices: number[] = [];
    for (let i = 0; i < this.ledger.length; i++) {
      if (this.engine.canRedeem(i, caller)) indices.push(i);
    }
    return indices;
  }

  supportsInterface(interfaceId: Hex): boolean {
    const id = interfaceId.toLowerCase();
    return id === INTERFACE_IDS.ERC165 || id === INTERFACE_IDS.ASSET_RECEIVER;
  }

  // ---------------------------------------------------------------------------
  // Deposits
  // ---------------------------------------------------------------------------

  /**
   * Inbound callback from a collection that just moved an asset to this escrow.
   *
   * Pipeline:
   * 1. Reject any auxiliary data
   * 2. Caller must be an asset class, not an end user
   * 3. The asset must really be held by the escrow
   * 4. Acceptance gate (pre/post status check)
   * 5. Acknowledge
   */
  onAssetReceived(notice: DepositNotice): Hex {
    // Step 1: Auxiliary data is never accepted, whatever the chain state
    if (notice.data !== undefined && size(notice.data) > 0) {
      this.log('warn', 'Rejected deposit carrying auxiliary data', { from: notice.from });
      throw new MalformedDepositError('Deposits must not carry auxiliary data', 'unexpected-data');
    }

    // Step 2: Caller verification
    if (!this.config.custody.isAssetClass(notice.caller)) {
      this.log('warn', `Rejected deposit notification from ${notice.caller}`);
      throw new MalformedDepositError(
        `${notice.caller} is not a known asset class`,
        'untrusted-caller',
      );
    }

    // Step 3: Ownership verification
    this.assertInCustody(notice);

    // Step 4: Gate
    const depositor = notice.from;
    let index: number;
    try {
      index = this.ledger.append(
        { assetClass: notice.caller, assetId: notice.assetId, depositor },
        this.clock(),
      );
    } catch (err) {
      if (err instanceof TradeUpError) {
        this.log('warn', `Deposit from ${depositor} rejected: ${err.message}`);
      }
      throw err;
    }

    // The deposit is committed; nothing past this point may fail the transfer
    this.afterCommit(`Deposit ${index}`, () => {
      this.log('info', `Deposit ${index} accepted from ${depositor}`, {
        assetClass: notice.caller,
        assetId: notice.assetId.toString(),
        operator: notice.operator,
        status: describeStatus(this.status()),
      });
      const record = this.ledger.at(index);
      if (record) {
        this.config.onDeposit?.(record, index);
      }
    });

    // Step 5: Acknowledge
    return DEPOSIT_ACKNOWLEDGEMENT;
  }

  // ---------------------------------------------------------------------------
  // Redemption
  // ---------------------------------------------------------------------------

  redeemAt(index: number, caller: Address): RedemptionReceipt {
    const status = this.status();
    let receipt: RedemptionReceipt;
    try {
      receipt = this.engine.redeemAt(index, caller, status);
    } catch (err) {
      if (err instanceof MintFailedError) {
        // The asset itself was paid out
        this.recordRedemption(err.receipt);
      } else if (err instanceof TradeUpError) {
        this.log('warn', `Redemption of entry ${index} by ${caller} refused: ${err.message}`);
      }
      throw err;
    }
    this.recordRedemption(receipt);
    return receipt;
  }

  redeemAll(caller: Address): RedemptionReceipt[] {
    let receipts: RedemptionReceipt[];
    try {
      receipts = this.engine.redeemAll(caller, this.status());
    } catch (err) {
      if (err instanceof TradeUpError) {
        this.log('warn', `Batch redemption by ${caller} refused: ${err.message}`);
      }
      throw err;
    }
    for (const receipt of receipts) {
      this.recordRedemption(receipt);
    }
    return receipts;
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private assertInCustody(notice: DepositNotice): void {
    let owner: Address;
    try {
      owner = this.config.custody.ownerOf(notice.caller, notice.assetId);
    } catch (err) {
      throw new MalformedDepositError(
        `Could not confirm custody of asset ${notice.assetId}`,
        'not-in-custody',
        err,
      );
    }

    if (!isAddressEqual(owner, this.terms.address)) {
      this.log('warn', `Asset ${notice.assetId} is owned by ${owner}, not the escrow`);
      throw new MalformedDepositError(
        `Asset ${notice.assetId} is not held by the escrow`,
        'not-in-custody',
      );
    }
  }

  private recordRedemption(receipt: RedemptionReceipt): void {
    this.afterCommit(`Redemption of entry ${receipt.index}`, () => {
      this.log('info', `Entry ${receipt.index} redeemed by ${receipt.recipient}`, {
        kind: receipt.kind,
        assetClass: receipt.assetClass,
        assetId: receipt.assetId?.toString(),
        minted: receipt.minted,
      });
      this.config.onRedeem?.(receipt);
    });
  }

  /**
   * Runs logging and hooks for a change already written to the ledger.
   * Their failures are reported at `error` and never rethrown.
   */
  private afterCommit(event: string, notify: () => void): void {
    try {
      notify();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      try {
        this.log('error', `${event} observer failed: ${message}`);
      } catch (logErr) {
        console.error(`[TradeUp] ${event} observer failed: ${message}`, logErr);
      }
    }
  }

  private log(level: 'info' | 'warn' | 'error', msg: string, data?: unknown): void {
    if (this.config.logger) {
      this.config.logger[level](`[TradeUp] ${msg}`, data);
    }
  }
}
