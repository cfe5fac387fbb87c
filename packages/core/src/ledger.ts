// =============================================================================
// CustodyLedger — append-only record of every accepted deposit
// =============================================================================

import type { Address } from 'viem';
import { DepositRejectedError } from './errors.js';
import { describeStatus, evaluateStatus } from './status.js';
import { ChainStatus } from './types.js';
import type { AssetSpec, ChainTerms, DepositRecord } from './types.js';

export interface LedgerEntry extends AssetSpec {
  depositor: Address;
}

export class CustodyLedger {
  private terms: Pick<ChainTerms, 'starting' | 'final' | 'expiresAt'>;
  private records: DepositRecord[];

  constructor(terms: Pick<ChainTerms, 'starting' | 'final' | 'expiresAt'>) {
    this.terms = terms;
    this.records = [];
  }

  get length(): number {
    return this.records.length;
  }

  at(index: number): Readonly<DepositRecord> | undefined {
    const record = this.records[index];
    return record ? { ...record } : undefined;
  }

  snapshot(): Readonly<DepositRecord>[] {
    return this.records.map((record) => ({ ...record }));
  }

  status(now: number): ChainStatus {
    return evaluateStatus(this.records, this.terms, now);
  }

  /**
   * Gated append. Accepted only when the chain is open before the deposit
   * (Inactive or Active) and the deposit leaves it Active or Succeeded.
   * The post-check runs on the prospective ledger so a rejection never
   * touches stored state. Returns the new record's index.
   */
  append(entry: LedgerEntry, now: number): number {
    const before = this.status(now);
    if (before !== ChainStatus.Inactive && before !== ChainStatus.Active) {
      throw new DepositRejectedError(
        `Chain is ${describeStatus(before)}; no further deposits are accepted`,
        before,
      );
    }

    const record: DepositRecord = {
      assetClass: entry.assetClass,
      assetId: entry.assetId,
      depositor: entry.depositor,
      consumed: false,
    };

    const after = evaluateStatus([...this.records, record], this.terms, now);
    if (after !== ChainStatus.Active && after !== ChainStatus.Succeeded) {
      throw new DepositRejectedError(
        `Deposit would leave the chain ${describeStatus(after)}`,
        before,
        after,
      );
    }

    this.records.push(record);
    return this.records.length - 1;
  }

  markConsumed(index: number): void {
    const record = this.records[index];
    if (!record) {
      throw new RangeError(`No ledger entry at index ${index}`);
    }
    if (record.consumed) {
      throw new Error(`Ledger entry ${index} is already consumed`);
    }
    record.consumed = true;
  }

  /**
   * Undo a consumed flip whose transfer never happened.
   */
  restoreConsumed(index: number): void {
    const record = this.records[index];
    if (record) {
      record.consumed = false;
    }
  }
}
