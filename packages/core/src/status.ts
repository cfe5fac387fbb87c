// =============================================================================
// Status evaluator — pure function of ledger contents, chain terms and time.
// Nothing here is cached; callers ask again whenever they need the status.
// =============================================================================

import { isAddressEqual } from 'viem';
import { ANY_ASSET_ID, ChainStatus } from './types.js';
import type { AssetSpec, ChainTerms } from './types.js';

type StatusTerms = Pick<ChainTerms, 'starting' | 'final' | 'expiresAt'>;

export function matchesStarting(asset: AssetSpec, terms: Pick<ChainTerms, 'starting'>): boolean {
  return (
    isAddressEqual(asset.assetClass, terms.starting.assetClass) &&
    asset.assetId === terms.starting.assetId
  );
}

export function matchesFinal(asset: AssetSpec, terms: Pick<ChainTerms, 'final'>): boolean {
  if (!isAddressEqual(asset.assetClass, terms.final.assetClass)) return false;
  return terms.final.assetId === ANY_ASSET_ID || asset.assetId === terms.final.assetId;
}

/**
 * Derive the chain status. First match wins:
 *
 * 1. last record matches the final spec -> Succeeded (dominates expiry)
 * 2. now >= expiresAt                   -> Expired
 * 3. no records                         -> Inactive
 * 4. first record is the starting asset -> Active
 * 5. otherwise                          -> Inactive
 */
export function evaluateStatus(
  records: readonly AssetSpec[],
  terms: StatusTerms,
  now: number,
): ChainStatus {
  const last = records[records.length - 1];
  if (last !== undefined && matchesFinal(last, terms)) {
    return ChainStatus.Succeeded;
  }

  if (now >= terms.expiresAt) {
    return ChainStatus.Expired;
  }

  const first = records[0];
  if (first === undefined) {
    return ChainStatus.Inactive;
  }

  return matchesStarting(first, terms) ? ChainStatus.Active : ChainStatus.Inactive;
}

export function isTerminal(status: ChainStatus): boolean {
  return status === ChainStatus.Succeeded || status === ChainStatus.Expired;
}

export function describeStatus(status: ChainStatus): string {
  return ChainStatus[status].toLowerCase();
}
