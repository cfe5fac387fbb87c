// =============================================================================
// Config resolution — TradeUpConfig -> frozen ChainTerms
// =============================================================================

import { isAddress } from 'viem';
import { InvalidConfigError } from './errors.js';
import { ANY_ASSET_ID } from './types.js';
import type { ChainTerms, TradeUpConfig } from './types.js';

const DURATION_MULTIPLIERS: Record<string, number> = {
  s: 1,
  m: 60,
  h: 3600,
  d: 86400,
  w: 604800,
};

/**
 * Parse a TTL into seconds: a positive integer, or a duration string
 * such as '90s', '30m', '24h', '7d', '2w'.
 */
export function parseTtl(ttl: number | string): number {
  if (typeof ttl === 'number') {
    if (!Number.isSafeInteger(ttl) || ttl <= 0) {
      throw new InvalidConfigError(`TTL must be a positive whole number of seconds, got ${ttl}`, 'ttl');
    }
    return ttl;
  }

  const match = ttl.trim().match(/^(\d+)\s*(s|m|h|d|w)$/i);
  if (!match) {
    throw new InvalidConfigError(
      `Invalid TTL format: ${ttl}. Use seconds or a duration like '24h', '7d'.`,
      'ttl',
    );
  }

  const value = parseInt(match[1], 10);
  const seconds = value * DURATION_MULTIPLIERS[match[2].toLowerCase()];
  if (seconds <= 0) {
    throw new InvalidConfigError(`TTL must be positive, got ${ttl}`, 'ttl');
  }
  return seconds;
}

/**
 * Validate a config and fix the chain terms at `now`.
 */
export function resolveTerms(config: TradeUpConfig, now: number): Readonly<ChainTerms> {
  assertAddress(config.address, 'address');
  assertAddress(config.starting.assetClass, 'starting.assetClass');
  assertAddress(config.final.assetClass, 'final.assetClass');

  if (config.starting.assetId < 0n || config.starting.assetId >= ANY_ASSET_ID) {
    throw new InvalidConfigError(
      'Starting asset needs an exact id; the wildcard is reserved for the final asset',
      'starting.assetId',
    );
  }

  const finalId = config.final.assetId ?? ANY_ASSET_ID;
  if (finalId < 0n) {
    throw new InvalidConfigError('Final asset id cannot be negative', 'final.assetId');
  }

  const ttl = parseTtl(config.ttl);

  return Object.freeze({
    address: config.address,
    starting: Object.freeze({ ...config.starting }),
    final: Object.freeze({ assetClass: config.final.assetClass, assetId: finalId }),
    createdAt: now,
    expiresAt: now + ttl,
  });
}

function assertAddress(value: string, field: string): void {
  if (!isAddress(value, { strict: false })) {
    throw new InvalidConfigError(`${field} is not a valid address: ${value}`, field);
  }
}
