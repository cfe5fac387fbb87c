// =============================================================================
// Config resolution tests
// =============================================================================

import { describe, it, expect } from 'vitest';
import { parseTtl, resolveTerms } from '../src/config.js';
import { InvalidConfigError } from '../src/errors.js';
import { ANY_ASSET_ID } from '../src/types.js';
import type { TradeUpConfig } from '../src/types.js';
import { CLASS_A, CLASS_B, ESCROW, createMockCustody } from './helpers.js';

function makeConfig(overrides: Partial<TradeUpConfig> = {}): TradeUpConfig {
  return {
    address: ESCROW,
    starting: { assetClass: CLASS_A, assetId: 1n },
    final: { assetClass: CLASS_B },
    ttl: '24h',
    custody: createMockCustody(),
    ...overrides,
  };
}

describe('parseTtl', () => {
  it('should accept whole seconds', () => {
    expect(parseTtl(100)).toBe(100);
  });

  it('should parse duration strings', () => {
    expect(parseTtl('90s')).toBe(90);
    expect(parseTtl('30m')).toBe(1800);
    expect(parseTtl('24h')).toBe(86400);
    expect(parseTtl('7d')).toBe(604800);
    expect(parseTtl(' 2W ')).toBe(1209600);
  });

  it('should reject malformed durations', () => {
    expect(() => parseTtl('soon')).toThrow(InvalidConfigError);
    expect(() => parseTtl('1.5h')).toThrow('Invalid TTL format');
  });

  it('should reject zero, negative and fractional values', () => {
    expect(() => parseTtl(0)).toThrow(InvalidConfigError);
    expect(() => parseTtl(-5)).toThrow(InvalidConfigError);
    expect(() => parseTtl(1.5)).toThrow(InvalidConfigError);
    expect(() => parseTtl('0h')).toThrow('TTL must be positive');
  });
});

describe('resolveTerms', () => {
  it('should fix expiry relative to creation time', () => {
    const terms = resolveTerms(makeConfig({ ttl: 100 }), 1_000);
    expect(terms.createdAt).toBe(1_000);
    expect(terms.expiresAt).toBe(1_100);
  });

  it('should default the final id to the wildcard', () => {
    const terms = resolveTerms(makeConfig(), 0);
    expect(terms.final).toEqual({ assetClass: CLASS_B, assetId: ANY_ASSET_ID });
  });

  it('should keep an exact final id', () => {
    const terms = resolveTerms(makeConfig({ final: { assetClass: CLASS_B, assetId: 7n } }), 0);
    expect(terms.final.assetId).toBe(7n);
  });

  it('should freeze the terms', () => {
    const terms = resolveTerms(makeConfig(), 0);
    expect(Object.isFrozen(terms)).toBe(true);
    expect(Object.isFrozen(terms.starting)).toBe(true);
    expect(Object.isFrozen(terms.final)).toBe(true);
  });

  it('should reserve the wildcard for the final asset', () => {
    try {
      resolveTerms(makeConfig({ starting: { assetClass: CLASS_A, assetId: ANY_ASSET_ID } }), 0);
      expect.unreachable('Should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidConfigError);
      const configErr = err as InvalidConfigError;
      expect(configErr.field).toBe('starting.assetId');
      expect(configErr.code).toBe('INVALID_CONFIG');
    }
  });

  it('should name the field holding a bad address', () => {
    try {
      resolveTerms(makeConfig({ address: '0x1234' }), 0);
      expect.unreachable('Should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidConfigError);
      expect((err as InvalidConfigError).field).toBe('address');
    }
  });
});
