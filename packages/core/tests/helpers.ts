// =============================================================================
// Shared fixtures for core tests
// =============================================================================

import { vi } from 'vitest';
import type { Address, Hex } from 'viem';
import { TradeUpEscrow } from '../src/escrow.js';
import { ANY_ASSET_ID } from '../src/types.js';
import type { TradeUpConfig } from '../src/types.js';

export const ESCROW: Address = '0x9000000000000000000000000000000000000009';
export const CLASS_A: Address = '0x1100000000000000000000000000000000000011';
export const CLASS_B: Address = '0x2200000000000000000000000000000000000022';
export const CLASS_C: Address = '0x3300000000000000000000000000000000000033';

export const X: Address = '0x0000000000000000000000000000000000000001';
export const Y: Address = '0x0000000000000000000000000000000000000002';
export const Z: Address = '0x0000000000000000000000000000000000000003';

const key = (assetClass: Address, assetId: bigint): string =>
  `${assetClass.toLowerCase()}:${assetId}`;

/**
 * Map-backed custody provider. Every collection in `classes` counts as an asset class.
 */
export function createMockCustody(classes: Address[] = [CLASS_A, CLASS_B, CLASS_C]) {
  const owners = new Map<string, Address>();

  return {
    place(assetClass: Address, assetId: bigint, owner: Address): void {
      owners.set(key(assetClass, assetId), owner);
    },
    holder(assetClass: Address, assetId: bigint): Address | undefined {
      return owners.get(key(assetClass, assetId));
    },
    transfer: vi.fn((assetClass: Address, assetId: bigint, _from: Address, to: Address): void => {
      owners.set(key(assetClass, assetId), to);
    }),
    ownerOf: vi.fn((assetClass: Address, assetId: bigint): Address => {
      const owner = owners.get(key(assetClass, assetId));
      if (owner === undefined) {
        throw new Error(`nonexistent token ${assetId}`);
      }
      return owner;
    }),
    isAssetClass: vi.fn((identity: Address): boolean =>
      classes.some((c) => c.toLowerCase() === identity.toLowerCase()),
    ),
  };
}

export type MockCustody = ReturnType<typeof createMockCustody>;

/**
 * Adjustable clock in unix seconds.
 */
export function createClock(start = 0) {
  let now = start;
  return {
    now: (): number => now,
    set(value: number): void {
      now = value;
    },
  };
}

export type TestClock = ReturnType<typeof createClock>;

export function createEscrow(
  custody: MockCustody,
  clock: TestClock,
  overrides: Partial<TradeUpConfig> = {},
): TradeUpEscrow {
  return new TradeUpEscrow({
    address: ESCROW,
    starting: { assetClass: CLASS_A, assetId: 1n },
    final: { assetClass: CLASS_B, assetId: ANY_ASSET_ID },
    ttl: 100,
    custody,
    clock: clock.now,
    ...overrides,
  });
}

/**
 * Move an asset into escrow custody and fire the notification, as a collection would.
 */
export function deposit(
  escrow: TradeUpEscrow,
  custody: MockCustody,
  assetClass: Address,
  assetId: bigint,
  from: Address,
  data: Hex = '0x',
): Hex {
  custody.place(assetClass, assetId, ESCROW);
  return escrow.onAssetReceived({ caller: assetClass, operator: from, from, assetId, data });
}
