// =============================================================================
// TradeUp — End-to-End Demo
// Trade-up chain escrow for non-fungible assets
//
// Run: npx tsx examples/demo.ts
// =============================================================================

import type { Address } from 'viem';
import { ANY_ASSET_ID, TradeUpEscrow, describeStatus } from '../packages/core/src/index.js';
import type { Logger } from '../packages/core/src/index.js';
import { AssetRegistry, CollectionMinter } from '../packages/registry/src/index.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function header(title: string): void {
  console.log('\n' + '='.repeat(72));
  console.log(`  ${title}`);
  console.log('='.repeat(72));
}

function subheader(title: string): void {
  console.log(`\n--- ${title} ---`);
}

function result(label: string, value: unknown): void {
  console.log(`  ${label}: ${value}`);
}

const consoleLogger: Logger = {
  info: (msg) => console.log(`  · ${msg}`),
  warn: (msg) => console.log(`  ! ${msg}`),
  error: (msg) => console.log(`  ✗ ${msg}`),
};

const PAPERCLIP: Address = '0x1000000000000000000000000000000000000001';
const HOUSE: Address = '0x2000000000000000000000000000000000000002';
const TROPHY: Address = '0x3000000000000000000000000000000000000003';
const ALICE: Address = '0x0000000000000000000000000000000000000a1c';
const BOB: Address = '0x0000000000000000000000000000000000000b0b';

function openChain(registry: AssetRegistry, escrowAddress: Address, clock: () => number): TradeUpEscrow {
  const escrow = new TradeUpEscrow({
    address: escrowAddress,
    starting: { assetClass: PAPERCLIP, assetId: 1n },
    final: { assetClass: HOUSE, assetId: ANY_ASSET_ID },
    ttl: '1h',
    custody: registry,
    minter: new CollectionMinter(registry, TROPHY),
    logger: consoleLogger,
    clock,
  });
  registry.bindReceiver(escrowAddress, escrow);
  return escrow;
}

// ---------------------------------------------------------------------------
// DEMO 1: A chain that reaches the final asset
// ---------------------------------------------------------------------------

function demo1_success(): void {
  header('DEMO 1: Paperclip to House');

  let now = 1_700_000_000;
  const registry = new AssetRegistry();
  registry.createCollection(PAPERCLIP);
  registry.createCollection(HOUSE);
  registry.mint(PAPERCLIP, ALICE, 1n);
  registry.mint(HOUSE, BOB, 7n);

  const escrow = openChain(registry, '0x9000000000000000000000000000000000000001', () => now);

  subheader('Alice deposits the starting paperclip');
  registry.safeTransferFrom(PAPERCLIP, ALICE, escrow.address, 1n);
  result('Status', describeStatus(escrow.status()));

  subheader('Bob deposits a house');
  now += 60;
  registry.safeTransferFrom(HOUSE, BOB, escrow.address, 7n);
  result('Status', describeStatus(escrow.status()));

  subheader('Everyone redeems');
  escrow.redeemAll(BOB);
  escrow.redeemAll(ALICE);
  result('Paperclip owner', registry.ownerOf(PAPERCLIP, 1n));
  result('House owner', registry.ownerOf(HOUSE, 7n));
  result('Trophies for Alice', registry.balanceOf(TROPHY, ALICE));
}

// ---------------------------------------------------------------------------
// DEMO 2: A chain that runs out of time
// ---------------------------------------------------------------------------

function demo2_expiry(): void {
  header('DEMO 2: Chain expires, everyone gets their asset back');

  let now = 1_700_000_000;
  const registry = new AssetRegistry();
  registry.createCollection(PAPERCLIP);
  registry.createCollection(HOUSE);
  registry.mint(PAPERCLIP, ALICE, 1n);
  registry.mint(PAPERCLIP, BOB, 2n);

  const escrow = openChain(registry, '0x9000000000000000000000000000000000000002', () => now);

  registry.safeTransferFrom(PAPERCLIP, ALICE, escrow.address, 1n);
  registry.safeTransferFrom(PAPERCLIP, BOB, escrow.address, 2n);

  subheader('Redeeming too early');
  try {
    escrow.redeemAll(ALICE);
    console.log('  ❌ UNEXPECTED: Should have been refused!');
  } catch (err: unknown) {
    if (!(err instanceof Error)) throw err;
    result('Error type', err.constructor.name);
    result('Message', err.message);
  }

  subheader('One hour later');
  now = escrow.expiresAt;
  result('Status', describeStatus(escrow.status()));
  escrow.redeemAll(ALICE);
  escrow.redeemAll(BOB);
  result('Paperclip #1 owner', registry.ownerOf(PAPERCLIP, 1n));
  result('Paperclip #2 owner', registry.ownerOf(PAPERCLIP, 2n));
  result('Trophies for Alice', registry.balanceOf(TROPHY, ALICE));
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function main(): void {
  console.log('');
  console.log('  TradeUp — Trade-up Chain Escrow');
  console.log('  End-to-End Demo');
  console.log('');

  demo1_success();
  demo2_expiry();

  header('DEMO COMPLETE');
  console.log('');
}

try {
  main();
} catch (err) {
  console.error('Demo failed:', err);
  process.exit(1);
}
