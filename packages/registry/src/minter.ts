import type { Address } from 'viem';
import type { Minter } from '@tradeup/core';
import type { AssetRegistry } from './registry.js';

/**
 * CollectionMinter — credits each successful trader with a fresh token
 * from a reward collection, numbered sequentially.
 */
export class CollectionMinter implements Minter {
  private registry: AssetRegistry;
  private collection: Address;
  private nextId: bigint;

  constructor(registry: AssetRegistry, collection: Address, firstId: bigint = 1n) {
    this.registry = registry;
    this.collection = collection;
    this.nextId = firstId;
    registry.createCollection(collection);
  }

  mintFor(identity: Address): void {
    this.registry.mint(this.collection, identity, this.nextId);
    this.nextId += 1n;
  }
}
