// =============================================================================
// @tradeup/registry — AssetRegistry
// In-process ERC-721 style ledger of collections, owners and receiver hooks.
// Transfers are all-or-nothing: a failing receiver hook restores the owner.
// =============================================================================

import type { Address, Hex } from 'viem';
import { getAddress, isAddressEqual } from 'viem';
import {
  DEPOSIT_ACKNOWLEDGEMENT,
  INTERFACE_IDS,
} from '@tradeup/core';
import type { AssetCustodyProvider, AssetReceiver } from '@tradeup/core';
import {
  AssetExistsError,
  AssetNotFoundError,
  NotOwnerError,
  UnknownCollectionError,
  UnsupportedReceiverError,
} from './errors.js';

export class AssetRegistry implements AssetCustodyProvider {
  private collections: Map<Address, Map<bigint, Address>>;
  private receivers: Map<Address, AssetReceiver>;

  constructor() {
    this.collections = new Map();
    this.receivers = new Map();
  }

  createCollection(collection: Address): void {
    const key = getAddress(collection);
    if (!this.collections.has(key)) {
      this.collections.set(key, new Map());
    }
  }

  isAssetClass(identity: Address): boolean {
    return this.collections.has(getAddress(identity));
  }

  /**
   * Attach receiver hooks to an address (the registry's notion of a contract
   * account). Safe transfers to it go through supportsInterface + onAssetReceived.
   */
  bindReceiver(address: Address, receiver: AssetReceiver): void {
    this.receivers.set(getAddress(address), receiver);
  }

  mint(collection: Address, to: Address, assetId: bigint): void {
    const owners = this.owners(collection);
    if (owners.has(assetId)) {
      throw new AssetExistsError(collection, assetId);
    }
    owners.set(assetId, to);
  }

  ownerOf(collection: Address, assetId: bigint): Address {
    const owner = this.owners(collection).get(assetId);
    if (owner === undefined) {
      throw new AssetNotFoundError(collection, assetId);
    }
    return owner;
  }

  balanceOf(collection: Address, owner: Address): number {
    let count = 0;
    for (const holder of this.owners(collection).values()) {
      if (isAddressEqual(holder, owner)) count++;
    }
    return count;
  }

  /**
   * Move an asset and, when `to` has receiver hooks, ask it to acknowledge.
   */
  safeTransferFrom(
    collection: Address,
    from: Address,
    to: Address,
    assetId: bigint,
    data: Hex = '0x',
    operator: Address = from,
  ): void {
    const owners = this.owners(collection);
    const current = this.ownerOf(collection, assetId);
    if (!isAddressEqual(current, from)) {
      throw new NotOwnerError(`${from} does not own asset ${assetId}`, from, current);
    }

    const receiver = this.receivers.get(getAddress(to));
    if (receiver && !receiver.supportsInterface(INTERFACE_IDS.ASSET_RECEIVER)) {
      throw new UnsupportedReceiverError(to, 'receiver interface not supported');
    }

    owners.set(assetId, to);
    if (!receiver) return;

    let ack: Hex;
    try {
      ack = receiver.onAssetReceived({
        caller: getAddress(collection),
        operator,
        from,
        assetId,
        data,
      });
    } catch (err) {
      owners.set(assetId, current);
      throw err;
    }

    if (ack.toLowerCase() !== DEPOSIT_ACKNOWLEDGEMENT) {
      owners.set(assetId, current);
      throw new UnsupportedReceiverError(to, `unexpected acknowledgement ${ack}`);
    }
  }

  transfer(assetClass: Address, assetId: bigint, from: Address, to: Address): void {
    this.safeTransferFrom(assetClass, from, to, assetId);
  }

  private owners(collection: Address): Map<bigint, Address> {
    const owners = this.collections.get(getAddress(collection));
    if (!owners) {
      throw new UnknownCollectionError(collection);
    }
    return owners;
  }
}
