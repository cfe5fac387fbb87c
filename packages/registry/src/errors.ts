// =============================================================================
// @tradeup/registry — Errors
// =============================================================================

import type { Address } from 'viem';
import { TradeUpError } from '@tradeup/core';

export class UnknownCollectionError extends TradeUpError {
  public readonly collection: Address;

  constructor(collection: Address) {
    super(`No collection deployed at ${collection}`, 'UNKNOWN_COLLECTION');
    this.name = 'UnknownCollectionError';
    this.collection = collection;
  }
}

export class AssetNotFoundError extends TradeUpError {
  public readonly collection: Address;
  public readonly assetId: bigint;

  constructor(collection: Address, assetId: bigint) {
    super(`Asset ${assetId} does not exist in ${collection}`, 'ASSET_NOT_FOUND');
    this.name = 'AssetNotFoundError';
    this.collection = collection;
    this.assetId = assetId;
  }
}

export class AssetExistsError extends TradeUpError {
  constructor(collection: Address, assetId: bigint) {
    super(`Asset ${assetId} already minted in ${collection}`, 'ASSET_EXISTS');
    this.name = 'AssetExistsError';
  }
}

export class NotOwnerError extends TradeUpError {
  public readonly expected: Address;
  public readonly actual: Address;

  constructor(message: string, expected: Address, actual: Address) {
    super(message, 'NOT_OWNER');
    this.name = 'NotOwnerError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Thrown when a safe transfer targets a receiver that does not accept assets,
 * or that answers with the wrong acknowledgement.
 */
export class UnsupportedReceiverError extends TradeUpError {
  public readonly receiver: Address;

  constructor(receiver: Address, detail: string) {
    super(`Receiver ${receiver} cannot accept assets: ${detail}`, 'UNSUPPORTED_RECEIVER');
    this.name = 'UnsupportedReceiverError';
    this.receiver = receiver;
  }
}
