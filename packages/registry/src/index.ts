// @tradeup/registry — In-process asset custody for TradeUp escrows

export { AssetRegistry } from './registry.js';
export { CollectionMinter } from './minter.js';
export {
  UnknownCollectionError,
  AssetNotFoundError,
  AssetExistsError,
  NotOwnerError,
  UnsupportedReceiverError,
} from './errors.js';
