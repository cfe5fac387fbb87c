// =============================================================================
// TradeUp Core Types
// Chain-of-custody escrow for non-fungible assets
// =============================================================================

import type { Address, Hex } from 'viem';
import { maxUint256 } from 'viem';

/** Token id within an asset class (uint256). */
export type AssetId = bigint;

/**
 * Wildcard id — "any instance of this class".
 * Only meaningful in the final-asset specification.
 */
export const ANY_ASSET_ID: AssetId = maxUint256;

/**
 * A specific asset: collection address + token id.
 */
export interface AssetSpec {
  assetClass: Address;
  assetId: AssetId;
}

/**
 * One accepted deposit. Only `consumed` ever changes after append.
 */
export interface DepositRecord extends AssetSpec {
  depositor: Address;
  consumed: boolean;
}

/**
 * Derived escrow status — never stored, recomputed from ledger + clock.
 */
export enum ChainStatus {
  Inactive = 0,
  Active = 1,
  Succeeded = 2,
  Expired = 3,
}

/**
 * Immutable chain terms, resolved once from TradeUpConfig.
 */
export interface ChainTerms {
  address: Address;          // the escrow's own custody identity
  starting: AssetSpec;
  final: AssetSpec;          // assetId may be ANY_ASSET_ID
  createdAt: number;         // unix seconds
  expiresAt: number;         // unix seconds
}

/**
 * Asset custody provider — the ERC-721 style mechanism holding the assets.
 */
export interface AssetCustodyProvider {
  transfer(assetClass: Address, assetId: AssetId, from: Address, to: Address): void;
  ownerOf(assetClass: Address, assetId: AssetId): Address;
  /** True when `identity` is an asset class (collection), not an end user. */
  isAssetClass(identity: Address): boolean;
}

/**
 * Optional collaborator credited on every successful trade-up redemption.
 */
export interface Minter {
  mintFor(identity: Address): void;
}

/**
 * Inbound transfer notification, sent by the collection that moved the asset.
 */
export interface DepositNotice {
  caller: Address;           // the asset class performing the transfer
  operator: Address;
  from: Address;
  assetId: AssetId;
  data?: Hex;
}

/**
 * Anything that can receive assets through a safe transfer.
 */
export interface AssetReceiver {
  supportsInterface(interfaceId: Hex): boolean;
  onAssetReceived(notice: DepositNotice): Hex;
}

/**
 * Outcome of redeeming one ledger entry.
 */
export interface RedemptionReceipt {
  index: number;
  recipient: Address;
  kind: 'trade' | 'refund' | 'none';
  assetClass?: Address;
  assetId?: AssetId;
  minted: boolean;
}

/**
 * TradeUp escrow configuration.
 */
export interface TradeUpConfig {
  address: Address;
  starting: AssetSpec;
  final: { assetClass: Address; assetId?: AssetId };
  ttl: number | string;      // seconds, or a duration like '24h', '7d'
  custody: AssetCustodyProvider;
  minter?: Minter;
  logger?: Logger;
  clock?: () => number;      // unix seconds
  onDeposit?: (record: Readonly<DepositRecord>, index: number) => void;
  onRedeem?: (receipt: RedemptionReceipt) => void;
}

/**
 * Logger interface — plug in your own logging.
 */
export interface Logger {
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
}
