import type { Account, biguint, uint64 } from '@algorandfoundation/algorand-typescript'

/**
 * Per-account record stored in box storage
 */
export type UserRecord = {
  // Assets held
  assets: uint64
  // Reward owed but not yet withdrawn, 18 decimals
  unclaimedReward: biguint
  // Time of the last settlement for this account
  lastSettlementTime: uint64
}

export type UserStats = {
  assets: uint64
  unclaimedReward: biguint
  lastSettlementTime: uint64
  // Accrued since lastSettlementTime and not yet written
  pendingReward: biguint
}

export type PoolStats = {
  asset: uint64
  holdingAccount: Account
  initialized: boolean
  remaining: biguint
  totalCredited: biguint
  totalAssets: uint64
}

// ARC-28 events

export type PoolInitialized = {
  funder: Account
  amount: biguint
}

export type AssetsBought = {
  account: Account
  assetsBought: uint64
}

export type AssetsRedeemed = {
  account: Account
  assetsRedeemed: uint64
}

export type RewardsClaimed = {
  account: Account
  rewardWithdrawn: biguint
}
