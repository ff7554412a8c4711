import { BigUint, biguint, Uint64 } from '@algorandfoundation/algorand-typescript'

// Reward amounts are integers scaled by 10^18
export const DECIMALS = Uint64(18)

// The whole pool has to fit in uint64 base units of the staked ASA
export const MAX_ASSET_DECIMALS = Uint64(15)

export const SECONDS_PER_DAY = BigUint(86_400)

// 10,000 tokens, funded once and never replenished
export const REWARD_POOL_TOKENS = Uint64(10_000)
export const TOTAL_REWARD_POOL: biguint = BigUint(10_000_000_000_000_000_000_000n)

// 10 tokens buy one asset
export const PRICE_PER_ASSET_TOKENS = Uint64(10)

// 0.1 token per asset per day
export const DAILY_REWARD_RATE_PER_ASSET: biguint = BigUint(100_000_000_000_000_000n)
