export type { StakingLedger } from './staking/contract.algo'
export type {
  AssetsBought,
  AssetsRedeemed,
  PoolInitialized,
  PoolStats,
  RewardsClaimed,
  UserRecord,
  UserStats,
} from './staking/types.algo'
export { DECIMALS, SCALE, formatTokens, parseTokens, toBaseUnits } from './staking/fixed-point'
export {
  TOTAL_REWARD_POOL,
  deploy,
  initializeRewardPool,
  onChainRewardPool,
  poolInitializedIn,
  type RewardPoolGateway,
} from './staking/deploy-config'
export { DEFAULT_APP_SPEC_PATH, getStakingConfigFromEnvironment, type StakingConfig } from './config'
