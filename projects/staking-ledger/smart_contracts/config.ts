export interface StakingConfig {
  assetId: bigint
  // Name passed to algorand.account.fromEnvironment(); creates the app and funds the pool
  deployerAccountName: string
  // ARC-56 app spec written by `npm run compile`
  appSpecPath: string
}

export const DEFAULT_APP_SPEC_PATH = 'smart_contracts/artifacts/staking/StakingLedger.arc56.json'

export function getStakingConfigFromEnvironment(env: NodeJS.ProcessEnv = process.env): StakingConfig {
  if (!env.STAKING_ASA_ID) {
    throw new Error('Attempt to get staking configuration without specifying STAKING_ASA_ID in the environment variables')
  }
  if (!/^\d+$/.test(env.STAKING_ASA_ID)) {
    throw new Error(`STAKING_ASA_ID must be a positive integer, got "${env.STAKING_ASA_ID}"`)
  }

  return {
    assetId: BigInt(env.STAKING_ASA_ID),
    deployerAccountName: env.STAKING_DEPLOYER_NAME || 'DEPLOYER',
    appSpecPath: env.STAKING_APP_SPEC || DEFAULT_APP_SPEC_PATH,
  }
}
