import { readFile } from 'node:fs/promises'
import { AlgorandClient, Config } from '@algorandfoundation/algokit-utils'
import { ABIMethod, type Address } from 'algosdk'
import { getStakingConfigFromEnvironment, type StakingConfig } from '../config'
import { formatTokens, parseTokens, toBaseUnits } from './fixed-point'

export const TOTAL_REWARD_POOL = parseTokens(10_000)

const INITIALIZE_POOL = ABIMethod.fromSignature('initializePool(axfer)void')

/**
 * The deployed app as pool initialization sees it
 */
export interface RewardPoolGateway {
  assetDecimals: number
  isInitialized(): Promise<boolean>
  fund(baseUnits: bigint): Promise<void>
}

/**
 * Whether the app's global state has the pool marked funded
 */
export function poolInitializedIn(globalState: Record<string, { value: unknown }>): boolean {
  return globalState.initialized?.value === 1n
}

/**
 * Fund the reward pool unless the app already holds it.
 * Returns whether a funding transfer was sent.
 */
export async function initializeRewardPool(pool: RewardPoolGateway): Promise<boolean> {
  if (await pool.isInitialized()) {
    Config.logger.info('Already initialized.')
    return false
  }

  const baseUnits = toBaseUnits(TOTAL_REWARD_POOL, pool.assetDecimals)
  Config.logger.info(`Initializing rewards pool with ${formatTokens(TOTAL_REWARD_POOL)} tokens (${baseUnits} base units)`)
  await pool.fund(baseUnits)
  Config.logger.info('Rewards pool initialized.')
  return true
}

/**
 * Reward pool of the app `appId`, funded by `funder` in a group of the
 * ASA transfer and the `initializePool` call
 */
export function onChainRewardPool(
  algorand: AlgorandClient,
  app: { appId: bigint; appAddress: Address },
  asset: { assetId: bigint; decimals: number },
  funder: Address,
): RewardPoolGateway {
  return {
    assetDecimals: asset.decimals,
    isInitialized: async () => poolInitializedIn(await algorand.app.getGlobalState(app.appId)),
    fund: async (baseUnits) => {
      await algorand.send.appCallMethodCall({
        sender: funder,
        appId: app.appId,
        method: INITIALIZE_POOL,
        args: [
          algorand.createTransaction.assetTransfer({
            sender: funder,
            receiver: app.appAddress,
            assetId: asset.assetId,
            amount: baseUnits,
          }),
        ],
      })
    },
  }
}

/**
 * Deploy the staking ledger for the configured ASA and fund its reward pool.
 * Deploying again finds the existing app by name and leaves a funded pool alone.
 */
export async function deploy(config: StakingConfig = getStakingConfigFromEnvironment()) {
  Config.logger.info('=== Deploying Staking Ledger ===')

  const algorand = AlgorandClient.fromEnvironment()
  const deployer = await algorand.account.fromEnvironment(config.deployerAccountName)
  const asset = await algorand.asset.getById(config.assetId)

  const factory = algorand.client.getAppFactory({
    appSpec: await readFile(config.appSpecPath, 'utf-8'),
    defaultSender: deployer.addr,
  })

  const { appClient, result } = await factory.deploy({
    createParams: { method: 'createApplication', args: [config.assetId] },
    onUpdate: 'append',
    onSchemaBreak: 'append',
  })

  // If app was just created fund the app account and opt it in to the ASA
  if (['create', 'replace'].includes(result.operationPerformed)) {
    await algorand.send.payment({
      amount: (1).algo(),
      sender: deployer.addr,
      receiver: appClient.appAddress,
    })
    await appClient.send.call({ method: 'optInToAsset', args: [], extraFee: (1000).microAlgo() })
  }

  await initializeRewardPool(
    onChainRewardPool(
      algorand,
      { appId: appClient.appId, appAddress: appClient.appAddress },
      { assetId: config.assetId, decimals: asset.decimals },
      deployer.addr,
    ),
  )

  return { appId: appClient.appId, appAddress: appClient.appAddress }
}
