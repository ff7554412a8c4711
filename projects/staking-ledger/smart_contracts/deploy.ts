import 'dotenv/config'
import { Config } from '@algorandfoundation/algokit-utils'
import { deploy } from './staking/deploy-config'

deploy()
  .then(({ appId, appAddress }) => {
    Config.logger.info(`Staking ledger ready: app ${appId}, holding account ${appAddress.toString()}`)
  })
  .catch((error: unknown) => {
    Config.logger.error('Deployment failed', error)
    process.exitCode = 1
  })
