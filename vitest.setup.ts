import { Config } from '@algorandfoundation/algokit-utils'
import type { Logger } from '@algorandfoundation/algokit-utils/types/logging'
import { addEqualityTesters } from '@algorandfoundation/algorand-typescript-testing'
import { beforeAll, expect } from 'vitest'

const silent = () => undefined

const quietLogger: Logger = {
  error: silent,
  warn: silent,
  info: silent,
  verbose: silent,
  debug: silent,
}

Config.configure({ logger: quietLogger })

beforeAll(() => {
  addEqualityTesters({ expect })
})
