import { BigUint, biguint, uint64 } from '@algorandfoundation/algorand-typescript'
import { SECONDS_PER_DAY } from './constants.algo'
import type { UserRecord } from './types.algo'

/**
 * Reward accrued by `record` between its last settlement and `now`:
 * elapsed * assets * dailyRate / 86400, truncated, and never more than `remaining`.
 */
export function pendingReward(record: UserRecord, now: uint64, remaining: biguint, dailyRate: biguint): biguint {
  if (now <= record.lastSettlementTime || record.assets === 0 || remaining === BigUint(0)) {
    return BigUint(0)
  }

  const elapsed: uint64 = now - record.lastSettlementTime
  const accrued: biguint = (BigUint(elapsed) * BigUint(record.assets) * dailyRate) / SECONDS_PER_DAY

  return accrued < remaining ? accrued : remaining
}
