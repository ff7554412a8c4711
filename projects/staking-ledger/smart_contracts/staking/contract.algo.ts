import {
  abimethod,
  Account,
  assert,
  Asset,
  BigUint,
  biguint,
  BoxMap,
  Bytes,
  clone,
  Contract,
  emit,
  Global,
  GlobalState,
  gtxn,
  itxn,
  op,
  Txn,
  uint64,
} from '@algorandfoundation/algorand-typescript'
import { pendingReward } from './accrual.algo'
import {
  DAILY_REWARD_RATE_PER_ASSET,
  DECIMALS,
  MAX_ASSET_DECIMALS,
  PRICE_PER_ASSET_TOKENS,
  REWARD_POOL_TOKENS,
  TOTAL_REWARD_POOL,
} from './constants.algo'
import type {
  AssetsBought,
  AssetsRedeemed,
  PoolInitialized,
  PoolStats,
  RewardsClaimed,
  UserRecord,
  UserStats,
} from './types.algo'

/**
 * Staking ledger with a fixed, pre-funded reward pool
 *
 * Accounts buy assets with the staked ASA at a fixed price and accrue
 * 0.1 token per asset per day from a 10,000 token pool until it runs dry.
 * Every state change first settles the caller: reward accrued since the
 * caller's last settlement moves from the pool into their unclaimed balance.
 *
 * Reward amounts are kept at 18 decimals. Transfers use the ASA's own base
 * units, so a claim pays out whole base units and leaves the rest unclaimed.
 */
export class StakingLedger extends Contract {
  public asset = GlobalState<Asset>({ initialValue: Asset() })
  // 10^decimals of the staked ASA
  public baseUnitsPerToken = GlobalState<uint64>({ initialValue: 0 })
  // One ASA base unit at 18 decimals
  public scalePerBaseUnit = GlobalState<biguint>({ initialValue: BigUint(0) })

  public initialized = GlobalState<boolean>({ initialValue: false })
  public remaining = GlobalState<biguint>({ initialValue: TOTAL_REWARD_POOL })
  public totalCredited = GlobalState<biguint>({ initialValue: BigUint(0) })
  public totalAssets = GlobalState<uint64>({ initialValue: 0 })

  public stakers = BoxMap<Account, UserRecord>({ keyPrefix: 'stakers' })

  @abimethod({ onCreate: 'require' })
  public createApplication(asset: Asset): void {
    assert(asset.decimals <= MAX_ASSET_DECIMALS, 'UnsupportedDecimals')

    let baseUnits: uint64 = 1
    let scale: biguint = BigUint(1)
    for (let i: uint64 = 0; i < DECIMALS; i = i + 1) {
      if (i < asset.decimals) {
        baseUnits = baseUnits * 10
      } else {
        scale = scale * BigUint(10)
      }
    }

    this.asset.value = asset
    this.baseUnitsPerToken.value = baseUnits
    this.scalePerBaseUnit.value = scale
  }

  /**
   * Opt the application account in to the staked ASA
   */
  @abimethod()
  public optInToAsset(): void {
    assert(Txn.sender === Global.creatorAddress, 'Only creator can opt in to ASA')

    itxn
      .assetTransfer({
        assetReceiver: Global.currentApplicationAddress,
        assetAmount: 0,
        xferAsset: this.asset.value,
      })
      .submit()
  }

  /**
   * Fund the reward pool. `funding` must move the whole pool from the
   * caller to the application account.
   */
  @abimethod()
  public initializePool(funding: gtxn.AssetTransferTxn): void {
    assert(!this.initialized.value, 'AlreadyInitialized')
    this.assertIncomingTransfer(funding, REWARD_POOL_TOKENS * this.baseUnitsPerToken.value)

    const sender = Txn.sender
    const record = this.getUserRecord(sender)
    const credited = this.accrued(record)

    this.credit(credited)
    this.stakers(sender).value = {
      assets: record.assets,
      unclaimedReward: record.unclaimedReward + credited,
      lastSettlementTime: this.settlementTime(record),
    }
    this.initialized.value = true

    emit<PoolInitialized>({ funder: sender, amount: this.remaining.value })
  }

  /**
   * Buy `amountOfAssets` at the fixed price, paid by `payment`
   */
  @abimethod()
  public buyAssets(payment: gtxn.AssetTransferTxn, amountOfAssets: uint64): void {
    assert(this.initialized.value, 'Uninitialized')
    assert(amountOfAssets > 0, 'ZeroAmountNotAllowed')
    this.assertIncomingTransfer(payment, this.priceOf(amountOfAssets))

    const sender = Txn.sender
    const record = this.getUserRecord(sender)
    const credited = this.accrued(record)

    this.credit(credited)
    this.stakers(sender).value = {
      assets: record.assets + amountOfAssets,
      unclaimedReward: record.unclaimedReward + credited,
      lastSettlementTime: this.settlementTime(record),
    }
    this.totalAssets.value = this.totalAssets.value + amountOfAssets

    emit<AssetsBought>({ account: sender, assetsBought: amountOfAssets })
  }

  /**
   * Sell `amountOfAssets` back at the fixed price
   */
  @abimethod()
  public redeemAssets(amountOfAssets: uint64): void {
    assert(amountOfAssets > 0, 'ZeroAmountNotAllowed')

    const sender = Txn.sender
    const record = this.getUserRecord(sender)
    assert(record.assets >= amountOfAssets, 'InsufficientAssets')

    const credited = this.accrued(record)

    this.credit(credited)
    this.stakers(sender).value = {
      assets: record.assets - amountOfAssets,
      unclaimedReward: record.unclaimedReward + credited,
      lastSettlementTime: this.settlementTime(record),
    }
    this.totalAssets.value = this.totalAssets.value - amountOfAssets

    itxn
      .assetTransfer({
        xferAsset: this.asset.value,
        assetReceiver: sender,
        assetAmount: this.priceOf(amountOfAssets),
      })
      .submit()

    emit<AssetsRedeemed>({ account: sender, assetsRedeemed: amountOfAssets })
  }

  /**
   * Pay out the caller's unclaimed reward in whole ASA base units.
   * Anything below one base unit stays unclaimed.
   */
  @abimethod()
  public claimRewards(): void {
    const sender = Txn.sender
    const record = this.getUserRecord(sender)
    const credited = this.accrued(record)
    const unclaimed: biguint = record.unclaimedReward + credited

    const scale = this.scalePerBaseUnit.value
    const payableUnits: biguint = unclaimed / scale
    assert(payableUnits > BigUint(0), 'NoRewardsForSender')

    const paid: biguint = payableUnits * scale

    this.credit(credited)
    this.stakers(sender).value = {
      assets: record.assets,
      unclaimedReward: unclaimed - paid,
      lastSettlementTime: this.settlementTime(record),
    }

    itxn
      .assetTransfer({
        xferAsset: this.asset.value,
        assetReceiver: sender,
        assetAmount: op.btoi(Bytes(payableUnits)),
      })
      .submit()

    emit<RewardsClaimed>({ account: sender, rewardWithdrawn: paid })
  }

  @abimethod({ readonly: true })
  public assetAddress(): Asset {
    return this.asset.value
  }

  @abimethod({ readonly: true })
  public isPoolInitialized(): boolean {
    return this.initialized.value
  }

  /**
   * Unclaimed reward of `account` plus what it has accrued up to now
   */
  @abimethod({ readonly: true })
  public currentClaimableReward(account: Account): biguint {
    const record = this.getUserRecord(account)
    return record.unclaimedReward + this.accrued(record)
  }

  @abimethod({ readonly: true })
  public assetBalance(account: Account): uint64 {
    return this.getUserRecord(account).assets
  }

  @abimethod({ readonly: true })
  public remainingPool(): biguint {
    return this.remaining.value
  }

  @abimethod({ readonly: true })
  public userStats(account: Account): UserStats {
    const record = this.getUserRecord(account)
    return {
      assets: record.assets,
      unclaimedReward: record.unclaimedReward,
      lastSettlementTime: record.lastSettlementTime,
      pendingReward: this.accrued(record),
    }
  }

  @abimethod({ readonly: true })
  public poolStats(): PoolStats {
    return {
      asset: this.asset.value.id,
      holdingAccount: Global.currentApplicationAddress,
      initialized: this.initialized.value,
      remaining: this.remaining.value,
      totalCredited: this.totalCredited.value,
      totalAssets: this.totalAssets.value,
    }
  }

  /**
   * Helper function to read a user record from box storage
   */
  private getUserRecord(account: Account): UserRecord {
    const box = this.stakers(account)

    if (box.exists) {
      return clone(box.value)
    }
    return { assets: 0, unclaimedReward: BigUint(0), lastSettlementTime: 0 }
  }

  private accrued(record: UserRecord): biguint {
    return pendingReward(record, Global.latestTimestamp, this.remaining.value, DAILY_REWARD_RATE_PER_ASSET)
  }

  // Move settled reward out of the pool
  private credit(amount: biguint): void {
    this.remaining.value = this.remaining.value - amount
    this.totalCredited.value = this.totalCredited.value + amount
  }

  private settlementTime(record: UserRecord): uint64 {
    const now = Global.latestTimestamp
    return now > record.lastSettlementTime ? now : record.lastSettlementTime
  }

  private priceOf(amountOfAssets: uint64): uint64 {
    return amountOfAssets * PRICE_PER_ASSET_TOKENS * this.baseUnitsPerToken.value
  }

  private assertIncomingTransfer(txn: gtxn.AssetTransferTxn, amount: uint64): void {
    assert(txn.sender === Txn.sender, 'Transfer must come from the caller')
    assert(txn.assetReceiver === Global.currentApplicationAddress, 'Transfer must go to the application account')
    assert(txn.xferAsset === this.asset.value, 'Transfer must be in the staked asset')
    assert(txn.assetAmount === amount, 'Transfer amount does not match')
  }
}
