import { ethers } from 'ethers'
import type { AssetSnapshot } from '../types/lifecycle.js'

export interface FeeView {
  wei: string
  ether: string
}

export const presentFee = (fee: bigint): FeeView => ({
  wei: fee.toString(),
  ether: ethers.formatEther(fee),
})

export const presentAsset = (owner: string, snapshot: AssetSnapshot) => ({
  assetId: snapshot.checked.assetId,
  tierId: snapshot.checked.tierId,
  owner,
  window: {
    start: snapshot.checked.windowStart,
    end: snapshot.checked.windowEnd,
    status: snapshot.checked.status,
  },
  uncheckedWindow: {
    start: snapshot.unchecked.windowStart,
    end: snapshot.unchecked.windowEnd,
    status: snapshot.unchecked.status,
  },
  feeOwed: presentFee(snapshot.feeOwed),
  discountedFeeOwed: presentFee(snapshot.discountedFeeOwed),
})
