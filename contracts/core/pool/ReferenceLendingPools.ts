import { BigNumber } from "@ethersproject/bignumber";
import { constants } from "ethers";
import { getAddress } from "ethers/lib/utils";

import { Contract } from "../../base/Contract";
import { Clock } from "../../base/Clock";
import { SECONDS_IN_DAY } from "../../libraries/Constants";
import {
  ILendingProtocolAdapter,
  LendingProtocol
} from "../../interfaces/ILendingProtocolAdapter";
import {
  IReferenceLendingPools,
  LendingPoolsState,
  LendingPoolStatus,
  LendingProtocolNotSupported,
  ReferenceLendingPoolAlreadyAdded,
  ReferenceLendingPoolInfo,
  ReferenceLendingPoolIsNotActive,
  ReferenceLendingPoolIsZeroAddress,
  ReferenceLendingPoolNotSupported,
  ReferenceLendingPoolsEvents
} from "../../interfaces/IReferenceLendingPools";
import { ProtectionPurchaseParams } from "../../interfaces/IProtectionPool";
import { config } from "../../../utils/config";
import { createLogger } from "../../../utils/logger";

const logger = createLogger("ReferenceLendingPools");

export interface ReferenceLendingPoolsOptions {
  owner: string;
  /// Days after the payment period a late borrower is still considered within grace period
  latePaymentGracePeriodInDays?: number;
}

/**
 * Basket of lending pools, each backed by the adapter of its lending protocol.
 * Derives the status of every lending pool from the facts its adapter reports.
 */
export class ReferenceLendingPools
  extends Contract<ReferenceLendingPoolsEvents>
  implements IReferenceLendingPools
{
  private readonly referenceLendingPools = new Map<string, ReferenceLendingPoolInfo>();
  private readonly lendingPools: string[] = [];
  private readonly lendingProtocolAdapters = new Map<LendingProtocol, ILendingProtocolAdapter>();
  private readonly latePaymentGracePeriodInDays: number;

  constructor(address: string, clock: Clock, options: ReferenceLendingPoolsOptions) {
    super(address, clock, options.owner);
    this.latePaymentGracePeriodInDays =
      options.latePaymentGracePeriodInDays ?? config.LATE_PAYMENT_GRACE_PERIOD_IN_DAYS;
  }

  setLendingProtocolAdapter(
    sender: string,
    protocol: LendingProtocol,
    adapter: ILendingProtocolAdapter
  ): void {
    this.onlyOwner(sender);
    this.lendingProtocolAdapters.set(protocol, adapter);
    this.emit("LendingProtocolAdapterUpdated", protocol, adapter.address);
  }

  /**
   * Adds a lending pool to the basket. Protection can be bought for it until
   * `protectionPurchaseLimitInDays` after it was added.
   */
  addReferenceLendingPool(
    sender: string,
    lendingPoolAddress: string,
    protocol: LendingProtocol,
    protectionPurchaseLimitInDays: number
  ): void {
    this.onlyOwner(sender);

    if (lendingPoolAddress.toLowerCase() === constants.AddressZero) {
      throw new ReferenceLendingPoolIsZeroAddress();
    }

    const lendingPool = getAddress(lendingPoolAddress);
    if (this.referenceLendingPools.has(lendingPool)) {
      throw new ReferenceLendingPoolAlreadyAdded(lendingPool);
    }

    const adapter = this.lendingProtocolAdapters.get(protocol);
    if (!adapter) {
      throw new LendingProtocolNotSupported(protocol);
    }

    if (this._getLendingPoolStatus(lendingPool, adapter) !== LendingPoolStatus.Active) {
      throw new ReferenceLendingPoolIsNotActive(lendingPool);
    }

    const addedTimestamp = this.blockTimestamp;
    const info: ReferenceLendingPoolInfo = {
      protocol,
      addedTimestamp,
      protectionPurchaseLimitTimestamp:
        addedTimestamp + protectionPurchaseLimitInDays * SECONDS_IN_DAY
    };
    this.referenceLendingPools.set(lendingPool, info);
    this.lendingPools.push(lendingPool);

    this.emit(
      "ReferenceLendingPoolAdded",
      lendingPool,
      protocol,
      addedTimestamp,
      info.protectionPurchaseLimitTimestamp
    );
    logger.info(`Added lending pool ${lendingPool}`);
  }

  getLendingPools(): string[] {
    return [...this.lendingPools];
  }

  getReferenceLendingPoolInfo(lendingPoolAddress: string): ReferenceLendingPoolInfo {
    const info = this.referenceLendingPools.get(getAddress(lendingPoolAddress));
    return info
      ? { ...info }
      : { protocol: LendingProtocol.Goldfinch, addedTimestamp: 0, protectionPurchaseLimitTimestamp: 0 };
  }

  getLendingProtocolAdapter(protocol: LendingProtocol): ILendingProtocolAdapter {
    const adapter = this.lendingProtocolAdapters.get(protocol);
    if (!adapter) {
      throw new LendingProtocolNotSupported(protocol);
    }
    return adapter;
  }

  getLendingPoolStatus(lendingPoolAddress: string): LendingPoolStatus {
    const lendingPool = getAddress(lendingPoolAddress);
    const info = this.referenceLendingPools.get(lendingPool);
    if (!info) {
      return LendingPoolStatus.NotSupported;
    }
    return this._getLendingPoolStatus(lendingPool, this.getLendingProtocolAdapter(info.protocol));
  }

  assessState(): LendingPoolsState {
    const lendingPools = this.getLendingPools();
    return {
      lendingPools,
      statuses: lendingPools.map((lendingPool) => this.getLendingPoolStatus(lendingPool))
    };
  }

  canBuyProtection(
    buyer: string,
    purchaseParams: ProtectionPurchaseParams,
    isRenewal: boolean
  ): boolean {
    const lendingPool = getAddress(purchaseParams.lendingPoolAddress);
    const info = this._getInfo(lendingPool);

    // Past the purchase limit, only buyers extending existing protection can buy
    if (this.blockTimestamp > info.protectionPurchaseLimitTimestamp && !isRenewal) {
      return false;
    }

    return purchaseParams.protectionAmount.lte(
      this.calculateRemainingPrincipal(lendingPool, buyer, purchaseParams.positionId)
    );
  }

  calculateProtectionBuyerAPR(lendingPoolAddress: string): BigNumber {
    return this._getAdapter(lendingPoolAddress).calculateProtectionBuyerAPR(
      getAddress(lendingPoolAddress)
    );
  }

  calculateRemainingPrincipal(
    lendingPoolAddress: string,
    lender: string,
    positionId: number
  ): BigNumber {
    return this._getAdapter(lendingPoolAddress).calculateRemainingPrincipal(
      getAddress(lendingPoolAddress),
      lender,
      positionId
    );
  }

  getLatestPaymentTimestamp(lendingPoolAddress: string): number {
    return this._getAdapter(lendingPoolAddress).getLatestPaymentTimestamp(
      getAddress(lendingPoolAddress)
    );
  }

  getPaymentPeriodInDays(lendingPoolAddress: string): number {
    return this._getAdapter(lendingPoolAddress).getPaymentPeriodInDays(
      getAddress(lendingPoolAddress)
    );
  }

  private _getInfo(lendingPool: string): ReferenceLendingPoolInfo {
    const info = this.referenceLendingPools.get(lendingPool);
    if (!info) {
      throw new ReferenceLendingPoolNotSupported(lendingPool);
    }
    return info;
  }

  private _getAdapter(lendingPoolAddress: string): ILendingProtocolAdapter {
    return this.getLendingProtocolAdapter(this._getInfo(getAddress(lendingPoolAddress)).protocol);
  }

  private _getLendingPoolStatus(
    lendingPool: string,
    adapter: ILendingProtocolAdapter
  ): LendingPoolStatus {
    if (adapter.isLendingPoolExpired(lendingPool)) {
      return LendingPoolStatus.Expired;
    }

    if (adapter.isLendingPoolDefaulted(lendingPool)) {
      return LendingPoolStatus.Defaulted;
    }

    if (adapter.isLendingPoolLate(lendingPool)) {
      // A late payment within the grace period does not lock capital yet
      const gracePeriodEnd =
        adapter.getLatestPaymentTimestamp(lendingPool) +
        (adapter.getPaymentPeriodInDays(lendingPool) + this.latePaymentGracePeriodInDays) *
          SECONDS_IN_DAY;
      return this.blockTimestamp <= gracePeriodEnd
        ? LendingPoolStatus.LateWithinGracePeriod
        : LendingPoolStatus.Late;
    }

    return LendingPoolStatus.Active;
  }
}
