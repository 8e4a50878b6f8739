import { BigNumber } from "@ethersproject/bignumber";
import { constants } from "ethers";
import { getAddress } from "ethers/lib/utils";

import { Contract } from "../base/Contract";
import { Clock } from "../base/Clock";
import { SECONDS_IN_DAY } from "../libraries/Constants";
import {
  DefaultStateManagerEvents,
  IDefaultStateManager,
  LendingPoolStatusDetail,
  LockedCapital,
  ProtectionPoolNotRegistered,
  ProtectionPoolStateAlreadyRegistered
} from "../interfaces/IDefaultStateManager";
import { IProtectionPool } from "../interfaces/IProtectionPool";
import {
  IReferenceLendingPools,
  LendingPoolStatus
} from "../interfaces/IReferenceLendingPools";
import { config } from "../../utils/config";
import { createLogger } from "../../utils/logger";

const logger = createLogger("DefaultStateManager");

export interface DefaultStatePolicy {
  /// Payments a late lending pool must make before its capital is unlocked
  paymentsToUnlock: number;
  /// Payment periods after turning late at which a still late lending pool is considered defaulted
  paymentPeriodsToDefault: number;
}

export interface DefaultStateManagerOptions {
  owner: string;
  policy?: Partial<DefaultStatePolicy>;
}

interface ProtectionPoolState {
  protectionPool: IProtectionPool;
  updatedTimestamp: number;
  lendingPoolStateDetails: Map<string, LendingPoolStatusDetail>;
  /// lending pool => locked capital instances, oldest first
  lockedCapitals: Map<string, LockedCapital[]>;
  /// lending pool => seller => index of the next locked capital instance to claim
  nextClaimIndexes: Map<string, Map<string, number>>;
}

const isLocked = (status: LendingPoolStatus): boolean =>
  status === LendingPoolStatus.Late || status === LendingPoolStatus.UnderReview;

/**
 * Tracks the status of every lending pool of every registered protection pool.
 *
 * Moves lending pools through Active -> Late -> UnderReview -> Active, locking the capital
 * of the protection pool when a lending pool turns late and unlocking it once enough
 * payments were made. Defaulted and Expired are terminal.
 */
export class DefaultStateManager
  extends Contract<DefaultStateManagerEvents>
  implements IDefaultStateManager
{
  readonly policy: Readonly<DefaultStatePolicy>;

  private readonly protectionPoolStates = new Map<string, ProtectionPoolState>();

  constructor(address: string, clock: Clock, options: DefaultStateManagerOptions) {
    super(address, clock, options.owner);
    this.policy = Object.freeze({
      paymentsToUnlock: options.policy?.paymentsToUnlock ?? config.PAYMENTS_TO_UNLOCK,
      paymentPeriodsToDefault:
        options.policy?.paymentPeriodsToDefault ?? config.MISSED_PAYMENT_PERIODS_TO_DEFAULT
    });
  }

  /**
   * Registers a protection pool and assesses the state of its lending pools right away.
   */
  registerProtectionPool(sender: string, protectionPool: IProtectionPool): void {
    this.onlyOwner(sender);

    const poolAddress = getAddress(protectionPool.address);
    if (this.protectionPoolStates.has(poolAddress)) {
      throw new ProtectionPoolStateAlreadyRegistered(poolAddress);
    }

    const poolState: ProtectionPoolState = {
      protectionPool,
      updatedTimestamp: 0,
      lendingPoolStateDetails: new Map(),
      lockedCapitals: new Map(),
      nextClaimIndexes: new Map()
    };
    this.protectionPoolStates.set(poolAddress, poolState);
    this.emit("ProtectionPoolRegistered", poolAddress);

    this._assessState(poolState);
  }

  /**
   * Assesses the lending pools of every registered protection pool.
   */
  assessStates(): void {
    for (const poolState of this.protectionPoolStates.values()) {
      this._assessState(poolState);
    }
    this.emit("ProtectionPoolStatesAssessed", this.blockTimestamp);
  }

  assessStateBatch(protectionPools: string[]): void {
    const poolStates = protectionPools.map((poolAddress) => this._getPoolState(poolAddress));
    for (const poolState of poolStates) {
      this._assessState(poolState);
    }
    this.emit("ProtectionPoolStatesAssessed", this.blockTimestamp);
  }

  calculateAndClaimUnlockedCapital(sender: string, seller: string): BigNumber {
    const poolState = this._getPoolState(sender);

    let claimedUnlockedCapital = constants.Zero;
    for (const [lendingPool, lockedCapitals] of poolState.lockedCapitals) {
      const sellerKey = getAddress(seller);
      const { unlockedCapital, nextClaimIndex } = this._calculateClaimableAmount(
        poolState,
        lendingPool,
        lockedCapitals,
        sellerKey
      );
      claimedUnlockedCapital = claimedUnlockedCapital.add(unlockedCapital);

      const sellerClaimIndexes =
        poolState.nextClaimIndexes.get(lendingPool) ?? new Map<string, number>();
      sellerClaimIndexes.set(sellerKey, nextClaimIndex);
      poolState.nextClaimIndexes.set(lendingPool, sellerClaimIndexes);
    }

    if (claimedUnlockedCapital.gt(0)) {
      logger.debug(
        `Seller ${seller} claimed ${claimedUnlockedCapital.toString()} from pool ${poolState.protectionPool.address}`
      );
    }
    return claimedUnlockedCapital;
  }

  /*** view functions ***/

  calculateClaimableUnlockedAmount(protectionPoolAddress: string, seller: string): BigNumber {
    const poolState = this.protectionPoolStates.get(getAddress(protectionPoolAddress));
    if (!poolState) {
      return constants.Zero;
    }

    let claimableUnlockedCapital = constants.Zero;
    for (const [lendingPool, lockedCapitals] of poolState.lockedCapitals) {
      claimableUnlockedCapital = claimableUnlockedCapital.add(
        this._calculateClaimableAmount(poolState, lendingPool, lockedCapitals, getAddress(seller))
          .unlockedCapital
      );
    }
    return claimableUnlockedCapital;
  }

  getLendingPoolStatus(
    protectionPoolAddress: string,
    lendingPoolAddress: string
  ): LendingPoolStatus {
    return (
      this.protectionPoolStates
        .get(getAddress(protectionPoolAddress))
        ?.lendingPoolStateDetails.get(getAddress(lendingPoolAddress))?.currentStatus ??
      LendingPoolStatus.NotSupported
    );
  }

  getLendingPoolStatusDetail(
    protectionPoolAddress: string,
    lendingPoolAddress: string
  ): LendingPoolStatusDetail | undefined {
    const detail = this._getPoolState(protectionPoolAddress).lendingPoolStateDetails.get(
      getAddress(lendingPoolAddress)
    );
    return detail ? { ...detail } : undefined;
  }

  getLockedCapitals(protectionPoolAddress: string, lendingPoolAddress: string): LockedCapital[] {
    const lockedCapitals = this._getPoolState(protectionPoolAddress).lockedCapitals.get(
      getAddress(lendingPoolAddress)
    );
    return (lockedCapitals ?? []).map((lockedCapital) => ({ ...lockedCapital }));
  }

  getPoolStateUpdateTimestamp(protectionPoolAddress: string): number {
    return this.protectionPoolStates.get(getAddress(protectionPoolAddress))?.updatedTimestamp ?? 0;
  }

  /*** internal functions ***/

  private _getPoolState(protectionPoolAddress: string): ProtectionPoolState {
    const poolState = this.protectionPoolStates.get(getAddress(protectionPoolAddress));
    if (!poolState) {
      throw new ProtectionPoolNotRegistered(protectionPoolAddress);
    }
    return poolState;
  }

  private _assessState(poolState: ProtectionPoolState): void {
    const now = this.blockTimestamp;
    poolState.updatedTimestamp = now;

    const referenceLendingPools = poolState.protectionPool.getPoolInfo().referenceLendingPools;
    const { lendingPools, statuses } = referenceLendingPools.assessState();

    lendingPools.forEach((lendingPoolAddress, index) => {
      const lendingPool = getAddress(lendingPoolAddress);
      const observedStatus = statuses[index];

      let detail = poolState.lendingPoolStateDetails.get(lendingPool);
      if (!detail) {
        detail = {
          currentStatus: LendingPoolStatus.NotSupported,
          lateTimestamp: 0,
          lastPaymentTimestamp: 0,
          confirmedPayments: 0
        };
        poolState.lendingPoolStateDetails.set(lendingPool, detail);
      }

      const previousStatus = detail.currentStatus;
      const newStatus = isLocked(previousStatus)
        ? this._assessLockedLendingPool(poolState, referenceLendingPools, lendingPool, detail, observedStatus)
        : this._assessUnlockedLendingPool(poolState, referenceLendingPools, lendingPool, detail, observedStatus);

      detail.currentStatus = newStatus;
      if (newStatus !== previousStatus) {
        this.emit(
          "LendingPoolStatusUpdated",
          poolState.protectionPool.address,
          lendingPool,
          previousStatus,
          newStatus
        );
        logger.debug(
          `Lending pool ${lendingPool} of pool ${poolState.protectionPool.address}: ${LendingPoolStatus[previousStatus]} -> ${LendingPoolStatus[newStatus]}`
        );
      }
    });
  }

  /**
   * Transitions from Active, LateWithinGracePeriod or NotSupported.
   */
  private _assessUnlockedLendingPool(
    poolState: ProtectionPoolState,
    referenceLendingPools: IReferenceLendingPools,
    lendingPool: string,
    detail: LendingPoolStatusDetail,
    observedStatus: LendingPoolStatus
  ): LendingPoolStatus {
    const previousStatus = detail.currentStatus;
    if (previousStatus === LendingPoolStatus.Defaulted || previousStatus === LendingPoolStatus.Expired) {
      return previousStatus;
    }

    if (observedStatus === LendingPoolStatus.Late) {
      this._lockCapital(poolState, lendingPool);
      detail.lateTimestamp = this.blockTimestamp;
      detail.lastPaymentTimestamp = referenceLendingPools.getLatestPaymentTimestamp(lendingPool);
      detail.confirmedPayments = 0;
      return LendingPoolStatus.Late;
    }

    if (observedStatus === LendingPoolStatus.Defaulted) {
      // capital backing the protections is kept for the buyers
      this._lockCapital(poolState, lendingPool);
      return LendingPoolStatus.Defaulted;
    }

    return observedStatus;
  }

  /**
   * Transitions from Late or UnderReview.
   */
  private _assessLockedLendingPool(
    poolState: ProtectionPoolState,
    referenceLendingPools: IReferenceLendingPools,
    lendingPool: string,
    detail: LendingPoolStatusDetail,
    observedStatus: LendingPoolStatus
  ): LendingPoolStatus {
    if (observedStatus === LendingPoolStatus.Defaulted) {
      return LendingPoolStatus.Defaulted;
    }

    if (observedStatus === LendingPoolStatus.Expired) {
      this._unlockCapital(poolState, lendingPool);
      return LendingPoolStatus.Expired;
    }

    if (observedStatus === LendingPoolStatus.Late) {
      const paymentPeriodInSeconds =
        referenceLendingPools.getPaymentPeriodInDays(lendingPool) * SECONDS_IN_DAY;
      if (
        this.blockTimestamp >
        detail.lateTimestamp + this.policy.paymentPeriodsToDefault * paymentPeriodInSeconds
      ) {
        return LendingPoolStatus.Defaulted;
      }

      // a late payment after recovering payments restarts the count
      detail.confirmedPayments = 0;
      detail.lastPaymentTimestamp = referenceLendingPools.getLatestPaymentTimestamp(lendingPool);
      return LendingPoolStatus.Late;
    }

    const latestPaymentTimestamp = referenceLendingPools.getLatestPaymentTimestamp(lendingPool);
    if (
      observedStatus === LendingPoolStatus.Active &&
      latestPaymentTimestamp > detail.lastPaymentTimestamp
    ) {
      detail.confirmedPayments += 1;
      detail.lastPaymentTimestamp = latestPaymentTimestamp;

      if (detail.confirmedPayments >= this.policy.paymentsToUnlock) {
        this._unlockCapital(poolState, lendingPool);
        detail.lateTimestamp = 0;
        detail.confirmedPayments = 0;
        return LendingPoolStatus.Active;
      }
      return LendingPoolStatus.UnderReview;
    }

    return detail.currentStatus;
  }

  private _lockCapital(poolState: ProtectionPoolState, lendingPool: string): void {
    const protectionPool = poolState.protectionPool;
    const { lockedAmount, snapshotId } = protectionPool.lockCapital(this.address, lendingPool);

    const lockedCapitals = poolState.lockedCapitals.get(lendingPool) ?? [];
    lockedCapitals.push({ snapshotId, amount: lockedAmount, locked: true });
    poolState.lockedCapitals.set(lendingPool, lockedCapitals);

    this.emit("LendingPoolLocked", lendingPool, protectionPool.address, snapshotId, lockedAmount);
  }

  private _unlockCapital(poolState: ProtectionPoolState, lendingPool: string): void {
    const protectionPool = poolState.protectionPool;
    protectionPool.unlockLendingPool(this.address, lendingPool);

    const lockedCapitals = poolState.lockedCapitals.get(lendingPool) ?? [];
    const latestLockedCapital = lockedCapitals[lockedCapitals.length - 1];
    if (latestLockedCapital?.locked) {
      latestLockedCapital.locked = false;
      this.emit(
        "LendingPoolUnlocked",
        lendingPool,
        protectionPool.address,
        latestLockedCapital.amount
      );
    }
  }

  /**
   * Seller's share of the unlocked, unclaimed capital of a lending pool:
   * sum of lockedAmount * sellerBalanceAtSnapshot / totalSupplyAtSnapshot.
   * Stops at the first instance still locked.
   */
  private _calculateClaimableAmount(
    poolState: ProtectionPoolState,
    lendingPool: string,
    lockedCapitals: LockedCapital[],
    seller: string
  ): { unlockedCapital: BigNumber; nextClaimIndex: number } {
    const protectionPool = poolState.protectionPool;
    let index = poolState.nextClaimIndexes.get(lendingPool)?.get(seller) ?? 0;
    let unlockedCapital = constants.Zero;

    for (; index < lockedCapitals.length; index++) {
      const lockedCapital = lockedCapitals[index];
      if (lockedCapital.locked) {
        break;
      }

      const totalSupplyAtSnapshot = protectionPool.totalSupplyAt(lockedCapital.snapshotId);
      if (totalSupplyAtSnapshot.isZero()) {
        continue;
      }
      const sellerBalanceAtSnapshot = protectionPool.balanceOfAt(seller, lockedCapital.snapshotId);
      unlockedCapital = unlockedCapital.add(
        lockedCapital.amount.mul(sellerBalanceAtSnapshot).div(totalSupplyAtSnapshot)
      );
    }

    return { unlockedCapital, nextClaimIndex: index };
  }
}
