import { BigNumber } from "@ethersproject/bignumber";

import { MIN_PROTECTION_RENEWAL_DURATION_IN_SECONDS } from "./Constants";
import { calculateAccruedPremium } from "./AccruedPremiumCalculator";
import { scale18DecimalsAmtToUnderlyingDecimals } from "./FixedPointMath";
import { IDefaultStateManager } from "../interfaces/IDefaultStateManager";
import { IProtectionPoolCycleManager } from "../interfaces/IProtectionPoolCycleManager";
import { LendingPoolStatus } from "../interfaces/IReferenceLendingPools";
import {
  CanNotRenewProtectionAfterGracePeriod,
  CanNotRenewProtectionWithHigherRenewalAmount,
  LendingPoolDefaulted,
  LendingPoolExpired,
  LendingPoolHasLatePayment,
  LendingPoolNotSupported,
  NoExpiredProtectionToRenew,
  ProtectionDurationTooLong,
  ProtectionDurationTooShort,
  ProtectionInfo,
  ProtectionPoolInfo,
  ProtectionPoolInOpenToSellersPhase,
  ProtectionPoolPhase,
  ProtectionPurchaseNotAllowed,
  ProtectionPurchaseParams
} from "../interfaces/IProtectionPool";

/**
 * Verifies that protection can be bought, or renewed, for the purchase params.
 * Brings the cycle state of the pool up to date before checking the duration.
 */
export function verifyProtection(
  poolCycleManager: IProtectionPoolCycleManager,
  defaultStateManager: IDefaultStateManager,
  protectionPool: string,
  poolInfo: ProtectionPoolInfo,
  buyer: string,
  protectionStartTimestamp: number,
  purchaseParams: ProtectionPurchaseParams,
  isRenewal: boolean,
  hasActiveProtection: boolean
): void {
  if (poolInfo.currentPhase === ProtectionPoolPhase.OpenToSellers) {
    throw new ProtectionPoolInOpenToSellersPhase();
  }

  verifyLendingPoolIsActive(
    defaultStateManager,
    protectionPool,
    purchaseParams.lendingPoolAddress
  );

  const duration = purchaseParams.protectionDurationInSeconds;
  const minDuration = isRenewal
    ? MIN_PROTECTION_RENEWAL_DURATION_IN_SECONDS
    : poolInfo.params.minProtectionDurationInSeconds;
  if (duration < minDuration) {
    throw new ProtectionDurationTooShort(duration);
  }

  // Protection can not extend beyond the end of the next cycle
  poolCycleManager.calculateAndSetPoolCycleState(protectionPool);
  if (
    protectionStartTimestamp + duration >
    poolCycleManager.getNextCycleEndTimestamp(protectionPool)
  ) {
    throw new ProtectionDurationTooLong(duration);
  }

  if (
    !poolInfo.referenceLendingPools.canBuyProtection(
      buyer,
      purchaseParams,
      isRenewal || hasActiveProtection
    )
  ) {
    throw new ProtectionPurchaseNotAllowed(
      purchaseParams.lendingPoolAddress,
      purchaseParams.positionId,
      purchaseParams.protectionAmount
    );
  }
}

export function verifyLendingPoolIsActive(
  defaultStateManager: IDefaultStateManager,
  protectionPool: string,
  lendingPoolAddress: string
): void {
  const status = defaultStateManager.getLendingPoolStatus(protectionPool, lendingPoolAddress);

  switch (status) {
    case LendingPoolStatus.NotSupported:
      throw new LendingPoolNotSupported(lendingPoolAddress);
    case LendingPoolStatus.LateWithinGracePeriod:
    case LendingPoolStatus.Late:
    case LendingPoolStatus.UnderReview:
      throw new LendingPoolHasLatePayment(lendingPoolAddress);
    case LendingPoolStatus.Expired:
      throw new LendingPoolExpired(lendingPoolAddress);
    case LendingPoolStatus.Defaulted:
      throw new LendingPoolDefaulted(lendingPoolAddress);
    case LendingPoolStatus.Active:
      return;
  }
}

/**
 * Verifies that the buyer holds an expired protection for the same lending position,
 * that the renewal happens within the grace period after its expiry and does not raise the amount.
 * @returns the expired protection being renewed
 */
export function verifyBuyerCanRenewProtection(
  protectionInfos: readonly ProtectionInfo[],
  expiredProtectionIndex: number | undefined,
  purchaseParams: ProtectionPurchaseParams,
  renewalGracePeriodInSeconds: number,
  currentTimestamp: number
): ProtectionInfo {
  if (expiredProtectionIndex === undefined || expiredProtectionIndex === 0) {
    throw new NoExpiredProtectionToRenew();
  }

  const expiredProtectionInfo = protectionInfos[expiredProtectionIndex];
  const expiredProtectionPurchaseParams = expiredProtectionInfo.purchaseParams;
  const expirationTimestamp =
    expiredProtectionInfo.startTimestamp + expiredProtectionPurchaseParams.protectionDurationInSeconds;
  // the accrual pass may not have marked it expired yet
  if (!expiredProtectionInfo.expired && currentTimestamp <= expirationTimestamp) {
    throw new NoExpiredProtectionToRenew();
  }

  const renewalCutoffTimestamp = expirationTimestamp + renewalGracePeriodInSeconds;
  if (currentTimestamp > renewalCutoffTimestamp) {
    throw new CanNotRenewProtectionAfterGracePeriod();
  }

  if (purchaseParams.protectionAmount.gt(expiredProtectionPurchaseParams.protectionAmount)) {
    throw new CanNotRenewProtectionWithHigherRenewalAmount();
  }

  return expiredProtectionInfo;
}

/**
 * Premium accrued by a protection between two points in time (seconds since its start),
 * in underlying token decimals.
 * The cumulative premium is scaled down at both ends so that the accrued amounts of consecutive
 * intervals add up to the premium paid. At the end of the protection it is the premium paid,
 * whatever the rounding of K.
 */
export function calculateAccruedPremiumInUnderlying(
  protectionInfo: ProtectionInfo,
  fromSecond: number,
  toSecond: number,
  underlyingTokenDecimals: number
): BigNumber {
  const accruedUntil = (second: number): BigNumber =>
    second >= protectionInfo.purchaseParams.protectionDurationInSeconds
      ? protectionInfo.protectionPremium
      : scale18DecimalsAmtToUnderlyingDecimals(
          calculateAccruedPremium(0, second, protectionInfo.K, protectionInfo.lambda),
          underlyingTokenDecimals
        );

  return accruedUntil(toSecond).sub(accruedUntil(fromSecond));
}
