import { BigNumber } from "@ethersproject/bignumber";

import { AdmissionError, AuthorizationError } from "../libraries/Errors";
import { IERC20 } from "./IERC20";
import { IReferenceLendingPools } from "./IReferenceLendingPools";

export enum ProtectionPoolPhase {
  OpenToSellers = 0,
  OpenToBuyers = 1,
  Open = 2
}

/**
 * Economic parameters of a pool. Percentages and ratios are in 18 decimals,
 * capital and protection amounts in underlying token decimals.
 */
export interface ProtectionPoolParams {
  leverageRatioFloor: BigNumber;
  leverageRatioCeiling: BigNumber;
  leverageRatioBuffer: BigNumber;
  minRequiredCapital: BigNumber;
  minRequiredProtection: BigNumber;
  curvature: BigNumber;
  minRiskPremiumPercent: BigNumber;
  underlyingRiskPremiumPercent: BigNumber;
  minProtectionDurationInSeconds: number;
  protectionRenewalGracePeriodInSeconds: number;
}

export interface ProtectionPoolInfo {
  params: Readonly<ProtectionPoolParams>;
  /// Incremented every time the params are replaced
  paramsVersion: number;
  underlyingToken: IERC20;
  referenceLendingPools: IReferenceLendingPools;
  currentPhase: ProtectionPoolPhase;
}

export interface ProtectionPurchaseParams {
  lendingPoolAddress: string;
  /// Identifier of the buyer's position in the lending pool
  positionId: number;
  /// In underlying token decimals
  protectionAmount: BigNumber;
  protectionDurationInSeconds: number;
}

export interface ProtectionInfo {
  buyer: string;
  /// In underlying token decimals
  protectionPremium: BigNumber;
  startTimestamp: number;
  /// Accrual constant, 18 decimals
  K: BigNumber;
  /// Accrual rate per day, 18 decimals
  lambda: BigNumber;
  expired: boolean;
  purchaseParams: ProtectionPurchaseParams;
}

export interface LendingPoolDetail {
  lastPremiumAccrualTimestamp: number;
  totalPremium: BigNumber;
  totalProtection: BigNumber;
  /// Set while the capital for this lending pool is locked
  locked: boolean;
  activeProtectionIndexes: number[];
}

export interface ProtectionPoolDetails {
  totalSTokenUnderlying: BigNumber;
  totalProtection: BigNumber;
  totalPremium: BigNumber;
  totalPremiumAccrued: BigNumber;
}

export interface LockCapitalResult {
  lockedAmount: BigNumber;
  snapshotId: number;
}

/**
 * Surface of a protection pool the default state manager works against.
 */
export interface IProtectionPool {
  readonly address: string;

  getPoolInfo(): ProtectionPoolInfo;

  /**
   * Locks the capital backing the active protections of a lending pool.
   * Only callable by the default state manager.
   */
  lockCapital(sender: string, lendingPoolAddress: string): LockCapitalResult;

  /**
   * Restores protection accounting of a lending pool which recovered.
   * Only callable by the default state manager.
   */
  unlockLendingPool(sender: string, lendingPoolAddress: string): void;

  balanceOfAt(account: string, snapshotId: number): BigNumber;

  totalSupplyAt(snapshotId: number): BigNumber;
}

export type ProtectionPoolEvents = {
  ProtectionPoolInitialized: [name: string, symbol: string, underlyingToken: string];
  ProtectionSold: [protectionSeller: string, amount: BigNumber];
  ProtectionBought: [
    buyer: string,
    lendingPoolAddress: string,
    protectionAmount: BigNumber,
    premium: BigNumber
  ];
  ProtectionRenewed: [
    buyer: string,
    lendingPoolAddress: string,
    protectionAmount: BigNumber,
    premium: BigNumber
  ];
  ProtectionExpired: [
    buyer: string,
    lendingPoolAddress: string,
    protectionAmount: BigNumber
  ];
  PremiumAccrued: [
    lendingPoolAddress: string,
    lastPremiumAccrualTimestamp: number,
    totalPremiumAccrued: BigNumber
  ];
  WithdrawalRequested: [seller: string, sTokenAmount: BigNumber, withdrawalCycleIndex: number];
  WithdrawalMade: [seller: string, sTokenAmount: BigNumber, receiver: string];
  ProtectionPoolPhaseUpdated: [newPhase: ProtectionPoolPhase];
  ProtectionPoolParamsUpdated: [paramsVersion: number];
  UnlockedCapitalClaimed: [seller: string, receiver: string, amount: BigNumber];
};

export class LendingPoolNotSupported extends AdmissionError {
  constructor(lendingPoolAddress: string) {
    super("LendingPoolNotSupported", [lendingPoolAddress]);
  }
}

export class LendingPoolHasLatePayment extends AdmissionError {
  constructor(lendingPoolAddress: string) {
    super("LendingPoolHasLatePayment", [lendingPoolAddress]);
  }
}

export class LendingPoolExpired extends AdmissionError {
  constructor(lendingPoolAddress: string) {
    super("LendingPoolExpired", [lendingPoolAddress]);
  }
}

export class LendingPoolDefaulted extends AdmissionError {
  constructor(lendingPoolAddress: string) {
    super("LendingPoolDefaulted", [lendingPoolAddress]);
  }
}

export class ProtectionPurchaseNotAllowed extends AdmissionError {
  constructor(lendingPoolAddress: string, positionId: number, protectionAmount: BigNumber) {
    super("ProtectionPurchaseNotAllowed", [lendingPoolAddress, positionId, protectionAmount]);
  }
}

export class ProtectionDurationTooShort extends AdmissionError {
  constructor(protectionDurationInSeconds: number) {
    super("ProtectionDurationTooShort", [protectionDurationInSeconds]);
  }
}

export class ProtectionDurationTooLong extends AdmissionError {
  constructor(protectionDurationInSeconds: number) {
    super("ProtectionDurationTooLong", [protectionDurationInSeconds]);
  }
}

export class ProtectionPoolIsNotOpen extends AdmissionError {
  constructor() {
    super("ProtectionPoolIsNotOpen");
  }
}

export class ProtectionPoolLeverageRatioTooHigh extends AdmissionError {
  constructor(leverageRatio: BigNumber) {
    super("ProtectionPoolLeverageRatioTooHigh", [leverageRatio]);
  }
}

export class ProtectionPoolLeverageRatioTooLow extends AdmissionError {
  constructor(leverageRatio: BigNumber) {
    super("ProtectionPoolLeverageRatioTooLow", [leverageRatio]);
  }
}

export class ProtectionPoolHasNoAvailableCapital extends AdmissionError {
  constructor(totalSTokenSupply: BigNumber) {
    super("ProtectionPoolHasNoAvailableCapital", [totalSTokenSupply]);
  }
}

export class ProtectionPoolInOpenToSellersPhase extends AdmissionError {
  constructor() {
    super("ProtectionPoolInOpenToSellersPhase");
  }
}

export class ProtectionPoolInOpenToBuyersPhase extends AdmissionError {
  constructor() {
    super("ProtectionPoolInOpenToBuyersPhase");
  }
}

export class NoWithdrawalRequested extends AdmissionError {
  constructor(seller: string, withdrawalCycleIndex: number) {
    super("NoWithdrawalRequested", [seller, withdrawalCycleIndex]);
  }
}

export class WithdrawalHigherThanRequested extends AdmissionError {
  constructor(seller: string, requestedSTokenAmount: BigNumber) {
    super("WithdrawalHigherThanRequested", [seller, requestedSTokenAmount]);
  }
}

export class InsufficientSTokenBalance extends AdmissionError {
  constructor(account: string, sTokenBalance: BigNumber) {
    super("InsufficientSTokenBalance", [account, sTokenBalance]);
  }
}

export class InvalidSTokenAmount extends AdmissionError {
  constructor(sTokenAmount: BigNumber) {
    super("InvalidSTokenAmount", [sTokenAmount]);
  }
}

export class InvalidDepositAmount extends AdmissionError {
  constructor(amount: BigNumber) {
    super("InvalidDepositAmount", [amount]);
  }
}

export class InvalidReceiver extends AdmissionError {
  constructor(receiver: string) {
    super("InvalidReceiver", [receiver]);
  }
}

export class PremiumExceedsMaxPremiumAmount extends AdmissionError {
  constructor(premium: BigNumber, maxPremiumAmount: BigNumber) {
    super("PremiumExceedsMaxPremiumAmount", [premium, maxPremiumAmount]);
  }
}

export class NoExpiredProtectionToRenew extends AdmissionError {
  constructor() {
    super("NoExpiredProtectionToRenew");
  }
}

export class CanNotRenewProtectionAfterGracePeriod extends AdmissionError {
  constructor() {
    super("CanNotRenewProtectionAfterGracePeriod");
  }
}

export class CanNotRenewProtectionWithHigherRenewalAmount extends AdmissionError {
  constructor() {
    super("CanNotRenewProtectionWithHigherRenewalAmount");
  }
}

export class OnlyDefaultStateManager extends AuthorizationError {
  constructor(sender: string) {
    super("OnlyDefaultStateManager", [sender]);
  }
}

export class InvalidPoolParams extends AdmissionError {
  constructor(reason: string) {
    super("InvalidPoolParams", [reason]);
  }
}
