import { BigNumber } from "@ethersproject/bignumber";
import { constants } from "ethers";
import { getAddress } from "ethers/lib/utils";

import { Contract } from "../../base/Contract";
import { Clock } from "../../base/Clock";
import { SToken } from "./SToken";
import { SCALE_18_DECIMALS } from "../../libraries/Constants";
import { calculateKAndLambda, secondsToScaledDays } from "../../libraries/AccruedPremiumCalculator";
import { clampLeverageRatio } from "../../libraries/RiskFactorCalculator";
import {
  scale18DecimalsAmtToUnderlyingDecimals,
  scaleUnderlyingAmtTo18Decimals
} from "../../libraries/FixedPointMath";
import {
  calculateAccruedPremiumInUnderlying,
  verifyBuyerCanRenewProtection,
  verifyProtection
} from "../../libraries/ProtectionPoolHelper";
import { IERC20 } from "../../interfaces/IERC20";
import { IDefaultStateManager } from "../../interfaces/IDefaultStateManager";
import { IPremiumCalculator, PremiumQuote } from "../../interfaces/IPremiumCalculator";
import {
  IProtectionPoolCycleManager,
  ProtectionPoolCycleState
} from "../../interfaces/IProtectionPoolCycleManager";
import {
  IReferenceLendingPools,
  LendingPoolStatus
} from "../../interfaces/IReferenceLendingPools";
import {
  InsufficientSTokenBalance,
  InvalidDepositAmount,
  InvalidPoolParams,
  InvalidReceiver,
  InvalidSTokenAmount,
  IProtectionPool,
  LendingPoolDetail,
  LockCapitalResult,
  NoWithdrawalRequested,
  OnlyDefaultStateManager,
  PremiumExceedsMaxPremiumAmount,
  ProtectionInfo,
  ProtectionPoolDetails,
  ProtectionPoolEvents,
  ProtectionPoolHasNoAvailableCapital,
  ProtectionPoolInfo,
  ProtectionPoolInOpenToBuyersPhase,
  ProtectionPoolIsNotOpen,
  ProtectionPoolLeverageRatioTooHigh,
  ProtectionPoolLeverageRatioTooLow,
  ProtectionPoolParams,
  ProtectionPoolPhase,
  ProtectionPurchaseParams,
  WithdrawalHigherThanRequested
} from "../../interfaces/IProtectionPool";
import { createLogger } from "../../../utils/logger";

const logger = createLogger("ProtectionPool");

export interface ProtectionPoolOptions {
  owner: string;
  params: ProtectionPoolParams;
  underlyingToken: IERC20;
  referenceLendingPools: IReferenceLendingPools;
  premiumCalculator: IPremiumCalculator;
  poolCycleManager: IProtectionPoolCycleManager;
  defaultStateManager: IDefaultStateManager;
  sTokenAddress: string;
  sTokenName: string;
  sTokenSymbol: string;
}

interface LendingPoolState {
  lastPremiumAccrualTimestamp: number;
  totalPremium: BigNumber;
  totalProtection: BigNumber;
  locked: boolean;
  activeProtectionIndexes: Set<number>;
}

interface ProtectionBuyerAccount {
  lendingPoolToPremium: Map<string, BigNumber>;
  activeProtectionIndexes: Set<number>;
  /// lending pool => position id => index of the latest protection for the position
  lendingPoolToPositionToProtectionIndex: Map<string, Map<number, number>>;
}

interface WithdrawalCycleDetail {
  totalSTokenRequested: BigNumber;
  withdrawalRequests: Map<string, BigNumber>;
}

interface AccrualResult {
  premiumAccrued: BigNumber;
  protectionRemoved: BigNumber;
}

const ZERO = constants.Zero;

const copyProtectionInfo = (protectionInfo: ProtectionInfo): ProtectionInfo => ({
  ...protectionInfo,
  purchaseParams: { ...protectionInfo.purchaseParams }
});

/**
 * Validates pool params and returns a frozen copy.
 */
export function validatePoolParams(params: ProtectionPoolParams): Readonly<ProtectionPoolParams> {
  if (params.leverageRatioFloor.lte(0) || params.leverageRatioFloor.gte(params.leverageRatioCeiling)) {
    throw new InvalidPoolParams("leverageRatioFloor must be positive and lower than leverageRatioCeiling");
  }
  if (params.leverageRatioBuffer.lte(0) || params.leverageRatioBuffer.gte(params.leverageRatioFloor)) {
    throw new InvalidPoolParams("leverageRatioBuffer must be positive and lower than leverageRatioFloor");
  }
  if (params.curvature.lte(0)) {
    throw new InvalidPoolParams("curvature must be positive");
  }
  if (params.minRiskPremiumPercent.lt(0) || params.minRiskPremiumPercent.gte(SCALE_18_DECIMALS)) {
    throw new InvalidPoolParams("minRiskPremiumPercent must be in [0, 1)");
  }
  if (params.underlyingRiskPremiumPercent.lt(0)) {
    throw new InvalidPoolParams("underlyingRiskPremiumPercent can not be negative");
  }
  if (params.minRequiredCapital.lt(0) || params.minRequiredProtection.lt(0)) {
    throw new InvalidPoolParams("minimum capital and protection can not be negative");
  }
  if (
    params.minProtectionDurationInSeconds <= 0 ||
    params.protectionRenewalGracePeriodInSeconds < 0
  ) {
    throw new InvalidPoolParams("invalid protection durations");
  }
  return Object.freeze({ ...params });
}

/**
 * Pool in which sellers deposit the underlying token to sell protection and buyers
 * pay premium to protect their lending positions.
 *
 * Sellers receive sTokens representing their share of the capital plus accrued premium.
 * Premium accrues to sellers over the protection duration. When a lending pool turns late,
 * the default state manager locks the capital backing its protections.
 */
export class ProtectionPool extends Contract<ProtectionPoolEvents> implements IProtectionPool {
  readonly sToken: SToken;

  private poolParams: Readonly<ProtectionPoolParams>;
  private paramsVersion = 1;
  private currentPhase = ProtectionPoolPhase.OpenToSellers;

  private readonly underlyingToken: IERC20;
  private readonly underlyingTokenDecimals: number;
  private readonly referenceLendingPools: IReferenceLendingPools;
  private readonly premiumCalculator: IPremiumCalculator;
  private readonly poolCycleManager: IProtectionPoolCycleManager;
  private readonly defaultStateManager: IDefaultStateManager;

  /// Capital available to back protection and its accrued premium, in underlying decimals
  private totalSTokenUnderlying = ZERO;
  /// Protection of lending pools whose capital is not locked, in underlying decimals
  private totalProtection = ZERO;
  private totalPremium = ZERO;
  private totalPremiumAccrued = ZERO;

  /// Index 0 is a sentinel so that index 0 means "no protection"
  private readonly protectionInfos: ProtectionInfo[];
  private readonly lendingPoolDetails = new Map<string, LendingPoolState>();
  private readonly protectionBuyerAccounts = new Map<string, ProtectionBuyerAccount>();
  private readonly withdrawalCycleDetails = new Map<number, WithdrawalCycleDetail>();

  constructor(address: string, clock: Clock, options: ProtectionPoolOptions) {
    super(address, clock, options.owner);

    this.poolParams = validatePoolParams(options.params);
    this.underlyingToken = options.underlyingToken;
    this.underlyingTokenDecimals = options.underlyingToken.decimals();
    this.referenceLendingPools = options.referenceLendingPools;
    this.premiumCalculator = options.premiumCalculator;
    this.poolCycleManager = options.poolCycleManager;
    this.defaultStateManager = options.defaultStateManager;

    this.sToken = new SToken(
      options.sTokenAddress,
      clock,
      this.address,
      options.sTokenName,
      options.sTokenSymbol
    );
    this.sToken.on("Transfer", (from, to) => this._onSTokenTransfer(from, to));

    this.protectionInfos = [
      {
        buyer: constants.AddressZero,
        protectionPremium: ZERO,
        startTimestamp: 0,
        K: ZERO,
        lambda: ZERO,
        expired: true,
        purchaseParams: {
          lendingPoolAddress: constants.AddressZero,
          positionId: 0,
          protectionAmount: ZERO,
          protectionDurationInSeconds: 0
        }
      }
    ];

    this.emit(
      "ProtectionPoolInitialized",
      options.sTokenName,
      options.sTokenSymbol,
      this.underlyingToken.address
    );
    logger.info(`Initialized protection pool ${this.address}`);
  }

  /*** state-changing functions ***/

  buyProtection(
    sender: string,
    purchaseParams: ProtectionPurchaseParams,
    maxPremiumAmount: BigNumber
  ): void {
    this.nonReentrant(() => {
      const buyer = getAddress(sender);
      const params = this._normalizePurchaseParams(purchaseParams);
      const premium = this._verifyAndCreateProtection(
        buyer,
        this.blockTimestamp,
        params,
        maxPremiumAmount,
        false
      );
      this.emit(
        "ProtectionBought",
        buyer,
        params.lendingPoolAddress,
        params.protectionAmount,
        premium
      );
    });
  }

  /**
   * Buys protection for the same lending position as an expired protection of the buyer,
   * within the renewal grace period after its expiry.
   */
  renewProtection(
    sender: string,
    purchaseParams: ProtectionPurchaseParams,
    maxPremiumAmount: BigNumber
  ): void {
    this.nonReentrant(() => {
      const buyer = getAddress(sender);
      const params = this._normalizePurchaseParams(purchaseParams);

      verifyBuyerCanRenewProtection(
        this.protectionInfos,
        this._getLatestProtectionIndex(buyer, params.lendingPoolAddress, params.positionId),
        params,
        this.poolParams.protectionRenewalGracePeriodInSeconds,
        this.blockTimestamp
      );

      // expired protection leaves the pool total before the renewal is priced
      this._accruePremiumAndExpireProtections([params.lendingPoolAddress]);

      const premium = this._verifyAndCreateProtection(
        buyer,
        this.blockTimestamp,
        params,
        maxPremiumAmount,
        true
      );
      this.emit(
        "ProtectionRenewed",
        buyer,
        params.lendingPoolAddress,
        params.protectionAmount,
        premium
      );
    });
  }

  /**
   * Deposits underlying tokens and mints sTokens to the receiver.
   */
  deposit(sender: string, underlyingAmount: BigNumber, receiver: string): void {
    this.nonReentrant(() => {
      const sTokenShares = this._verifyDeposit(underlyingAmount, receiver);
      this._deposit(getAddress(sender), underlyingAmount, getAddress(receiver), sTokenShares);
    });
  }

  /**
   * Deposits underlying tokens and requests withdrawal of sTokens in a single call.
   */
  depositAndRequestWithdrawal(
    sender: string,
    underlyingAmountToDeposit: BigNumber,
    sTokenWithdrawalAmount: BigNumber
  ): void {
    this.nonReentrant(() => {
      const seller = getAddress(sender);
      if (sTokenWithdrawalAmount.lt(0)) {
        throw new InvalidSTokenAmount(sTokenWithdrawalAmount);
      }
      const sTokenShares = this._verifyDeposit(underlyingAmountToDeposit, seller);

      const balanceAfterDeposit = this.sToken.balanceOf(seller).add(sTokenShares);
      if (sTokenWithdrawalAmount.gt(balanceAfterDeposit)) {
        throw new InsufficientSTokenBalance(seller, balanceAfterDeposit);
      }

      this._deposit(seller, underlyingAmountToDeposit, seller, sTokenShares);
      this._requestWithdrawal(seller, sTokenWithdrawalAmount);
    });
  }

  /**
   * Requests withdrawal of sTokens in the cycle after the next one.
   * A new request in the same cycle replaces the previous one.
   */
  requestWithdrawal(sender: string, sTokenAmount: BigNumber): void {
    this.nonReentrant(() => this._requestWithdrawal(getAddress(sender), sTokenAmount));
  }

  /**
   * Burns requested sTokens and sends the underlying amount to the receiver.
   * Only allowed while the current cycle is open.
   */
  withdraw(sender: string, sTokenWithdrawalAmount: BigNumber, receiver: string): void {
    this.nonReentrant(() => {
      const seller = getAddress(sender);
      this._whenPoolIsOpen();

      if (sTokenWithdrawalAmount.lte(0)) {
        throw new InvalidSTokenAmount(sTokenWithdrawalAmount);
      }
      this._verifyReceiver(receiver);

      const currentCycleIndex = this.poolCycleManager.getCurrentCycleIndex(this.address);
      const withdrawalCycle = this.withdrawalCycleDetails.get(currentCycleIndex);
      const sTokenRequested = withdrawalCycle?.withdrawalRequests.get(seller) ?? ZERO;
      if (!withdrawalCycle || sTokenRequested.isZero()) {
        throw new NoWithdrawalRequested(seller, currentCycleIndex);
      }

      if (sTokenWithdrawalAmount.gt(sTokenRequested)) {
        throw new WithdrawalHigherThanRequested(seller, sTokenRequested);
      }

      const sTokenBalance = this.sToken.balanceOf(seller);
      if (sTokenWithdrawalAmount.gt(sTokenBalance)) {
        throw new InsufficientSTokenBalance(seller, sTokenBalance);
      }

      const underlyingAmountToTransfer = this.convertToUnderlying(sTokenWithdrawalAmount);

      withdrawalCycle.withdrawalRequests.set(seller, sTokenRequested.sub(sTokenWithdrawalAmount));
      withdrawalCycle.totalSTokenRequested =
        withdrawalCycle.totalSTokenRequested.sub(sTokenWithdrawalAmount);

      this.sToken.burn(this.address, seller, sTokenWithdrawalAmount);
      this.totalSTokenUnderlying = this.totalSTokenUnderlying.sub(underlyingAmountToTransfer);
      this.underlyingToken.transfer(this.address, getAddress(receiver), underlyingAmountToTransfer);

      this.emit("WithdrawalMade", seller, sTokenWithdrawalAmount, getAddress(receiver));
    });
  }

  /**
   * Accrues premium for the active protections of the given lending pools (all of them when
   * none are given) up to now, and expires protections past their duration.
   */
  accruePremiumAndExpireProtections(lendingPools: string[] = []): void {
    this.nonReentrant(() => this._accruePremiumAndExpireProtections(lendingPools));
  }

  /**
   * Locks the capital required to cover the active protections of a late lending pool.
   * @returns the locked amount and the id of the sToken snapshot taken for it
   */
  lockCapital(sender: string, lendingPoolAddress: string): LockCapitalResult {
    this._onlyDefaultStateManager(sender);
    const lendingPool = getAddress(lendingPoolAddress);
    const lendingPoolDetail = this._getOrCreateLendingPoolDetail(lendingPool);

    const snapshotId = this.sToken.snapshot(this.address);

    const now = this.blockTimestamp;
    let lockedAmount = ZERO;
    for (const protectionIndex of lendingPoolDetail.activeProtectionIndexes) {
      const protectionInfo = this.protectionInfos[protectionIndex];
      const purchaseParams = protectionInfo.purchaseParams;
      if (now > protectionInfo.startTimestamp + purchaseParams.protectionDurationInSeconds) {
        continue;
      }

      const remainingPrincipal = this.referenceLendingPools.calculateRemainingPrincipal(
        lendingPool,
        protectionInfo.buyer,
        purchaseParams.positionId
      );
      lockedAmount = lockedAmount.add(
        purchaseParams.protectionAmount.lt(remainingPrincipal)
          ? purchaseParams.protectionAmount
          : remainingPrincipal
      );
    }

    if (lockedAmount.gt(this.totalSTokenUnderlying)) {
      lockedAmount = this.totalSTokenUnderlying;
    }
    this.totalSTokenUnderlying = this.totalSTokenUnderlying.sub(lockedAmount);

    if (!lendingPoolDetail.locked) {
      lendingPoolDetail.locked = true;
      this.totalProtection = this.totalProtection.sub(lendingPoolDetail.totalProtection);
    }

    logger.debug(
      `Locked ${lockedAmount.toString()} for lending pool ${lendingPool} in snapshot ${snapshotId}`
    );
    return { lockedAmount, snapshotId };
  }

  /**
   * Brings the protection of a recovered lending pool back into the pool's accounting.
   */
  unlockLendingPool(sender: string, lendingPoolAddress: string): void {
    this._onlyDefaultStateManager(sender);
    const lendingPoolDetail = this.lendingPoolDetails.get(getAddress(lendingPoolAddress));
    if (lendingPoolDetail?.locked) {
      lendingPoolDetail.locked = false;
      this.totalProtection = this.totalProtection.add(lendingPoolDetail.totalProtection);
    }
  }

  /**
   * Sends the seller's share of all unlocked capital to the receiver.
   * @returns the claimed amount in underlying decimals
   */
  claimUnlockedCapital(sender: string, receiver: string): BigNumber {
    return this.nonReentrant(() => {
      const seller = getAddress(sender);
      this._verifyReceiver(receiver);

      const claimableAmount = this.defaultStateManager.calculateAndClaimUnlockedCapital(
        this.address,
        seller
      );
      if (claimableAmount.gt(0)) {
        this.underlyingToken.transfer(this.address, getAddress(receiver), claimableAmount);
        this.emit("UnlockedCapitalClaimed", seller, getAddress(receiver), claimableAmount);
      }
      return claimableAmount;
    });
  }

  /**
   * Moves the pool to the next phase when its conditions are met:
   * OpenToSellers -> OpenToBuyers once the minimum capital is deposited,
   * OpenToBuyers -> Open once the leverage ratio is at or below the ceiling.
   */
  movePoolPhase(sender: string): ProtectionPoolPhase {
    this.onlyOwner(sender);

    if (
      this.currentPhase === ProtectionPoolPhase.OpenToSellers &&
      this._hasMinRequiredCapital(this.totalSTokenUnderlying)
    ) {
      this._setPhase(ProtectionPoolPhase.OpenToBuyers);
    } else if (
      this.currentPhase === ProtectionPoolPhase.OpenToBuyers &&
      this.calculateLeverageRatio().lte(this.poolParams.leverageRatioCeiling)
    ) {
      this._setPhase(ProtectionPoolPhase.Open);
    }

    return this.currentPhase;
  }

  updateLeverageRatioParams(
    sender: string,
    leverageRatioFloor: BigNumber,
    leverageRatioCeiling: BigNumber,
    leverageRatioBuffer: BigNumber
  ): void {
    this.onlyOwner(sender);
    this._updateParams({ leverageRatioFloor, leverageRatioCeiling, leverageRatioBuffer });
  }

  updateRiskPremiumParams(
    sender: string,
    curvature: BigNumber,
    minRiskPremiumPercent: BigNumber,
    underlyingRiskPremiumPercent: BigNumber
  ): void {
    this.onlyOwner(sender);
    this._updateParams({ curvature, minRiskPremiumPercent, underlyingRiskPremiumPercent });
  }

  updateMinRequiredCapital(sender: string, minRequiredCapital: BigNumber): void {
    this.onlyOwner(sender);
    this._updateParams({ minRequiredCapital });
  }

  updateMinRequiredProtection(sender: string, minRequiredProtection: BigNumber): void {
    this.onlyOwner(sender);
    this._updateParams({ minRequiredProtection });
  }

  /*** view functions ***/

  getPoolInfo(): ProtectionPoolInfo {
    return {
      params: this.poolParams,
      paramsVersion: this.paramsVersion,
      underlyingToken: this.underlyingToken,
      referenceLendingPools: this.referenceLendingPools,
      currentPhase: this.currentPhase
    };
  }

  getPoolDetails(): ProtectionPoolDetails {
    return {
      totalSTokenUnderlying: this.totalSTokenUnderlying,
      totalProtection: this.totalProtection,
      totalPremium: this.totalPremium,
      totalPremiumAccrued: this.totalPremiumAccrued
    };
  }

  getLendingPoolDetail(lendingPoolAddress: string): LendingPoolDetail {
    const lendingPoolDetail = this.lendingPoolDetails.get(getAddress(lendingPoolAddress));
    return {
      lastPremiumAccrualTimestamp: lendingPoolDetail?.lastPremiumAccrualTimestamp ?? 0,
      totalPremium: lendingPoolDetail?.totalPremium ?? ZERO,
      totalProtection: lendingPoolDetail?.totalProtection ?? ZERO,
      locked: lendingPoolDetail?.locked ?? false,
      activeProtectionIndexes: [...(lendingPoolDetail?.activeProtectionIndexes ?? [])]
    };
  }

  /**
   * All protections ever bought from the pool, oldest first.
   */
  getAllProtections(): ProtectionInfo[] {
    return this.protectionInfos.slice(1).map(copyProtectionInfo);
  }

  getActiveProtections(buyer: string): ProtectionInfo[] {
    const account = this.protectionBuyerAccounts.get(getAddress(buyer));
    return [...(account?.activeProtectionIndexes ?? [])].map((index) =>
      copyProtectionInfo(this.protectionInfos[index])
    );
  }

  getTotalPremiumPaidForLendingPool(buyer: string, lendingPoolAddress: string): BigNumber {
    return (
      this.protectionBuyerAccounts
        .get(getAddress(buyer))
        ?.lendingPoolToPremium.get(getAddress(lendingPoolAddress)) ?? ZERO
    );
  }

  /**
   * Leverage ratio = total capital / total protection, in 18 decimals. Zero without protection.
   */
  calculateLeverageRatio(): BigNumber {
    return this._calculateLeverageRatio(this.totalSTokenUnderlying, this.totalProtection);
  }

  /**
   * Quotes the premium, in underlying decimals, for buying the given protection now.
   */
  calculateProtectionPremium(purchaseParams: ProtectionPurchaseParams): PremiumQuote {
    const params = this._normalizePurchaseParams(purchaseParams);
    const { premiumAmount, isMinPremium } = this._calculatePremium(
      this.blockTimestamp,
      params,
      this.totalProtection.add(params.protectionAmount)
    );
    return {
      premiumAmount: scale18DecimalsAmtToUnderlyingDecimals(
        premiumAmount,
        this.underlyingTokenDecimals
      ),
      isMinPremium
    };
  }

  /**
   * The most protection the buyer can buy for a lending position: its remaining principal.
   */
  calculateMaxAllowedProtectionAmount(
    buyer: string,
    lendingPoolAddress: string,
    positionId: number
  ): BigNumber {
    return this.referenceLendingPools.calculateRemainingPrincipal(
      getAddress(lendingPoolAddress),
      buyer,
      positionId
    );
  }

  /**
   * Protection can run until the end of the next cycle.
   */
  calculateMaxAllowedProtectionDuration(): number {
    return Math.max(
      this.poolCycleManager.getNextCycleEndTimestamp(this.address) - this.blockTimestamp,
      0
    );
  }

  /**
   * Converts an underlying amount to sToken shares at the current exchange rate.
   */
  convertToSToken(underlyingAmount: BigNumber): BigNumber {
    const scaledUnderlyingAmount = scaleUnderlyingAmtTo18Decimals(
      underlyingAmount,
      this.underlyingTokenDecimals
    );

    const totalSTokenSupply = this.sToken.totalSupply();
    if (totalSTokenSupply.isZero()) {
      return scaledUnderlyingAmount;
    }

    const exchangeRate = this._getExchangeRate();
    if (exchangeRate.isZero()) {
      throw new ProtectionPoolHasNoAvailableCapital(totalSTokenSupply);
    }
    return scaledUnderlyingAmount.mul(SCALE_18_DECIMALS).div(exchangeRate);
  }

  /**
   * Converts sToken shares to the underlying amount at the current exchange rate.
   */
  convertToUnderlying(sTokenShares: BigNumber): BigNumber {
    return scale18DecimalsAmtToUnderlyingDecimals(
      sTokenShares.mul(this._getExchangeRate()).div(SCALE_18_DECIMALS),
      this.underlyingTokenDecimals
    );
  }

  getUnderlyingBalance(seller: string): BigNumber {
    return this.convertToUnderlying(this.sToken.balanceOf(seller));
  }

  getRequestedWithdrawalAmount(seller: string, withdrawalCycleIndex?: number): BigNumber {
    const cycleIndex =
      withdrawalCycleIndex ?? this.poolCycleManager.getCurrentCycleIndex(this.address);
    return (
      this.withdrawalCycleDetails.get(cycleIndex)?.withdrawalRequests.get(getAddress(seller)) ??
      ZERO
    );
  }

  getTotalRequestedWithdrawalAmount(withdrawalCycleIndex?: number): BigNumber {
    const cycleIndex =
      withdrawalCycleIndex ?? this.poolCycleManager.getCurrentCycleIndex(this.address);
    return this.withdrawalCycleDetails.get(cycleIndex)?.totalSTokenRequested ?? ZERO;
  }

  balanceOfAt(account: string, snapshotId: number): BigNumber {
    return this.sToken.balanceOfAt(account, snapshotId);
  }

  totalSupplyAt(snapshotId: number): BigNumber {
    return this.sToken.totalSupplyAt(snapshotId);
  }

  /*** internal functions ***/

  private _verifyAndCreateProtection(
    buyer: string,
    protectionStartTimestamp: number,
    purchaseParams: ProtectionPurchaseParams,
    maxPremiumAmount: BigNumber,
    isRenewal: boolean
  ): BigNumber {
    const lendingPool = purchaseParams.lendingPoolAddress;

    verifyProtection(
      this.poolCycleManager,
      this.defaultStateManager,
      this.address,
      this.getPoolInfo(),
      buyer,
      protectionStartTimestamp,
      purchaseParams,
      isRenewal,
      this._hasActiveProtection(buyer, lendingPool, purchaseParams.positionId)
    );

    const newTotalProtection = this.totalProtection.add(purchaseParams.protectionAmount);
    const leverageRatio = this._calculateLeverageRatio(
      this.totalSTokenUnderlying,
      newTotalProtection
    );
    if (leverageRatio.lt(this.poolParams.leverageRatioFloor)) {
      throw new ProtectionPoolLeverageRatioTooLow(leverageRatio);
    }

    const { premiumAmount: premiumAmountIn18Decimals, isMinPremium } = this._calculatePremium(
      protectionStartTimestamp,
      purchaseParams,
      newTotalProtection
    );
    const premiumAmount = scale18DecimalsAmtToUnderlyingDecimals(
      premiumAmountIn18Decimals,
      this.underlyingTokenDecimals
    );
    if (premiumAmount.gt(maxPremiumAmount)) {
      throw new PremiumExceedsMaxPremiumAmount(premiumAmount, maxPremiumAmount);
    }

    // a min premium quote can come from a leverage ratio outside [floor, ceiling]
    const { K, lambda } = calculateKAndLambda(
      scaleUnderlyingAmtTo18Decimals(premiumAmount, this.underlyingTokenDecimals),
      secondsToScaledDays(purchaseParams.protectionDurationInSeconds),
      clampLeverageRatio(
        leverageRatio,
        this.poolParams.leverageRatioFloor,
        this.poolParams.leverageRatioCeiling
      ),
      this.poolParams.leverageRatioFloor,
      this.poolParams.leverageRatioCeiling,
      this.poolParams.leverageRatioBuffer,
      this.poolParams.curvature,
      isMinPremium ? this.poolParams.minRiskPremiumPercent : ZERO
    );

    // Premium is pulled before any state is updated
    this.underlyingToken.transferFrom(this.address, buyer, this.address, premiumAmount);

    this.totalProtection = newTotalProtection;
    this.totalPremium = this.totalPremium.add(premiumAmount);

    const lendingPoolDetail = this._getOrCreateLendingPoolDetail(lendingPool);
    lendingPoolDetail.totalPremium = lendingPoolDetail.totalPremium.add(premiumAmount);
    lendingPoolDetail.totalProtection = lendingPoolDetail.totalProtection.add(
      purchaseParams.protectionAmount
    );

    const protectionIndex = this.protectionInfos.length;
    this.protectionInfos.push({
      buyer,
      protectionPremium: premiumAmount,
      startTimestamp: protectionStartTimestamp,
      K,
      lambda,
      expired: false,
      purchaseParams: { ...purchaseParams }
    });
    lendingPoolDetail.activeProtectionIndexes.add(protectionIndex);

    const account = this._getOrCreateBuyerAccount(buyer);
    account.activeProtectionIndexes.add(protectionIndex);
    account.lendingPoolToPremium.set(
      lendingPool,
      (account.lendingPoolToPremium.get(lendingPool) ?? ZERO).add(premiumAmount)
    );
    const positionToProtectionIndex =
      account.lendingPoolToPositionToProtectionIndex.get(lendingPool) ?? new Map<number, number>();
    positionToProtectionIndex.set(purchaseParams.positionId, protectionIndex);
    account.lendingPoolToPositionToProtectionIndex.set(lendingPool, positionToProtectionIndex);

    logger.debug(
      `Protection ${protectionIndex} bought by ${buyer}: premium ${premiumAmount.toString()}, min premium: ${isMinPremium}`
    );
    return premiumAmount;
  }

  private _calculatePremium(
    protectionStartTimestamp: number,
    purchaseParams: ProtectionPurchaseParams,
    totalProtection: BigNumber
  ): PremiumQuote {
    const leverageRatio = this._calculateLeverageRatio(this.totalSTokenUnderlying, totalProtection);
    const protectionBuyerApr = this.referenceLendingPools.calculateProtectionBuyerAPR(
      purchaseParams.lendingPoolAddress
    );

    return this.premiumCalculator.calculatePremium(
      protectionStartTimestamp + purchaseParams.protectionDurationInSeconds,
      scaleUnderlyingAmtTo18Decimals(purchaseParams.protectionAmount, this.underlyingTokenDecimals),
      protectionBuyerApr,
      leverageRatio,
      this.totalSTokenUnderlying,
      totalProtection,
      this.poolParams
    );
  }

  private _accruePremiumAndExpireProtections(lendingPools: string[]): void {
    const lendingPoolsToAccrue =
      lendingPools.length > 0 ? lendingPools : this.referenceLendingPools.getLendingPools();

    let totalPremiumAccrued = ZERO;
    let totalProtectionRemoved = ZERO;
    for (const lendingPoolAddress of lendingPoolsToAccrue) {
      const { premiumAccrued, protectionRemoved } = this._accruePremiumAndExpireProtectionsFor(
        getAddress(lendingPoolAddress)
      );
      totalPremiumAccrued = totalPremiumAccrued.add(premiumAccrued);
      totalProtectionRemoved = totalProtectionRemoved.add(protectionRemoved);
    }

    if (totalPremiumAccrued.gt(0)) {
      this.totalPremiumAccrued = this.totalPremiumAccrued.add(totalPremiumAccrued);
      this.totalSTokenUnderlying = this.totalSTokenUnderlying.add(totalPremiumAccrued);
    }

    if (totalProtectionRemoved.gt(0)) {
      this.totalProtection = this.totalProtection.sub(totalProtectionRemoved);
    }
  }

  /**
   * @returns premium accrued for the lending pool and the protection to remove from the pool total
   */
  private _accruePremiumAndExpireProtectionsFor(lendingPool: string): AccrualResult {
    const lendingPoolDetail = this.lendingPoolDetails.get(lendingPool);
    if (!lendingPoolDetail) {
      return { premiumAccrued: ZERO, protectionRemoved: ZERO };
    }

    const now = this.blockTimestamp;
    const lastPremiumAccrualTimestamp = lendingPoolDetail.lastPremiumAccrualTimestamp;
    const isDefaulted =
      this.defaultStateManager.getLendingPoolStatus(this.address, lendingPool) ===
      LendingPoolStatus.Defaulted;

    let premiumAccrued = ZERO;
    let protectionExpired = ZERO;
    for (const protectionIndex of [...lendingPoolDetail.activeProtectionIndexes]) {
      const protectionInfo = this.protectionInfos[protectionIndex];
      const startTimestamp = protectionInfo.startTimestamp;
      const duration = protectionInfo.purchaseParams.protectionDurationInSeconds;
      const expirationTimestamp = startTimestamp + duration;

      const fromSecond = Math.max(lastPremiumAccrualTimestamp, startTimestamp) - startTimestamp;
      const toSecond = Math.min(now, expirationTimestamp) - startTimestamp;
      if (toSecond > fromSecond) {
        premiumAccrued = premiumAccrued.add(
          calculateAccruedPremiumInUnderlying(
            protectionInfo,
            fromSecond,
            toSecond,
            this.underlyingTokenDecimals
          )
        );
      }

      if (now > expirationTimestamp || isDefaulted) {
        this._expireProtection(protectionIndex, lendingPoolDetail);
        protectionExpired = protectionExpired.add(protectionInfo.purchaseParams.protectionAmount);
      }
    }

    lendingPoolDetail.lastPremiumAccrualTimestamp = now;
    if (premiumAccrued.gt(0)) {
      this.emit("PremiumAccrued", lendingPool, now, premiumAccrued);
    }

    return {
      premiumAccrued,
      // protection of a locked lending pool is already out of the pool total
      protectionRemoved: lendingPoolDetail.locked ? ZERO : protectionExpired
    };
  }

  private _expireProtection(protectionIndex: number, lendingPoolDetail: LendingPoolState): void {
    const protectionInfo = this.protectionInfos[protectionIndex];
    const protectionAmount = protectionInfo.purchaseParams.protectionAmount;

    protectionInfo.expired = true;
    lendingPoolDetail.activeProtectionIndexes.delete(protectionIndex);
    lendingPoolDetail.totalProtection = lendingPoolDetail.totalProtection.sub(protectionAmount);
    this.protectionBuyerAccounts
      .get(protectionInfo.buyer)
      ?.activeProtectionIndexes.delete(protectionIndex);

    this.emit(
      "ProtectionExpired",
      protectionInfo.buyer,
      protectionInfo.purchaseParams.lendingPoolAddress,
      protectionAmount
    );
  }

  private _verifyDeposit(underlyingAmount: BigNumber, receiver: string): BigNumber {
    if (this.currentPhase === ProtectionPoolPhase.OpenToBuyers) {
      throw new ProtectionPoolInOpenToBuyersPhase();
    }
    if (underlyingAmount.lte(0)) {
      throw new InvalidDepositAmount(underlyingAmount);
    }
    this._verifyReceiver(receiver);

    // Deposits may not push the leverage ratio above the ceiling once the pool is capitalized
    const newTotalSTokenUnderlying = this.totalSTokenUnderlying.add(underlyingAmount);
    if (this._hasMinRequiredCapital(newTotalSTokenUnderlying)) {
      const leverageRatio = this._calculateLeverageRatio(
        newTotalSTokenUnderlying,
        this.totalProtection
      );
      if (leverageRatio.gt(this.poolParams.leverageRatioCeiling)) {
        throw new ProtectionPoolLeverageRatioTooHigh(leverageRatio);
      }
    }

    return this.convertToSToken(underlyingAmount);
  }

  private _deposit(
    depositor: string,
    underlyingAmount: BigNumber,
    receiver: string,
    sTokenShares: BigNumber
  ): void {
    this.underlyingToken.transferFrom(this.address, depositor, this.address, underlyingAmount);

    this.totalSTokenUnderlying = this.totalSTokenUnderlying.add(underlyingAmount);
    this.sToken.mint(this.address, receiver, sTokenShares);

    this.emit("ProtectionSold", receiver, underlyingAmount);
  }

  private _requestWithdrawal(seller: string, sTokenAmount: BigNumber): void {
    if (sTokenAmount.lt(0)) {
      throw new InvalidSTokenAmount(sTokenAmount);
    }

    const sTokenBalance = this.sToken.balanceOf(seller);
    if (sTokenAmount.gt(sTokenBalance)) {
      throw new InsufficientSTokenBalance(seller, sTokenBalance);
    }

    this.poolCycleManager.calculateAndSetPoolCycleState(this.address);
    const withdrawalCycleIndex = this.poolCycleManager.getCurrentCycleIndex(this.address) + 2;

    const withdrawalCycle = this._getOrCreateWithdrawalCycle(withdrawalCycleIndex);
    const oldRequest = withdrawalCycle.withdrawalRequests.get(seller) ?? ZERO;
    withdrawalCycle.totalSTokenRequested = withdrawalCycle.totalSTokenRequested
      .sub(oldRequest)
      .add(sTokenAmount);
    withdrawalCycle.withdrawalRequests.set(seller, sTokenAmount);

    this.emit("WithdrawalRequested", seller, sTokenAmount, withdrawalCycleIndex);
  }

  /**
   * Pending withdrawal requests of a seller can not exceed the sTokens left after a transfer.
   */
  private _onSTokenTransfer(from: string, to: string): void {
    if (from === constants.AddressZero || to === constants.AddressZero) {
      return;
    }

    const sTokenBalance = this.sToken.balanceOf(from);
    const currentCycleIndex = this.poolCycleManager.getCurrentCycleIndex(this.address);
    for (let cycleIndex = currentCycleIndex; cycleIndex <= currentCycleIndex + 2; cycleIndex++) {
      const withdrawalCycle = this.withdrawalCycleDetails.get(cycleIndex);
      const requested = withdrawalCycle?.withdrawalRequests.get(from);
      if (withdrawalCycle && requested && requested.gt(sTokenBalance)) {
        withdrawalCycle.totalSTokenRequested = withdrawalCycle.totalSTokenRequested.sub(
          requested.sub(sTokenBalance)
        );
        withdrawalCycle.withdrawalRequests.set(from, sTokenBalance);
      }
    }
  }

  private _whenPoolIsOpen(): void {
    if (
      this.poolCycleManager.calculateAndSetPoolCycleState(this.address) !==
      ProtectionPoolCycleState.Open
    ) {
      throw new ProtectionPoolIsNotOpen();
    }
  }

  private _onlyDefaultStateManager(sender: string): void {
    if (sender.toLowerCase() !== this.defaultStateManager.address.toLowerCase()) {
      throw new OnlyDefaultStateManager(sender);
    }
  }

  private _verifyReceiver(receiver: string): void {
    if (receiver.toLowerCase() === constants.AddressZero) {
      throw new InvalidReceiver(receiver);
    }
  }

  private _normalizePurchaseParams(purchaseParams: ProtectionPurchaseParams): ProtectionPurchaseParams {
    return { ...purchaseParams, lendingPoolAddress: getAddress(purchaseParams.lendingPoolAddress) };
  }

  private _hasMinRequiredCapital(totalCapital: BigNumber): boolean {
    return totalCapital.gte(this.poolParams.minRequiredCapital);
  }

  private _calculateLeverageRatio(totalCapital: BigNumber, totalProtection: BigNumber): BigNumber {
    if (totalProtection.isZero()) {
      return ZERO;
    }
    return totalCapital.mul(SCALE_18_DECIMALS).div(totalProtection);
  }

  /// underlying per sToken, in 18 decimals
  private _getExchangeRate(): BigNumber {
    const totalSTokenSupply = this.sToken.totalSupply();
    if (totalSTokenSupply.isZero()) {
      return ZERO;
    }
    return scaleUnderlyingAmtTo18Decimals(this.totalSTokenUnderlying, this.underlyingTokenDecimals)
      .mul(SCALE_18_DECIMALS)
      .div(totalSTokenSupply);
  }

  private _hasActiveProtection(buyer: string, lendingPool: string, positionId: number): boolean {
    const protectionIndex = this._getLatestProtectionIndex(buyer, lendingPool, positionId);
    if (protectionIndex === undefined) {
      return false;
    }
    const protectionInfo = this.protectionInfos[protectionIndex];
    return (
      !protectionInfo.expired &&
      this.blockTimestamp <=
        protectionInfo.startTimestamp + protectionInfo.purchaseParams.protectionDurationInSeconds
    );
  }

  private _getLatestProtectionIndex(
    buyer: string,
    lendingPool: string,
    positionId: number
  ): number | undefined {
    return this.protectionBuyerAccounts
      .get(buyer)
      ?.lendingPoolToPositionToProtectionIndex.get(lendingPool)
      ?.get(positionId);
  }

  private _getOrCreateLendingPoolDetail(lendingPool: string): LendingPoolState {
    let lendingPoolDetail = this.lendingPoolDetails.get(lendingPool);
    if (!lendingPoolDetail) {
      lendingPoolDetail = {
        lastPremiumAccrualTimestamp: this.blockTimestamp,
        totalPremium: ZERO,
        totalProtection: ZERO,
        locked: false,
        activeProtectionIndexes: new Set<number>()
      };
      this.lendingPoolDetails.set(lendingPool, lendingPoolDetail);
    }
    return lendingPoolDetail;
  }

  private _getOrCreateBuyerAccount(buyer: string): ProtectionBuyerAccount {
    let account = this.protectionBuyerAccounts.get(buyer);
    if (!account) {
      account = {
        lendingPoolToPremium: new Map<string, BigNumber>(),
        activeProtectionIndexes: new Set<number>(),
        lendingPoolToPositionToProtectionIndex: new Map<string, Map<number, number>>()
      };
      this.protectionBuyerAccounts.set(buyer, account);
    }
    return account;
  }

  private _getOrCreateWithdrawalCycle(withdrawalCycleIndex: number): WithdrawalCycleDetail {
    let withdrawalCycle = this.withdrawalCycleDetails.get(withdrawalCycleIndex);
    if (!withdrawalCycle) {
      withdrawalCycle = { totalSTokenRequested: ZERO, withdrawalRequests: new Map() };
      this.withdrawalCycleDetails.set(withdrawalCycleIndex, withdrawalCycle);
    }
    return withdrawalCycle;
  }

  private _updateParams(update: Partial<ProtectionPoolParams>): void {
    this.poolParams = validatePoolParams({ ...this.poolParams, ...update });
    this.paramsVersion += 1;
    this.emit("ProtectionPoolParamsUpdated", this.paramsVersion);
  }

  private _setPhase(phase: ProtectionPoolPhase): void {
    this.currentPhase = phase;
    this.emit("ProtectionPoolPhaseUpdated", phase);
    logger.debug(`Pool ${this.address} moved to phase ${ProtectionPoolPhase[phase]}`);
  }
}
