import { BigNumber } from "@ethersproject/bignumber";

import { SCALE_18_DECIMALS, SCALED_DAYS_IN_YEAR } from "./Constants";
import { MathDomainError } from "./Errors";
import { ln } from "./FixedPointMath";

export class RiskFactorDenominatorNotPositive extends MathDomainError {
  constructor(leverageRatio: BigNumber, denominator: BigNumber) {
    super("RiskFactorDenominatorNotPositive", [leverageRatio, denominator]);
  }
}

export class InvalidMinRiskPremiumPercent extends MathDomainError {
  constructor(minRiskPremiumPercent: BigNumber) {
    super("InvalidMinRiskPremiumPercent", [minRiskPremiumPercent]);
  }
}

export class InvalidProtectionDuration extends MathDomainError {
  constructor(durationInDays: BigNumber) {
    super("InvalidProtectionDuration", [durationInDays]);
  }
}

/**
 * Calculates the risk factor from the leverage ratio of the pool:
 * riskFactor = curvature * ((leverageRatioCeiling + leverageRatioBuffer) - leverageRatio) /
 *              (leverageRatio - (leverageRatioFloor - leverageRatioBuffer))
 * All values are in 18 decimals. The result decreases as the leverage ratio grows.
 */
export function calculateRiskFactor(
  currentLeverageRatio: BigNumber,
  leverageRatioFloor: BigNumber,
  leverageRatioCeiling: BigNumber,
  leverageRatioBuffer: BigNumber,
  curvature: BigNumber
): BigNumber {
  const numerator = leverageRatioCeiling
    .add(leverageRatioBuffer)
    .sub(currentLeverageRatio);
  const denominator = currentLeverageRatio.sub(
    leverageRatioFloor.sub(leverageRatioBuffer)
  );

  if (denominator.lte(0)) {
    throw new RiskFactorDenominatorNotPositive(currentLeverageRatio, denominator);
  }

  return curvature.mul(numerator).div(denominator);
}

/**
 * Calculates the risk factor which yields exactly the minimum risk premium over the given duration:
 * riskFactor = -ln(1 - minRiskPremiumPercent) * 365.24 / durationInDays
 * @param durationInDays protection duration in days, scaled to 18 decimals
 */
export function calculateRiskFactorUsingMinPremium(
  minRiskPremiumPercent: BigNumber,
  durationInDays: BigNumber
): BigNumber {
  if (minRiskPremiumPercent.lt(0) || minRiskPremiumPercent.gte(SCALE_18_DECIMALS)) {
    throw new InvalidMinRiskPremiumPercent(minRiskPremiumPercent);
  }
  if (durationInDays.lte(0)) {
    throw new InvalidProtectionDuration(durationInDays);
  }

  const lnResult = ln(SCALE_18_DECIMALS.sub(minRiskPremiumPercent));
  return lnResult.mul(-1).mul(SCALED_DAYS_IN_YEAR).div(durationInDays);
}

/**
 * Determines whether the risk factor can be calculated for the current state of the pool.
 * It can not be when the pool lacks the minimum capital or protection,
 * or when the leverage ratio is outside of the [floor, ceiling] range.
 */
export function canCalculateRiskFactor(
  totalCapital: BigNumber,
  totalProtection: BigNumber,
  leverageRatio: BigNumber,
  leverageRatioFloor: BigNumber,
  leverageRatioCeiling: BigNumber,
  minRequiredCapital: BigNumber,
  minRequiredProtection: BigNumber
): boolean {
  if (
    totalCapital.lt(minRequiredCapital) ||
    totalProtection.lt(minRequiredProtection) ||
    leverageRatio.lt(leverageRatioFloor) ||
    leverageRatio.gt(leverageRatioCeiling)
  ) {
    return false;
  }
  return true;
}

/**
 * Bounds the leverage ratio to [leverageRatioFloor, leverageRatioCeiling], where the risk factor
 * curve is positive.
 */
export function clampLeverageRatio(
  leverageRatio: BigNumber,
  leverageRatioFloor: BigNumber,
  leverageRatioCeiling: BigNumber
): BigNumber {
  if (leverageRatio.lt(leverageRatioFloor)) {
    return leverageRatioFloor;
  }
  if (leverageRatio.gt(leverageRatioCeiling)) {
    return leverageRatioCeiling;
  }
  return leverageRatio;
}
