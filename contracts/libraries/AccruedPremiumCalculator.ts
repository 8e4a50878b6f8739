import { BigNumber } from "@ethersproject/bignumber";

import { SCALE_18_DECIMALS, SCALED_DAYS_IN_YEAR, SECONDS_IN_DAY } from "./Constants";
import { div, exp, mul } from "./FixedPointMath";
import {
  calculateRiskFactor,
  calculateRiskFactorUsingMinPremium
} from "./RiskFactorCalculator";

/**
 * Premium accrues along P(t) = K * (1 - e^(-t * lambda)), t in days, so that
 * P(protectionDuration) equals the premium paid upfront.
 */

export interface KAndLambda {
  K: BigNumber;
  lambda: BigNumber;
}

/**
 * Converts seconds to days in 18 decimals, truncating.
 * Accrual powers and the protection duration both go through this conversion.
 */
export function secondsToScaledDays(seconds: number): BigNumber {
  return BigNumber.from(seconds).mul(SCALE_18_DECIMALS).div(SECONDS_IN_DAY);
}

/**
 * -(days * lambda), truncated toward zero, in 18 decimals.
 */
function calculatePower(durationInDays: BigNumber, lambda: BigNumber): BigNumber {
  return durationInDays.mul(lambda).div(SCALE_18_DECIMALS).mul(-1);
}

/**
 * Calculates K and lambda for a protection.
 * lambda = riskFactor / 365.24
 * K = totalPremium / (1 - e^(-protectionDurationInDays * lambda))
 *
 * The risk factor comes from the minimum premium when `minRiskPremiumPercent` is positive,
 * otherwise from the leverage ratio curve.
 * @param protectionDurationInDays duration in days, scaled to 18 decimals
 */
export function calculateKAndLambda(
  protectionPremium: BigNumber,
  protectionDurationInDays: BigNumber,
  currentLeverageRatio: BigNumber,
  leverageRatioFloor: BigNumber,
  leverageRatioCeiling: BigNumber,
  leverageRatioBuffer: BigNumber,
  curvature: BigNumber,
  minRiskPremiumPercent: BigNumber
): KAndLambda {
  const riskFactor = minRiskPremiumPercent.gt(0)
    ? calculateRiskFactorUsingMinPremium(
        minRiskPremiumPercent,
        protectionDurationInDays
      )
    : calculateRiskFactor(
        currentLeverageRatio,
        leverageRatioFloor,
        leverageRatioCeiling,
        leverageRatioBuffer,
        curvature
      );

  const lambda = div(riskFactor, SCALED_DAYS_IN_YEAR);

  const power1 = calculatePower(protectionDurationInDays, lambda);
  const exp1 = exp(power1);
  const K = div(protectionPremium, SCALE_18_DECIMALS.sub(exp1));

  return { K, lambda };
}

/**
 * Calculates the premium accrued between two points in time:
 * accruedPremium = K * (e^(-fromSecond * lambda) - e^(-toSecond * lambda))
 * Both points are seconds elapsed since the protection started.
 */
export function calculateAccruedPremium(
  fromTimestampInSeconds: number,
  toTimestampInSeconds: number,
  K: BigNumber,
  lambda: BigNumber
): BigNumber {
  const power1 = calculatePower(secondsToScaledDays(fromTimestampInSeconds), lambda);
  const power2 = calculatePower(secondsToScaledDays(toTimestampInSeconds), lambda);

  return mul(K, exp(power1).sub(exp(power2)));
}
