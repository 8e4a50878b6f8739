import { BigNumber } from "@ethersproject/bignumber";

import { Clock } from "../base/Clock";
import { SCALE_18_DECIMALS, SECONDS_IN_YEAR } from "../libraries/Constants";
import { MathDomainError } from "../libraries/Errors";
import { exp } from "../libraries/FixedPointMath";
import {
  calculateRiskFactor,
  canCalculateRiskFactor
} from "../libraries/RiskFactorCalculator";
import { IPremiumCalculator, PremiumQuote } from "../interfaces/IPremiumCalculator";
import { ProtectionPoolParams } from "../interfaces/IProtectionPool";

export class ProtectionAlreadyExpired extends MathDomainError {
  constructor(protectionExpirationTimestamp: number) {
    super("ProtectionAlreadyExpired", [protectionExpirationTimestamp]);
  }
}

/**
 * Prices protection from the leverage ratio of the pool.
 *
 * premium = protectionAmount * (riskPremiumRate + underlyingRiskPremiumRate)
 * riskPremiumRate = 1 - e^(-durationInYears * riskFactor), never below the minimum risk premium
 * underlyingRiskPremiumRate = underlyingRiskPremiumPercent * buyerApy * durationInYears
 */
export class PremiumCalculator implements IPremiumCalculator {
  private readonly clock: Clock;

  constructor(clock: Clock) {
    this.clock = clock;
  }

  calculatePremium(
    protectionExpirationTimestamp: number,
    protectionAmount: BigNumber,
    protectionBuyerApy: BigNumber,
    leverageRatio: BigNumber,
    totalCapital: BigNumber,
    totalProtection: BigNumber,
    poolParameters: ProtectionPoolParams
  ): PremiumQuote {
    const durationInSeconds = protectionExpirationTimestamp - this.clock.now();
    if (durationInSeconds <= 0) {
      throw new ProtectionAlreadyExpired(protectionExpirationTimestamp);
    }

    const durationInYears = BigNumber.from(durationInSeconds)
      .mul(SCALE_18_DECIMALS)
      .div(SECONDS_IN_YEAR);

    let riskPremiumRate = BigNumber.from(0);
    let isMinPremium = true;

    if (
      canCalculateRiskFactor(
        totalCapital,
        totalProtection,
        leverageRatio,
        poolParameters.leverageRatioFloor,
        poolParameters.leverageRatioCeiling,
        poolParameters.minRequiredCapital,
        poolParameters.minRequiredProtection
      )
    ) {
      const riskFactor = calculateRiskFactor(
        leverageRatio,
        poolParameters.leverageRatioFloor,
        poolParameters.leverageRatioCeiling,
        poolParameters.leverageRatioBuffer,
        poolParameters.curvature
      );
      riskPremiumRate = this._calculateRiskPremiumRate(durationInYears, riskFactor);
      isMinPremium = false;
    }

    if (riskPremiumRate.lt(poolParameters.minRiskPremiumPercent)) {
      riskPremiumRate = poolParameters.minRiskPremiumPercent;
      isMinPremium = true;
    }

    const underlyingRiskPremiumRate = poolParameters.underlyingRiskPremiumPercent
      .mul(protectionBuyerApy)
      .mul(durationInYears)
      .div(SCALE_18_DECIMALS.mul(SCALE_18_DECIMALS));

    const premiumAmount = protectionAmount
      .mul(riskPremiumRate.add(underlyingRiskPremiumRate))
      .div(SCALE_18_DECIMALS);

    return { premiumAmount, isMinPremium };
  }

  /// 1 - e^(-durationInYears * riskFactor)
  private _calculateRiskPremiumRate(durationInYears: BigNumber, riskFactor: BigNumber): BigNumber {
    const power = durationInYears.mul(riskFactor).div(SCALE_18_DECIMALS).mul(-1);
    return SCALE_18_DECIMALS.sub(exp(power));
  }
}
