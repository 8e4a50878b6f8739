import { BigNumber } from "@ethersproject/bignumber";

import { ProtectionPoolParams } from "./IProtectionPool";

export interface PremiumQuote {
  /// Premium in 18 decimals
  premiumAmount: BigNumber;
  /// True when the minimum risk premium was charged
  isMinPremium: boolean;
}

export interface IPremiumCalculator {
  /**
   * Quotes the premium for a protection ending at `protectionExpirationTimestamp`.
   * @param protectionAmount in 18 decimals
   * @param protectionBuyerApy interest rate of the lending pool, 18 decimals
   * @param leverageRatio leverage ratio of the pool after the purchase, 18 decimals
   * @param totalCapital total sToken underlying of the pool, underlying decimals
   * @param totalProtection protection of the pool after the purchase, underlying decimals
   */
  calculatePremium(
    protectionExpirationTimestamp: number,
    protectionAmount: BigNumber,
    protectionBuyerApy: BigNumber,
    leverageRatio: BigNumber,
    totalCapital: BigNumber,
    totalProtection: BigNumber,
    poolParameters: ProtectionPoolParams
  ): PremiumQuote;
}
