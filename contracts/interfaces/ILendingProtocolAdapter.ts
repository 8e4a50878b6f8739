import { BigNumber } from "@ethersproject/bignumber";

export enum LendingProtocol {
  Goldfinch = 0
}

/**
 * Reads the facts of a lending protocol the reference lending pools need.
 */
export interface ILendingProtocolAdapter {
  readonly address: string;

  /**
   * Whether the lending pool's term has ended or it was repaid in full.
   */
  isLendingPoolExpired(lendingPoolAddress: string): boolean;

  isLendingPoolDefaulted(lendingPoolAddress: string): boolean;

  /**
   * Whether the borrower missed the latest payment due date.
   */
  isLendingPoolLate(lendingPoolAddress: string): boolean;

  getLendingPoolTermEndTimestamp(lendingPoolAddress: string): number;

  /**
   * Interest rate the lender earns, in 18 decimals (0.17 => 17%).
   */
  calculateProtectionBuyerAPR(lendingPoolAddress: string): BigNumber;

  /**
   * Principal still owed to the lender holding the position, in underlying token decimals.
   */
  calculateRemainingPrincipal(
    lendingPoolAddress: string,
    lender: string,
    positionId: number
  ): BigNumber;

  getPaymentPeriodInDays(lendingPoolAddress: string): number;

  getLatestPaymentTimestamp(lendingPoolAddress: string): number;
}
