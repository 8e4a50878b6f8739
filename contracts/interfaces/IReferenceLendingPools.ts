import { BigNumber } from "@ethersproject/bignumber";

import { AdmissionError } from "../libraries/Errors";
import { ILendingProtocolAdapter, LendingProtocol } from "./ILendingProtocolAdapter";
import { ProtectionPurchaseParams } from "./IProtectionPool";

export enum LendingPoolStatus {
  NotSupported = 0,
  Active = 1,
  LateWithinGracePeriod = 2,
  Late = 3,
  UnderReview = 4,
  Defaulted = 5,
  Expired = 6
}

export interface ReferenceLendingPoolInfo {
  protocol: LendingProtocol;
  addedTimestamp: number;
  protectionPurchaseLimitTimestamp: number;
}

export interface LendingPoolsState {
  lendingPools: string[];
  statuses: LendingPoolStatus[];
}

/**
 * Basket of lending pools a protection pool sells protection for.
 */
export interface IReferenceLendingPools {
  readonly address: string;

  getLendingPools(): string[];

  getReferenceLendingPoolInfo(lendingPoolAddress: string): ReferenceLendingPoolInfo;

  getLendingProtocolAdapter(protocol: LendingProtocol): ILendingProtocolAdapter;

  getLendingPoolStatus(lendingPoolAddress: string): LendingPoolStatus;

  assessState(): LendingPoolsState;

  /**
   * Buyers can purchase protection inside the purchase window, or afterwards when they hold an
   * active protection for the same position. The amount can not exceed the remaining principal.
   */
  canBuyProtection(
    buyer: string,
    purchaseParams: ProtectionPurchaseParams,
    isRenewal: boolean
  ): boolean;

  calculateProtectionBuyerAPR(lendingPoolAddress: string): BigNumber;

  calculateRemainingPrincipal(
    lendingPoolAddress: string,
    lender: string,
    positionId: number
  ): BigNumber;

  getLatestPaymentTimestamp(lendingPoolAddress: string): number;

  getPaymentPeriodInDays(lendingPoolAddress: string): number;
}

export type ReferenceLendingPoolsEvents = {
  ReferenceLendingPoolAdded: [
    lendingPoolAddress: string,
    protocol: LendingProtocol,
    addedTimestamp: number,
    protectionPurchaseLimitTimestamp: number
  ];
  LendingProtocolAdapterUpdated: [protocol: LendingProtocol, adapter: string];
};

export class ReferenceLendingPoolNotSupported extends AdmissionError {
  constructor(lendingPoolAddress: string) {
    super("ReferenceLendingPoolNotSupported", [lendingPoolAddress]);
  }
}

export class ReferenceLendingPoolAlreadyAdded extends AdmissionError {
  constructor(lendingPoolAddress: string) {
    super("ReferenceLendingPoolAlreadyAdded", [lendingPoolAddress]);
  }
}

export class ReferenceLendingPoolIsZeroAddress extends AdmissionError {
  constructor() {
    super("ReferenceLendingPoolIsZeroAddress");
  }
}

export class ReferenceLendingPoolIsNotActive extends AdmissionError {
  constructor(lendingPoolAddress: string) {
    super("ReferenceLendingPoolIsNotActive", [lendingPoolAddress]);
  }
}

export class LendingProtocolNotSupported extends AdmissionError {
  constructor(protocol: LendingProtocol) {
    super("LendingProtocolNotSupported", [protocol]);
  }
}
