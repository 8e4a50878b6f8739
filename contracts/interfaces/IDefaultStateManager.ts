import { BigNumber } from "@ethersproject/bignumber";

import { AdmissionError, AuthorizationError } from "../libraries/Errors";
import { LendingPoolStatus } from "./IReferenceLendingPools";

/**
 * Capital locked in a protection pool when a lending pool turned late.
 */
export interface LockedCapital {
  /// Snapshot of the pool's sTokens taken when the capital was locked
  snapshotId: number;
  /// Locked amount in underlying token decimals
  amount: BigNumber;
  locked: boolean;
}

export interface LendingPoolStatusDetail {
  currentStatus: LendingPoolStatus;
  /// Time the lending pool was first seen late in the current delinquency, 0 otherwise
  lateTimestamp: number;
  /// Latest payment timestamp recorded at the last transition
  lastPaymentTimestamp: number;
  /// Payments made since the lending pool turned late
  confirmedPayments: number;
}

export interface IDefaultStateManager {
  readonly address: string;

  getLendingPoolStatus(
    protectionPoolAddress: string,
    lendingPoolAddress: string
  ): LendingPoolStatus;

  /**
   * Called by a registered protection pool. Returns the unlocked capital the seller can claim,
   * and marks it as claimed.
   */
  calculateAndClaimUnlockedCapital(sender: string, seller: string): BigNumber;

  calculateClaimableUnlockedAmount(protectionPoolAddress: string, seller: string): BigNumber;
}

export type DefaultStateManagerEvents = {
  ProtectionPoolRegistered: [protectionPool: string];
  ProtectionPoolStatesAssessed: [timestamp: number];
  LendingPoolStatusUpdated: [
    protectionPool: string,
    lendingPool: string,
    previousStatus: LendingPoolStatus,
    newStatus: LendingPoolStatus
  ];
  LendingPoolLocked: [
    lendingPool: string,
    protectionPool: string,
    snapshotId: number,
    amount: BigNumber
  ];
  LendingPoolUnlocked: [lendingPool: string, protectionPool: string, amount: BigNumber];
};

export class ProtectionPoolNotRegistered extends AuthorizationError {
  constructor(protectionPoolAddress: string) {
    super("ProtectionPoolNotRegistered", [protectionPoolAddress]);
  }
}

export class ProtectionPoolStateAlreadyRegistered extends AdmissionError {
  constructor(protectionPoolAddress: string) {
    super("ProtectionPoolAlreadyRegistered", [protectionPoolAddress]);
  }
}
