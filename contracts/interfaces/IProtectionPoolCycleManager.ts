import { AdmissionError } from "../libraries/Errors";

export enum ProtectionPoolCycleState {
  None = 0,
  Open = 1,
  Locked = 2
}

export interface ProtectionPoolCycleParams {
  /// Seconds from the start of a cycle during which withdrawals are allowed
  openCycleDuration: number;
  /// Total length of a cycle in seconds
  cycleDuration: number;
}

export interface ProtectionPoolCycle {
  params: ProtectionPoolCycleParams;
  currentCycleIndex: number;
  currentCycleStartTime: number;
  currentCycleState: ProtectionPoolCycleState;
}

export interface IProtectionPoolCycleManager {
  readonly address: string;

  /**
   * Updates the cycle state of the pool from the current time and returns it.
   */
  calculateAndSetPoolCycleState(protectionPoolAddress: string): ProtectionPoolCycleState;

  getCurrentCycleState(protectionPoolAddress: string): ProtectionPoolCycleState;

  getCurrentCycleIndex(protectionPoolAddress: string): number;

  getCurrentPoolCycle(protectionPoolAddress: string): ProtectionPoolCycle;

  /**
   * End of the cycle after the current one: start + 2 * cycleDuration.
   */
  getNextCycleEndTimestamp(protectionPoolAddress: string): number;
}

export type ProtectionPoolCycleManagerEvents = {
  ProtectionPoolCycleCreated: [
    protectionPool: string,
    cycleIndex: number,
    startTime: number,
    openCycleDuration: number,
    cycleDuration: number
  ];
};

export class ProtectionPoolAlreadyRegistered extends AdmissionError {
  constructor(protectionPoolAddress: string) {
    super("ProtectionPoolAlreadyRegistered", [protectionPoolAddress]);
  }
}

export class InvalidCycleDuration extends AdmissionError {
  constructor(cycleDuration: number) {
    super("InvalidCycleDuration", [cycleDuration]);
  }
}

export class ProtectionPoolCycleNotRegistered extends AdmissionError {
  constructor(protectionPoolAddress: string) {
    super("ProtectionPoolCycleNotRegistered", [protectionPoolAddress]);
  }
}
