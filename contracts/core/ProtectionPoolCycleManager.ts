import { getAddress } from "ethers/lib/utils";

import { Contract } from "../base/Contract";
import { Clock } from "../base/Clock";
import {
  InvalidCycleDuration,
  IProtectionPoolCycleManager,
  ProtectionPoolAlreadyRegistered,
  ProtectionPoolCycle,
  ProtectionPoolCycleManagerEvents,
  ProtectionPoolCycleNotRegistered,
  ProtectionPoolCycleParams,
  ProtectionPoolCycleState
} from "../interfaces/IProtectionPoolCycleManager";
import { createLogger } from "../../utils/logger";

const logger = createLogger("ProtectionPoolCycleManager");

/**
 * Drives the withdrawal cycles of protection pools.
 * Each cycle is open for withdrawals during `openCycleDuration`, then locked until
 * `cycleDuration` has elapsed, at which point a new cycle starts.
 */
export class ProtectionPoolCycleManager
  extends Contract<ProtectionPoolCycleManagerEvents>
  implements IProtectionPoolCycleManager
{
  private readonly protectionPoolCycles = new Map<string, ProtectionPoolCycle>();

  constructor(address: string, clock: Clock, owner: string) {
    super(address, clock, owner);
  }

  registerProtectionPool(
    sender: string,
    protectionPoolAddress: string,
    cycleParams: ProtectionPoolCycleParams
  ): void {
    this.onlyOwner(sender);
    const poolKey = getAddress(protectionPoolAddress);

    const existing = this.protectionPoolCycles.get(poolKey);
    if (existing && existing.currentCycleState !== ProtectionPoolCycleState.None) {
      throw new ProtectionPoolAlreadyRegistered(poolKey);
    }

    if (cycleParams.openCycleDuration > cycleParams.cycleDuration) {
      throw new InvalidCycleDuration(cycleParams.cycleDuration);
    }

    const poolCycle: ProtectionPoolCycle = {
      params: { ...cycleParams },
      currentCycleIndex: 0,
      currentCycleStartTime: 0,
      currentCycleState: ProtectionPoolCycleState.None
    };
    this.protectionPoolCycles.set(poolKey, poolCycle);
    this._startNewCycle(poolKey, poolCycle, 0);
  }

  calculateAndSetPoolCycleState(protectionPoolAddress: string): ProtectionPoolCycleState {
    const poolKey = getAddress(protectionPoolAddress);
    const poolCycle = this.protectionPoolCycles.get(poolKey);
    if (!poolCycle) {
      return ProtectionPoolCycleState.None;
    }

    const now = this.blockTimestamp;
    if (poolCycle.currentCycleState === ProtectionPoolCycleState.Open) {
      if (now - poolCycle.currentCycleStartTime > poolCycle.params.openCycleDuration) {
        poolCycle.currentCycleState = ProtectionPoolCycleState.Locked;
        logger.debug(`Cycle ${poolCycle.currentCycleIndex} of ${poolKey} is locked`);
      }
    }

    if (poolCycle.currentCycleState === ProtectionPoolCycleState.Locked) {
      if (now - poolCycle.currentCycleStartTime > poolCycle.params.cycleDuration) {
        this._startNewCycle(poolKey, poolCycle, poolCycle.currentCycleIndex + 1);
      }
    }

    return poolCycle.currentCycleState;
  }

  getCurrentCycleState(protectionPoolAddress: string): ProtectionPoolCycleState {
    return (
      this.protectionPoolCycles.get(getAddress(protectionPoolAddress))?.currentCycleState ??
      ProtectionPoolCycleState.None
    );
  }

  getCurrentCycleIndex(protectionPoolAddress: string): number {
    return this.protectionPoolCycles.get(getAddress(protectionPoolAddress))?.currentCycleIndex ?? 0;
  }

  getCurrentPoolCycle(protectionPoolAddress: string): ProtectionPoolCycle {
    const poolCycle = this._getPoolCycle(protectionPoolAddress);
    return { ...poolCycle, params: { ...poolCycle.params } };
  }

  getNextCycleEndTimestamp(protectionPoolAddress: string): number {
    const poolCycle = this._getPoolCycle(protectionPoolAddress);
    return poolCycle.currentCycleStartTime + 2 * poolCycle.params.cycleDuration;
  }

  private _getPoolCycle(protectionPoolAddress: string): ProtectionPoolCycle {
    const poolKey = getAddress(protectionPoolAddress);
    const poolCycle = this.protectionPoolCycles.get(poolKey);
    if (!poolCycle) {
      throw new ProtectionPoolCycleNotRegistered(poolKey);
    }
    return poolCycle;
  }

  private _startNewCycle(
    poolKey: string,
    poolCycle: ProtectionPoolCycle,
    cycleIndex: number
  ): void {
    poolCycle.currentCycleIndex = cycleIndex;
    poolCycle.currentCycleStartTime = this.blockTimestamp;
    poolCycle.currentCycleState = ProtectionPoolCycleState.Open;

    this.emit(
      "ProtectionPoolCycleCreated",
      poolKey,
      cycleIndex,
      poolCycle.currentCycleStartTime,
      poolCycle.params.openCycleDuration,
      poolCycle.params.cycleDuration
    );
    logger.debug(`Cycle ${cycleIndex} of ${poolKey} started at ${poolCycle.currentCycleStartTime}`);
  }
}
