import { EventEmitter } from "events";
import { constants } from "ethers";
import { getAddress } from "ethers/lib/utils";

import { Clock } from "./Clock";
import {
  OwnableInvalidOwner,
  OwnableUnauthorizedAccount,
  ReentrancyGuardReentrantCall
} from "../libraries/Errors";

export type EventMap = Record<string, unknown[]>;

export interface EventLog<Args extends unknown[]> {
  args: Args;
  blockTimestamp: number;
}

type EventLogs<Events extends EventMap> = {
  [K in keyof Events]?: EventLog<Events[K]>[];
};

/**
 * In-process contract: an address, an owner, a typed event log and the block clock.
 * Subclasses declare their events as a map from event name to argument tuple.
 */
export abstract class Contract<Events extends EventMap> {
  readonly address: string;
  protected readonly clock: Clock;

  private _owner: string;
  private _entered = false;
  private readonly emitter = new EventEmitter();
  private readonly logs: EventLogs<Events> = {};

  constructor(address: string, clock: Clock, owner: string) {
    this.address = getAddress(address);
    this.clock = clock;
    this._owner = getAddress(owner);
  }

  owner(): string {
    return this._owner;
  }

  transferOwnership(sender: string, newOwner: string): void {
    this.onlyOwner(sender);
    if (newOwner.toLowerCase() === constants.AddressZero) {
      throw new OwnableInvalidOwner(newOwner);
    }
    this._owner = getAddress(newOwner);
  }

  on<K extends keyof Events & string>(
    event: K,
    listener: (...args: Events[K]) => void
  ): this {
    this.emitter.on(event, listener);
    return this;
  }

  off<K extends keyof Events & string>(
    event: K,
    listener: (...args: Events[K]) => void
  ): this {
    this.emitter.off(event, listener);
    return this;
  }

  /**
   * Returns every log of the given event emitted so far, oldest first.
   */
  queryFilter<K extends keyof Events & string>(event: K): EventLog<Events[K]>[] {
    return [...(this.logs[event] ?? [])];
  }

  protected emit<K extends keyof Events & string>(event: K, ...args: Events[K]): void {
    const log: EventLog<Events[K]> = { args, blockTimestamp: this.clock.now() };
    const logs = this.logs[event] ?? [];
    logs.push(log);
    this.logs[event] = logs;
    this.emitter.emit(event, ...args);
  }

  protected onlyOwner(sender: string): void {
    if (sender.toLowerCase() !== this._owner.toLowerCase()) {
      throw new OwnableUnauthorizedAccount(sender);
    }
  }

  /**
   * Runs `fn` while rejecting any nested call into a guarded entry point.
   */
  protected nonReentrant<T>(fn: () => T): T {
    if (this._entered) {
      throw new ReentrancyGuardReentrantCall();
    }
    this._entered = true;
    try {
      return fn();
    } finally {
      this._entered = false;
    }
  }

  protected get blockTimestamp(): number {
    return this.clock.now();
  }
}
