import { Clock } from "../../base/Clock";
import { ERC20Snapshot } from "../../tokens/ERC20Snapshot";

/**
 * Share token of a protection pool. Shares have 18 decimals; the pool owns the token and
 * is the only account able to mint, burn and snapshot.
 */
export class SToken extends ERC20Snapshot {
  constructor(address: string, clock: Clock, protectionPool: string, name: string, symbol: string) {
    super(address, clock, protectionPool, name, symbol, 18);
  }

  /**
   * Takes a snapshot of all balances and returns its id.
   */
  snapshot(sender: string): number {
    this.onlyOwner(sender);
    return this._snapshot();
  }
}
