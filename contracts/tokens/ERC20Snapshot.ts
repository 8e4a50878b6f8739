import { BigNumber } from "@ethersproject/bignumber";
import { constants } from "ethers";
import { getAddress } from "ethers/lib/utils";

import { ERC20 } from "./ERC20";
import { ERC20Error } from "../libraries/Errors";

interface Snapshots {
  ids: number[];
  values: BigNumber[];
}

/**
 * Records balances and total supply at snapshot ids.
 * A value is written the first time it changes after a snapshot, so a lookup returns
 * the first recorded value at or after the requested id, or the current value when none exists.
 */
export class ERC20Snapshot extends ERC20 {
  private readonly _accountBalanceSnapshots = new Map<string, Snapshots>();
  private readonly _totalSupplySnapshots: Snapshots = { ids: [], values: [] };
  private _currentSnapshotId = 0;

  balanceOfAt(account: string, snapshotId: number): BigNumber {
    const snapshots = this._accountBalanceSnapshots.get(getAddress(account));
    const snapshotted = snapshots ? this._valueAt(snapshotId, snapshots) : undefined;
    return snapshotted ?? this.balanceOf(account);
  }

  totalSupplyAt(snapshotId: number): BigNumber {
    return this._valueAt(snapshotId, this._totalSupplySnapshots) ?? this.totalSupply();
  }

  getCurrentSnapshotId(): number {
    return this._currentSnapshotId;
  }

  protected _snapshot(): number {
    this._currentSnapshotId += 1;
    return this._currentSnapshotId;
  }

  protected _beforeTokenTransfer(from: string, to: string, amount: BigNumber): void {
    super._beforeTokenTransfer(from, to, amount);

    if (from === constants.AddressZero) {
      this._updateAccountSnapshot(to);
      this._updateTotalSupplySnapshot();
    } else if (to === constants.AddressZero) {
      this._updateAccountSnapshot(from);
      this._updateTotalSupplySnapshot();
    } else {
      this._updateAccountSnapshot(from);
      this._updateAccountSnapshot(to);
    }
  }

  private _valueAt(snapshotId: number, snapshots: Snapshots): BigNumber | undefined {
    if (snapshotId <= 0) {
      throw new ERC20Error("ERC20Snapshot: id is 0");
    }
    if (snapshotId > this._currentSnapshotId) {
      throw new ERC20Error("ERC20Snapshot: nonexistent id");
    }

    // first index whose id is >= snapshotId
    let low = 0;
    let high = snapshots.ids.length;
    while (low < high) {
      const mid = Math.floor((low + high) / 2);
      if (snapshots.ids[mid] < snapshotId) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }

    return low === snapshots.ids.length ? undefined : snapshots.values[low];
  }

  private _updateAccountSnapshot(account: string): void {
    const accountKey = getAddress(account);
    const snapshots = this._accountBalanceSnapshots.get(accountKey) ?? {
      ids: [],
      values: []
    };
    this._updateSnapshot(snapshots, this.balanceOf(account));
    this._accountBalanceSnapshots.set(accountKey, snapshots);
  }

  private _updateTotalSupplySnapshot(): void {
    this._updateSnapshot(this._totalSupplySnapshots, this.totalSupply());
  }

  private _updateSnapshot(snapshots: Snapshots, currentValue: BigNumber): void {
    const currentId = this._currentSnapshotId;
    const lastId = snapshots.ids.length === 0 ? 0 : snapshots.ids[snapshots.ids.length - 1];
    if (lastId < currentId) {
      snapshots.ids.push(currentId);
      snapshots.values.push(currentValue);
    }
  }
}
