import { BigNumber } from "@ethersproject/bignumber";
import { constants } from "ethers";
import { getAddress } from "ethers/lib/utils";

import { Contract } from "../base/Contract";
import { Clock } from "../base/Clock";
import { ERC20Error } from "../libraries/Errors";
import { ERC20Events, IERC20 } from "../interfaces/IERC20";

const key = (account: string): string => getAddress(account);

/**
 * Fungible token with owner-only minting and burning.
 */
export class ERC20 extends Contract<ERC20Events> implements IERC20 {
  private readonly _name: string;
  private readonly _symbol: string;
  private readonly _decimals: number;
  private _totalSupply: BigNumber = constants.Zero;
  private readonly _balances = new Map<string, BigNumber>();
  private readonly _allowances = new Map<string, Map<string, BigNumber>>();

  constructor(
    address: string,
    clock: Clock,
    owner: string,
    name: string,
    symbol: string,
    decimals = 18
  ) {
    super(address, clock, owner);
    this._name = name;
    this._symbol = symbol;
    this._decimals = decimals;
  }

  name(): string {
    return this._name;
  }

  symbol(): string {
    return this._symbol;
  }

  decimals(): number {
    return this._decimals;
  }

  totalSupply(): BigNumber {
    return this._totalSupply;
  }

  balanceOf(account: string): BigNumber {
    return this._balances.get(key(account)) ?? constants.Zero;
  }

  allowance(owner: string, spender: string): BigNumber {
    return this._allowances.get(key(owner))?.get(key(spender)) ?? constants.Zero;
  }

  transfer(sender: string, to: string, amount: BigNumber): boolean {
    this._transfer(sender, to, amount);
    return true;
  }

  approve(sender: string, spender: string, amount: BigNumber): boolean {
    this._approve(sender, spender, amount);
    return true;
  }

  transferFrom(sender: string, from: string, to: string, amount: BigNumber): boolean {
    this._spendAllowance(from, sender, amount);
    this._transfer(from, to, amount);
    return true;
  }

  mint(sender: string, to: string, amount: BigNumber): void {
    this.onlyOwner(sender);
    this._mint(to, amount);
  }

  burn(sender: string, from: string, amount: BigNumber): void {
    this.onlyOwner(sender);
    this._burn(from, amount);
  }

  protected _transfer(from: string, to: string, amount: BigNumber): void {
    if (from === constants.AddressZero) {
      throw new ERC20Error("ERC20: transfer from the zero address");
    }
    if (to === constants.AddressZero) {
      throw new ERC20Error("ERC20: transfer to the zero address");
    }
    const fromBalance = this.balanceOf(from);
    if (fromBalance.lt(amount)) {
      throw new ERC20Error("ERC20: transfer amount exceeds balance");
    }

    this._beforeTokenTransfer(from, to, amount);
    this._balances.set(key(from), fromBalance.sub(amount));
    this._balances.set(key(to), this.balanceOf(to).add(amount));
    this.emit("Transfer", key(from), key(to), amount);
  }

  protected _mint(account: string, amount: BigNumber): void {
    if (account === constants.AddressZero) {
      throw new ERC20Error("ERC20: mint to the zero address");
    }

    this._beforeTokenTransfer(constants.AddressZero, account, amount);
    this._totalSupply = this._totalSupply.add(amount);
    this._balances.set(key(account), this.balanceOf(account).add(amount));
    this.emit("Transfer", constants.AddressZero, key(account), amount);
  }

  protected _burn(account: string, amount: BigNumber): void {
    if (account === constants.AddressZero) {
      throw new ERC20Error("ERC20: burn from the zero address");
    }
    const accountBalance = this.balanceOf(account);
    if (accountBalance.lt(amount)) {
      throw new ERC20Error("ERC20: burn amount exceeds balance");
    }

    this._beforeTokenTransfer(account, constants.AddressZero, amount);
    this._balances.set(key(account), accountBalance.sub(amount));
    this._totalSupply = this._totalSupply.sub(amount);
    this.emit("Transfer", key(account), constants.AddressZero, amount);
  }

  protected _approve(owner: string, spender: string, amount: BigNumber): void {
    if (owner === constants.AddressZero) {
      throw new ERC20Error("ERC20: approve from the zero address");
    }
    if (spender === constants.AddressZero) {
      throw new ERC20Error("ERC20: approve to the zero address");
    }

    const allowances = this._allowances.get(key(owner)) ?? new Map<string, BigNumber>();
    allowances.set(key(spender), amount);
    this._allowances.set(key(owner), allowances);
    this.emit("Approval", key(owner), key(spender), amount);
  }

  protected _spendAllowance(owner: string, spender: string, amount: BigNumber): void {
    const currentAllowance = this.allowance(owner, spender);
    if (!currentAllowance.eq(constants.MaxUint256)) {
      if (currentAllowance.lt(amount)) {
        throw new ERC20Error("ERC20: insufficient allowance");
      }
      this._approve(owner, spender, currentAllowance.sub(amount));
    }
  }

  /**
   * Hook called before any balance changes, including minting and burning.
   */
  protected _beforeTokenTransfer(from: string, to: string, amount: BigNumber): void {}
}
