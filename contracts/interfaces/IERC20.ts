import { BigNumber } from "@ethersproject/bignumber";

/**
 * Token the pool settles in. `sender` is the account making the call.
 */
export interface IERC20 {
  readonly address: string;
  name(): string;
  symbol(): string;
  decimals(): number;
  totalSupply(): BigNumber;
  balanceOf(account: string): BigNumber;
  allowance(owner: string, spender: string): BigNumber;
  transfer(sender: string, to: string, amount: BigNumber): boolean;
  approve(sender: string, spender: string, amount: BigNumber): boolean;
  transferFrom(sender: string, from: string, to: string, amount: BigNumber): boolean;
}

export type ERC20Events = {
  Transfer: [from: string, to: string, value: BigNumber];
  Approval: [owner: string, spender: string, value: BigNumber];
};
