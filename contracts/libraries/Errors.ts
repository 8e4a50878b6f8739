import { BigNumber } from "@ethersproject/bignumber";

export type ErrorArg = string | number | boolean | BigNumber;

const formatErrorArg = (arg: ErrorArg): string => {
  if (typeof arg === "string") return `"${arg}"`;
  return arg.toString();
};

/**
 * Base of every error thrown by the protocol. The message mirrors a custom error
 * signature, e.g. `LendingPoolNotSupported("0x759f...")`.
 */
export abstract class ProtocolError extends Error {
  readonly errorName: string;
  readonly args: readonly ErrorArg[];

  constructor(errorName: string, args: readonly ErrorArg[] = [], message?: string) {
    super(message ?? `${errorName}(${args.map(formatErrorArg).join(", ")})`);
    this.name = new.target.name;
    this.errorName = errorName;
    this.args = args;
  }
}

/** The current state does not admit the operation. */
export class AdmissionError extends ProtocolError {}

/** The caller is not allowed to perform the operation. */
export class AuthorizationError extends ProtocolError {}

/** Inputs fall outside the domain of the fixed point model. */
export class MathDomainError extends ProtocolError {}

export class OwnableUnauthorizedAccount extends AuthorizationError {
  constructor(account: string) {
    super("OwnableUnauthorizedAccount", [account], "Ownable: caller is not the owner");
  }
}

export class OwnableInvalidOwner extends AuthorizationError {
  constructor(owner: string) {
    super("OwnableInvalidOwner", [owner], "Ownable: new owner is the zero address");
  }
}

export class ReentrancyGuardReentrantCall extends ProtocolError {
  constructor() {
    super("ReentrancyGuardReentrantCall", [], "ReentrancyGuard: reentrant call");
  }
}

export class ERC20Error extends AdmissionError {
  constructor(message: string) {
    super("ERC20Error", [], message);
  }
}
