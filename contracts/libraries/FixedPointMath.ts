import { BigNumber } from "@ethersproject/bignumber";
import Decimal from "decimal.js";

import { SCALE_18_DECIMALS } from "./Constants";
import { MathDomainError } from "./Errors";

/**
 * Signed 59.18-decimal fixed point helpers over BigNumber.
 */

const HighPrecision = Decimal.clone({ precision: 60, rounding: Decimal.ROUND_HALF_EVEN });

const UNIT = SCALE_18_DECIMALS.toString();
const HALF_UNIT_MINUS_ONE = SCALE_18_DECIMALS.div(2).sub(1);

/// Largest input for which e^x fits in 192 bits
export const EXP_MAX_INPUT = BigNumber.from("133084258667509499440");

export class FixedPointExpInputTooBig extends MathDomainError {
  constructor(x: BigNumber) {
    super("FixedPointExpInputTooBig", [x]);
  }
}

export class FixedPointLogInputTooSmall extends MathDomainError {
  constructor(x: BigNumber) {
    super("FixedPointLogInputTooSmall", [x]);
  }
}

export class FixedPointDivisionByZero extends MathDomainError {
  constructor(x: BigNumber) {
    super("FixedPointDivisionByZero", [x]);
  }
}

const applySign = (value: BigNumber, negative: boolean): BigNumber =>
  negative ? value.mul(-1) : value;

const toFixed18 = (value: Decimal): BigNumber =>
  BigNumber.from(value.mul(UNIT).toFixed(0, Decimal.ROUND_DOWN));

const toDecimal = (x: BigNumber): Decimal => new HighPrecision(x.toString()).div(UNIT);

/**
 * x * y / 1e18, rounding half up on the absolute value.
 */
export function mul(x: BigNumber, y: BigNumber): BigNumber {
  const product = x.abs().mul(y.abs());
  let result = product.div(SCALE_18_DECIMALS);
  if (product.mod(SCALE_18_DECIMALS).gt(HALF_UNIT_MINUS_ONE)) {
    result = result.add(1);
  }
  return applySign(result, x.isNegative() !== y.isNegative());
}

/**
 * x * 1e18 / y, truncated toward zero.
 */
export function div(x: BigNumber, y: BigNumber): BigNumber {
  if (y.isZero()) {
    throw new FixedPointDivisionByZero(x);
  }
  const result = x.abs().mul(SCALE_18_DECIMALS).div(y.abs());
  return applySign(result, x.isNegative() !== y.isNegative());
}

/**
 * Natural exponent e^x, truncated to 18 decimals.
 */
export function exp(x: BigNumber): BigNumber {
  if (x.gt(EXP_MAX_INPUT)) {
    throw new FixedPointExpInputTooBig(x);
  }
  return toFixed18(toDecimal(x).exp());
}

/**
 * Natural logarithm ln(x), truncated toward zero to 18 decimals.
 */
export function ln(x: BigNumber): BigNumber {
  if (x.lte(0)) {
    throw new FixedPointLogInputTooSmall(x);
  }
  return toFixed18(toDecimal(x).ln());
}

/**
 * Scales an amount from the underlying token decimals to 18 decimals.
 */
export function scaleUnderlyingAmtTo18Decimals(
  underlyingAmt: BigNumber,
  underlyingTokenDecimals: number
): BigNumber {
  return underlyingAmt.mul(BigNumber.from(10).pow(18 - underlyingTokenDecimals));
}

/**
 * Scales an 18 decimals amount down to the underlying token decimals, truncating.
 */
export function scale18DecimalsAmtToUnderlyingDecimals(
  amt: BigNumber,
  underlyingTokenDecimals: number
): BigNumber {
  return amt.div(BigNumber.from(10).pow(18 - underlyingTokenDecimals));
}
