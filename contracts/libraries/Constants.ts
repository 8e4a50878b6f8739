import { BigNumber } from "@ethersproject/bignumber";
import { parseEther } from "ethers/lib/utils";

export const SCALE_18_DECIMALS = parseEther("1");

export const SECONDS_IN_DAY = 86400;

/// 365.24 days in 18 decimals
export const SCALED_DAYS_IN_YEAR = parseEther("365.24");

/// 365.24 * 86400
export const SECONDS_IN_YEAR = 31556736;

export const SCALED_SECONDS_IN_DAY = BigNumber.from(SECONDS_IN_DAY);

export const MIN_PROTECTION_RENEWAL_DURATION_IN_SECONDS = SECONDS_IN_DAY;

export const DEFAULT_PAYMENTS_TO_UNLOCK = 2;

export const DEFAULT_MISSED_PAYMENT_PERIODS_TO_DEFAULT = 2;

export const DEFAULT_LATE_PAYMENT_GRACE_PERIOD_IN_DAYS = 1;
