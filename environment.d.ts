declare namespace NodeJS {
  export interface ProcessEnv {
    LATE_PAYMENT_GRACE_PERIOD_IN_DAYS?: string;
    PAYMENTS_TO_UNLOCK?: string;
    MISSED_PAYMENT_PERIODS_TO_DEFAULT?: string;
    LOG_LEVEL?: string;
  }
}
