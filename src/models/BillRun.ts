/**
 * Bill run models
 */

export type BillRunStatus = 'Pending' | 'Processing' | 'Completed' | 'Error' | 'Canceled' | 'Posted';

export type BillRunRequest = {
  accountId?: string | null;
  autoEmail?: boolean | null;
  autoPost?: boolean | null;
  autoRenewal?: boolean | null;
  batch?: string | null;
  /** 1-31 or 'AllBillCycleDays' */
  billCycleDay?: number | string | null;
  chargeTypeToExclude?: string | null;
  id?: string | null;
  /** Date, or a yyyy-mm-dd string */
  invoiceDate?: Date | string | null;
  noEmailForZeroAmountInvoice?: boolean | null;
  status?: BillRunStatus | null;
  targetDate?: Date | string | null;
};
