/**
 * Refund models
 */

export type RefundType = 'Electronic' | 'External';

export type RefundRequest = {
  accountId?: string | null;
  amount?: number | string | null;
  paymentId?: string | null;
  type?: RefundType | null;
};
