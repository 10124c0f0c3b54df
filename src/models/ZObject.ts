/**
 * zObject schema registry
 *
 * Each entry lists the fields a remote object type accepts on create, in
 * the order they are written to the envelope. Keys outside these lists are
 * never serialized.
 */

export const Z_OBJECT_FIELDS = {
  Refund: ['AccountId', 'Amount', 'PaymentId', 'Type'],
  BillRun: [
    'AccountId',
    'AutoEmail',
    'AutoPost',
    'AutoRenewal',
    'Batch',
    'BillCycleDay',
    'ChargeTypeToExclude',
    'Id',
    'InvoiceDate',
    'NoEmailForZeroAmountInvoice',
    'Status',
    'TargetDate',
  ],
} as const satisfies Record<string, readonly string[]>;

export type ZObjectType = keyof typeof Z_OBJECT_FIELDS;

export type ZObjectField<T extends ZObjectType> = (typeof Z_OBJECT_FIELDS)[T][number];

/**
 * Untyped data record, keyed by camelCase (accountId) or snake_case
 * (account_id) field names
 */
export type ZObjectData = Readonly<Record<string, unknown>>;

export function isZObjectType(type: string): type is ZObjectType {
  return Object.prototype.hasOwnProperty.call(Z_OBJECT_FIELDS, type);
}

/**
 * Whitelisted fields of a type, or undefined when the type is not registered
 */
export function getZObjectFields(type: string): readonly string[] | undefined {
  return isZObjectType(type) ? Z_OBJECT_FIELDS[type] : undefined;
}

export function listZObjectTypes(): ZObjectType[] {
  return Object.keys(Z_OBJECT_FIELDS).filter(isZObjectType);
}
