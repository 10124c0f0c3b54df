export * from './ZObject';
export * from './Refund';
export * from './BillRun';
