export * from './namespaces';
export * from './EnvelopeBuilder';
export * from './FieldSerializer';
export * from './ResponseParser';
