/**
 * Namespaces declared on every envelope, keyed by prefix
 */
export const NAMESPACES = {
  soapenv: 'http://schemas.xmlsoap.org/soap/envelope/',
  ns1: 'http://api.zuora.com/',
  ns2: 'http://object.api.zuora.com/',
  xsi: 'http://www.w3.org/2001/XMLSchema-instance',
} as const;

export type NamespacePrefix = keyof typeof NAMESPACES;

/**
 * One step of a namespace-qualified element path
 */
export interface QualifiedName {
  namespace: string;
  localName: string;
}

function qualified(prefix: NamespacePrefix, localName: string): QualifiedName {
  return { namespace: NAMESPACES[prefix], localName };
}

/**
 * soapenv:Envelope/soapenv:Body/ns1:loginResponse/ns1:result/ns1:Session
 */
export const SESSION_TOKEN_PATH: readonly QualifiedName[] = [
  qualified('soapenv', 'Envelope'),
  qualified('soapenv', 'Body'),
  qualified('ns1', 'loginResponse'),
  qualified('ns1', 'result'),
  qualified('ns1', 'Session'),
];
