/**
 * SOAP Envelope Builder
 *
 * Every envelope declares the four namespaces in NAMESPACES. Header and Body
 * are each written only when supplied, so one builder serves the login
 * request (body only) and authenticated requests (header and body).
 */

import { XMLBuilder } from 'fast-xml-parser';
import { NAMESPACES } from './namespaces';

/**
 * Element tree handed to the XML builder. Keys starting with `@_` are
 * attributes; key order is document order.
 */
export interface XmlNode {
  [name: string]: string | XmlNode;
}

export interface EnvelopeParts {
  header?: XmlNode;
  body?: XmlNode;
}

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  format: false,
  suppressEmptyNode: false,
  processEntities: true,
});

function namespaceAttributes(): XmlNode {
  const attributes: XmlNode = {};
  for (const [prefix, uri] of Object.entries(NAMESPACES)) {
    attributes[`@_xmlns:${prefix}`] = uri;
  }
  return attributes;
}

/**
 * Serialize an envelope with optional header and body
 */
export function buildEnvelope(parts: EnvelopeParts = {}): string {
  const envelope: XmlNode = namespaceAttributes();

  if (parts.header) {
    envelope['soapenv:Header'] = parts.header;
  }
  if (parts.body) {
    envelope['soapenv:Body'] = parts.body;
  }

  return XML_DECLARATION + builder.build({ 'soapenv:Envelope': envelope });
}

export function sessionHeader(token: string): XmlNode {
  return {
    'ns1:SessionHeader': {
      'ns1:session': token,
    },
  };
}

export function loginBody(username: string, password: string): XmlNode {
  return {
    'ns1:login': {
      'ns1:username': username,
      'ns1:password': password,
    },
  };
}

/**
 * ns1:create/ns1:zObjects[@xsi:type=ns2:Type] with one ns2 element per field
 *
 * @param fields - [fieldName, text] pairs in emission order
 */
export function createBody(type: string, fields: ReadonlyArray<readonly [string, string]>): XmlNode {
  const zObject: XmlNode = { '@_xsi:type': `ns2:${type}` };
  for (const [name, text] of fields) {
    zObject[`ns2:${name}`] = text;
  }
  return {
    'ns1:create': {
      'ns1:zObjects': zObject,
    },
  };
}
