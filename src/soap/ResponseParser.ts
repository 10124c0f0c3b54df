/**
 * Reads values out of SOAP responses by namespace-qualified element path.
 * Prefixes are resolved against the xmlns declarations in the document, so
 * a response using other prefixes for the same namespaces still matches.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { QualifiedName, SESSION_TOKEN_PATH } from './namespaces';

const ATTRIBUTE_PREFIX = '@_';
const TEXT_NODE = '#text';

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  removeNSPrefix: false,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
});

type NamespaceScope = ReadonlyMap<string, string>;

interface ScopedNode {
  value: unknown;
  scope: NamespaceScope;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Scope of an element: its parent's scope plus its own xmlns declarations
 */
function extendScope(scope: NamespaceScope, element: unknown): NamespaceScope {
  if (!isRecord(element)) {
    return scope;
  }

  let extended: Map<string, string> | undefined;
  for (const [key, value] of Object.entries(element)) {
    if (typeof value !== 'string') continue;
    let prefix: string | undefined;
    if (key === `${ATTRIBUTE_PREFIX}xmlns`) {
      prefix = '';
    } else if (key.startsWith(`${ATTRIBUTE_PREFIX}xmlns:`)) {
      prefix = key.slice(`${ATTRIBUTE_PREFIX}xmlns:`.length);
    }
    if (prefix !== undefined) {
      extended = extended ?? new Map(scope);
      extended.set(prefix, value);
    }
  }
  return extended ?? scope;
}

function splitName(name: string): { prefix: string; localName: string } {
  const colon = name.indexOf(':');
  return colon === -1
    ? { prefix: '', localName: name }
    : { prefix: name.slice(0, colon), localName: name.slice(colon + 1) };
}

function childElements(node: ScopedNode, step: QualifiedName): ScopedNode[] {
  if (!isRecord(node.value)) {
    return [];
  }

  const matches: ScopedNode[] = [];
  for (const [key, child] of Object.entries(node.value)) {
    if (key.startsWith(ATTRIBUTE_PREFIX) || key === TEXT_NODE || key.startsWith('?')) {
      continue;
    }
    const { prefix, localName } = splitName(key);
    if (localName !== step.localName) {
      continue;
    }
    for (const element of Array.isArray(child) ? child : [child]) {
      const scope = extendScope(node.scope, element);
      if (scope.get(prefix) === step.namespace) {
        matches.push({ value: element, scope });
      }
    }
  }
  return matches;
}

function textOf(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (isRecord(value)) {
    const text = value[TEXT_NODE];
    return typeof text === 'string' ? text : '';
  }
  return '';
}

/**
 * Text of every element at `path`, concatenated. Empty when the document is
 * not well-formed XML or nothing matches.
 */
export function extractText(xml: string, path: readonly QualifiedName[]): string {
  if (xml.trim() === '' || XMLValidator.validate(xml) !== true) {
    return '';
  }

  let nodes: ScopedNode[] = [{ value: parser.parse(xml), scope: new Map() }];
  for (const step of path) {
    nodes = nodes.flatMap((node) => childElements(node, step));
    if (nodes.length === 0) {
      return '';
    }
  }
  return nodes.map((node) => textOf(node.value)).join('');
}

export function extractSessionToken(xml: string): string {
  return extractText(xml, SESSION_TOKEN_PATH);
}
