/**
 * Query engine - runs translated selectors against a parsed tree
 */

import { toError } from './errors';
import { QueryOutcome, TranslatedQuery } from './types';

const ELEMENT_NODE = 1;
const DOCUMENT_NODE = 9;
// XPathResult.ORDERED_NODE_SNAPSHOT_TYPE
const ORDERED_NODE_SNAPSHOT_TYPE = 7;

export function isElementNode(node: Node | null | undefined): node is Element {
  return node !== null && node !== undefined && node.nodeType === ELEMENT_NODE;
}

function isDocumentNode(node: Node): node is Document {
  return node.nodeType === DOCUMENT_NODE;
}

function evaluateXPath(context: Document | Element, expression: string): Element[] {
  const doc = isDocumentNode(context) ? context : context.ownerDocument;
  const snapshot = doc.evaluate(expression, context, null, ORDERED_NODE_SNAPSHOT_TYPE, null);

  const elements: Element[] = [];
  for (let i = 0; i < snapshot.snapshotLength; i++) {
    const node = snapshot.snapshotItem(i);
    if (!isElementNode(node)) {
      throw new TypeError(`Query matched a non-element node (nodeType ${node?.nodeType ?? 'null'})`);
    }
    elements.push(node);
  }
  return elements;
}

/**
 * Run a query against `context` (a whole document or one element's subtree).
 *
 * Failures of the tree engine (malformed expression, a query that yields
 * something other than elements) come back as an `error` outcome; an empty
 * match list is a `success`.
 */
export function runQuery(context: Document | Element, query: TranslatedQuery): QueryOutcome {
  try {
    const elements =
      query.kind === 'xpath'
        ? evaluateXPath(context, query.expression)
        : Array.from(context.querySelectorAll(query.selector));
    return { status: 'success', elements };
  } catch (e) {
    return { status: 'error', error: toError(e) };
  }
}
