/**
 * Reduces opaque tool payloads to plain text.
 *
 * Tool hosts commonly answer `{ content: [...] }` where each item is a string,
 * `{ value: string }`, or a prompt-element tree (`{ node }` / `{ value: { node } }`)
 * whose leaves carry `text`. Trees are flattened depth-first, left to right.
 */

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null;
}

/** Text of a node tree; '' for anything that is not a node */
export function extractNodeText(node: unknown): string {
  if (typeof node === 'string') {
    return node;
  }
  if (!isRecord(node)) {
    return '';
  }
  if (typeof node.text === 'string' && node.text !== '') {
    return node.text;
  }
  if (Array.isArray(node.children)) {
    return node.children.map(extractNodeText).join('');
  }
  return '';
}

function stringify(value: unknown): string {
  if (typeof value === 'string') {return value;}
  if (value === null || value === undefined) {return '';}
  if (isRecord(value)) {
    try {
      return JSON.stringify(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
}

function contentItemText(item: unknown): string {
  if (typeof item === 'string') {
    return item;
  }
  if (!isRecord(item)) {
    return stringify(item);
  }
  if (isRecord(item.value) && item.value.node !== undefined) {
    return extractNodeText(item.value.node);
  }
  if (item.node !== undefined) {
    return extractNodeText(item.node);
  }
  if (typeof item.value === 'string') {
    return item.value;
  }
  return stringify(item);
}

export function extractToolResultText(raw: unknown): string {
  if (isRecord(raw) && Array.isArray(raw.content)) {
    return raw.content.map(contentItemText).join('');
  }
  return stringify(raw);
}
