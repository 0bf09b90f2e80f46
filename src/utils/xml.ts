import { JSDOM } from 'jsdom';
import { FormatError } from './errors';

const { window } = new JSDOM('');

/** Parse XML string to Document */
export function parseXml(xmlString: string): Document {
  const parser = new window.DOMParser();
  const doc = parser.parseFromString(xmlString, 'text/xml');
  const errorNode = doc.getElementsByTagName('parsererror').item(0);
  if (errorNode) {
    throw new FormatError(`XML parse error: ${errorNode.textContent ?? ''}`);
  }
  return doc;
}

/** Serialize Document to XML string */
export function serializeXml(doc: Document): string {
  const serializer = new window.XMLSerializer();
  let xml = serializer.serializeToString(doc);
  // Ensure XML declaration
  if (!xml.startsWith('<?xml')) {
    xml = '<?xml version="1.0" encoding="UTF-8"?>\n' + xml;
  }
  return xml;
}

/** Direct element children of `parent` with the given tag name, in document order */
export function childElements(parent: Element, tagName: string): Element[] {
  return Array.from(parent.children).filter((el) => el.tagName === tagName);
}

export function firstChildElement(parent: Element, tagName: string): Element | undefined {
  return childElements(parent, tagName)[0];
}

/** Every element below `parent` with the given tag name, in document order */
export function descendants(parent: Element, tagName: string): Element[] {
  return Array.from(parent.getElementsByTagName(tagName));
}

export function requireAttribute(el: Element, name: string): string {
  const value = el.getAttribute(name);
  if (value === null) {
    throw new FormatError(`<${el.tagName}> is missing the ${name} attribute`);
  }
  return value;
}

/**
 * Re-indent an element tree in place. Whitespace-only text between elements is
 * dropped and replaced with a newline plus one `indent` per depth. Leaf
 * elements and elements with mixed content keep their text as it is.
 */
export function indentXml(root: Element, indent = '\t', depth = 0): void {
  const children = Array.from(root.children);
  if (children.length === 0) return;

  const nodes = Array.from(root.childNodes);
  const hasText = nodes.some(
    (n) => n.nodeType === n.TEXT_NODE && (n.textContent ?? '').trim() !== ''
  );
  if (hasText) return;

  for (const node of nodes) {
    if (node.nodeType === node.TEXT_NODE) root.removeChild(node);
  }

  const doc = root.ownerDocument;
  for (const child of children) {
    root.insertBefore(doc.createTextNode('\n' + indent.repeat(depth + 1)), child);
    indentXml(child, indent, depth + 1);
  }
  root.appendChild(doc.createTextNode('\n' + indent.repeat(depth)));
}
