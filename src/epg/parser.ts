import sax, { QualifiedAttribute } from 'sax';
import { ParseError, errorMessage } from './errors';
import { XmlElement, XmlNode } from './types';

// Anything shorter is an error page or an empty body, not a guide.
export const MIN_CONTENT_LENGTH = 100;

export function parseXmltv(xml: string): XmlElement {
  if (xml.trim().length < MIN_CONTENT_LENGTH) throw new ParseError('content too short');

  const parser = sax.parser(true, { trim: true });
  const stack: XmlElement[] = [];
  const doc: { root?: XmlElement } = {};

  const appendChild = (node: XmlNode) => {
    const parent = stack[stack.length - 1];
    if (parent) parent.children.push(node);
  };

  parser.onopentag = (node) => {
    const raw: Record<string, string | QualifiedAttribute> = node.attributes;
    const attributes: Record<string, string> = {};
    for (const [k, v] of Object.entries(raw)) {
      attributes[k] = typeof v === 'string' ? v : v.value;
    }
    const el: XmlElement = { name: node.name, attributes, children: [] };
    if (!doc.root) doc.root = el;
    appendChild(el);
    stack.push(el);
  };
  parser.onclosetag = () => {
    stack.pop();
  };
  parser.ontext = (t) => {
    if (t) appendChild({ text: t });
  };
  parser.oncdata = (t) => {
    appendChild({ text: t });
  };
  parser.onerror = (err) => {
    throw err;
  };

  try {
    parser.write(xml).close();
  } catch (e) {
    throw new ParseError(`malformed XMLTV: ${errorMessage(e)}`, { cause: e });
  }
  if (!doc.root) throw new ParseError('no root element');
  return doc.root;
}

export function isElement(node: XmlNode): node is XmlElement {
  return 'name' in node;
}

export function textContent(el: XmlElement): string {
  return el.children.map((c) => (isElement(c) ? textContent(c) : c.text)).join('');
}

export function childElements(el: XmlElement, name: string): XmlElement[] {
  return el.children.filter((c): c is XmlElement => isElement(c) && c.name === name);
}

/** Depth-first search for every element called `name` below `root`. */
export function findAll(root: XmlElement, name: string): XmlElement[] {
  const out: XmlElement[] = [];
  const walk = (el: XmlElement) => {
    for (const c of el.children) {
      if (!isElement(c)) continue;
      if (c.name === name) out.push(c);
      walk(c);
    }
  };
  walk(root);
  return out;
}

export function cloneElement(el: XmlElement): XmlElement {
  return {
    name: el.name,
    attributes: { ...el.attributes },
    children: el.children.map((c) => (isElement(c) ? cloneElement(c) : { text: c.text })),
  };
}
