import { isElement } from './parser';
import { MergedDocument, XmlElement } from './types';

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

export function escapeText(s: string): string {
  return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function escapeAttr(s: string): string {
  return escapeText(s).replace(/"/g, '&quot;');
}

function openTag(el: XmlElement): string {
  const attrs = Object.entries(el.attributes).map(([k, v]) => ` ${k}="${escapeAttr(v)}"`).join('');
  return `<${el.name}${attrs}`;
}

export function serializeElement(el: XmlElement, indent = ''): string {
  if (!el.children.length) return `${indent}${openTag(el)} />`;
  if (el.children.every((c) => !isElement(c))) {
    const text = el.children.map((c) => (isElement(c) ? '' : escapeText(c.text))).join('');
    return `${indent}${openTag(el)}>${text}</${el.name}>`;
  }
  const inner = el.children.map((c) =>
    isElement(c) ? serializeElement(c, indent + '  ') : `${indent}  ${escapeText(c.text)}`,
  );
  return [`${indent}${openTag(el)}>`, ...inner, `${indent}</${el.name}>`].join('\n');
}

export function toXmltvElement(doc: MergedDocument): XmlElement {
  return {
    name: 'tv',
    attributes: {
      'generator-info-name': doc.generator.name,
      'generator-info-url': doc.generator.url,
    },
    children: [
      ...Array.from(doc.channels.values(), (c) => c.element),
      ...doc.programmes.map((p) => p.element),
    ],
  };
}

export function serializeXmltv(doc: MergedDocument): string {
  return `${XML_DECLARATION}\n${serializeElement(toXmltvElement(doc))}\n`;
}
