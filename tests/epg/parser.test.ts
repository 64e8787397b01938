import { describe, it, expect } from '@jest/globals';
import { ParseError } from '../../src/epg/errors';
import { childElements, cloneElement, findAll, parseXmltv, textContent } from '../../src/epg/parser';
import { xmltv } from '../helpers';

const sample = xmltv(
  [{ id: 'sky.uk', names: ['Sky Sports Main Event', 'Sky Sports ME'] }],
  [{ channel: 'sky.uk', start: '20240105120000 +0000', title: 'Fish &amp; Chips' }],
);

describe('parseXmltv', () => {
  it('builds an element tree', () => {
    const root = parseXmltv(sample);
    expect(root.name).toBe('tv');
    expect(root.attributes['generator-info-name']).toBe('fixture');

    const [ch] = findAll(root, 'channel');
    expect(ch.attributes.id).toBe('sky.uk');
    expect(childElements(ch, 'display-name').map(textContent)).toEqual(['Sky Sports Main Event', 'Sky Sports ME']);

    const [prog] = findAll(root, 'programme');
    expect(prog.attributes).toEqual({ start: '20240105120000 +0000', stop: '20240105120000 +0000', channel: 'sky.uk' });
    expect(textContent(childElements(prog, 'title')[0])).toBe('Fish & Chips');
  });

  it('keeps CDATA as text', () => {
    const xml = sample.replace('Fish &amp; Chips', '<![CDATA[Q&A <live>]]>');
    const [title] = findAll(parseXmltv(xml), 'title');
    expect(textContent(title)).toBe('Q&A <live>');
  });

  it('rejects content that is too short', () => {
    expect(() => parseXmltv('<tv></tv>')).toThrow(new ParseError('content too short'));
  });

  it('rejects an html error page', () => {
    const html = '<html><body><h1>502 Bad Gateway</h1><hr>' + '<p>upstream unavailable</p>'.repeat(5) + '</body>';
    expect(() => parseXmltv(html)).toThrow(ParseError);
  });

  it('rejects malformed markup', () => {
    const broken = sample.replace('</channel>', '</chanel>');
    expect(() => parseXmltv(broken)).toThrow(/^malformed XMLTV: /);
  });
});

describe('cloneElement', () => {
  it('copies the whole subtree', () => {
    const [ch] = findAll(parseXmltv(sample), 'channel');
    const copy = cloneElement(ch);
    expect(copy).toEqual(ch);
    copy.attributes.id = 'changed';
    copy.children.pop();
    expect(ch.attributes.id).toBe('sky.uk');
    expect(childElements(ch, 'display-name')).toHaveLength(2);
  });
});
