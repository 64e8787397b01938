import { Channel, Programme, SourceResult, XmlElement } from '../src/epg/types';

export interface FixtureChannel {
  id: string;
  names: string[];
}

export interface FixtureProgramme {
  channel: string;
  start: string;
  title: string;
}

export function xmltv(channels: FixtureChannel[], programmes: FixtureProgramme[]): string {
  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<!DOCTYPE tv SYSTEM "xmltv.dtd">',
    '<tv generator-info-name="fixture" generator-info-url="https://example.com">',
  ];
  for (const c of channels) {
    lines.push(`  <channel id="${c.id}">`);
    for (const n of c.names) lines.push(`    <display-name>${n}</display-name>`);
    lines.push('  </channel>');
  }
  for (const p of programmes) {
    lines.push(`  <programme start="${p.start}" stop="${p.start}" channel="${p.channel}">`);
    lines.push(`    <title lang="en">${p.title}</title>`);
    lines.push('  </programme>');
  }
  lines.push('</tv>');
  return lines.join('\n');
}

export function channel(id: string, ...names: string[]): Channel {
  const element: XmlElement = {
    name: 'channel',
    attributes: { id },
    children: names.map((n) => ({ name: 'display-name', attributes: {}, children: [{ text: n }] })),
  };
  return { id, displayNames: names, element };
}

export function programme(channelId: string, start: string, title = 'Show'): Programme {
  return {
    channel: channelId,
    start,
    element: {
      name: 'programme',
      attributes: { start, channel: channelId },
      children: [{ name: 'title', attributes: {}, children: [{ text: title }] }],
    },
  };
}

export function source(channels: Channel[], programmes: Programme[]): SourceResult {
  return { channels: new Map(channels.map((c) => [c.id, c])), programmes };
}
