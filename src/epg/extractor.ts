import { DateTime } from 'luxon';
import { childElements, cloneElement, findAll, textContent } from './parser';
import { Channel, Programme, SourceResult, TimeWindow, XmlElement } from './types';

export function displayNames(el: XmlElement): (string | undefined)[] {
  return childElements(el, 'display-name').map((dn) => textContent(dn).trim() || undefined);
}

export function matchesAnyKeyword(names: (string | undefined)[], keywords: string[]): boolean {
  const needles = keywords.map((k) => k.toLowerCase());
  return names.some((name) => {
    if (!name) return false;
    const hay = name.toLowerCase();
    return needles.some((k) => hay.includes(k));
  });
}

/**
 * Parses the start of an xmltv timestamp as local time. Accepts
 * YYYYMMDDHHMMSS and YYYYMMDDHHMM; the offset suffix is ignored.
 * Returns null when there are not enough digits or the date is invalid.
 */
export function parseXmltvStart(raw: string): DateTime | null {
  const digits = (raw.trim().match(/^\d+/) || [''])[0];
  let dt: DateTime;
  if (digits.length >= 14) dt = DateTime.fromFormat(digits.slice(0, 14), 'yyyyLLddHHmmss');
  else if (digits.length >= 12) dt = DateTime.fromFormat(digits.slice(0, 12), 'yyyyLLddHHmm');
  else return null;
  return dt.isValid ? dt : null;
}

export function inWindow(start: DateTime, window: TimeWindow, now: DateTime): boolean {
  const t = start.toMillis();
  return t >= now.minus(window.pastGrace).toMillis() && t <= now.plus(window.futureHorizon).toMillis();
}

/**
 * Selects channels by keyword (all of them when `keywords` is absent) and
 * the programmes that belong to them and start inside `window`.
 * Programmes whose start cannot be parsed are kept.
 */
export function extract(
  document: XmlElement,
  keywords?: string[],
  window?: TimeWindow,
  now: DateTime = DateTime.local(),
): SourceResult {
  const channels = new Map<string, Channel>();
  for (const el of findAll(document, 'channel')) {
    const id = el.attributes.id;
    if (!id) continue;
    const names = displayNames(el);
    if (keywords && !matchesAnyKeyword(names, keywords)) continue;
    channels.set(id, { id, displayNames: names, element: cloneElement(el) });
  }

  const programmes: Programme[] = [];
  for (const el of findAll(document, 'programme')) {
    const channel = el.attributes.channel;
    if (!channel || !channels.has(channel)) continue;
    const start = el.attributes.start || '';
    if (window) {
      const at = parseXmltvStart(start);
      if (at && !inWindow(at, window, now)) continue;
    }
    programmes.push({ channel, start, element: cloneElement(el) });
  }

  return { channels, programmes };
}
