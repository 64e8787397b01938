import { Channel, Programme } from './types';

export interface ExclusionResult {
  channels: Map<string, Channel>;
  removed: string[]; // ids, in input order
}

export function exclude(channels: Map<string, Channel>, excludeKeywords: string[] = []): ExclusionResult {
  const needles = excludeKeywords.map((k) => k.toLowerCase()).filter(Boolean);
  const kept = new Map<string, Channel>();
  const removed: string[] = [];
  for (const [id, ch] of channels) {
    const joined = ch.displayNames.filter((n): n is string => !!n).join(' ').toLowerCase();
    if (needles.some((k) => joined.includes(k))) removed.push(id);
    else kept.set(id, ch);
  }
  return { channels: kept, removed };
}

// Drops programmes whose channel is no longer present.
export function retainProgrammes(programmes: Programme[], channels: Map<string, Channel>): Programme[] {
  return programmes.filter((p) => channels.has(p.channel));
}
