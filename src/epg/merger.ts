import { MergeError } from './errors';
import { retainProgrammes } from './exclusion';
import { Channel, GeneratorInfo, MergedDocument, Programme, SourceResult } from './types';

export const DEFAULT_GENERATOR: GeneratorInfo = {
  name: 'epg-merge',
  url: 'https://example.com',
};

/**
 * Folds the results in the order given. A later channel replaces an
 * earlier one with the same id; programmes are concatenated as-is.
 */
export function merge(results: SourceResult[], generator: GeneratorInfo = DEFAULT_GENERATOR): MergedDocument {
  const channels = new Map<string, Channel>();
  const programmes: Programme[] = [];
  for (const r of results) {
    for (const [id, ch] of r.channels) channels.set(id, ch);
    programmes.push(...r.programmes);
  }
  const retained = retainProgrammes(programmes, channels);
  if (!retained.length) throw new MergeError('no programmes collected');
  return { channels, programmes: retained, generator: { ...generator } };
}
