import { DateTime } from 'luxon';
import { EpgError, errorMessage } from './errors';
import { exclude, retainProgrammes } from './exclusion';
import { extract } from './extractor';
import { XmltvFetcher } from './fetcher';
import { merge } from './merger';
import { parseXmltv } from './parser';
import { writeGzipped } from './sink';
import {
  FetchResult, GeneratorInfo, MergedDocument, RunSummary, SourceDescriptor, SourceOutcome, TimeWindow, XmlElement,
} from './types';
import { Logger, createLogger } from '../log';

export interface EPGAggregatorOptions {
  sources: SourceDescriptor[];
  outputPath: string;
  maxRetries: number;
  timeoutSeconds: number;
  window?: TimeWindow;
  parallelFetch?: boolean;
  generator?: GeneratorInfo;
  fetcher?: XmltvFetcher;
  logger?: Logger;
  now?: () => DateTime;
  write?: (doc: MergedDocument, path: string) => Promise<number>;
}

export function sortSources(sources: SourceDescriptor[]): SourceDescriptor[] {
  // Array.prototype.sort is stable, equal ranks keep their listed order
  return [...sources].sort((a, b) => a.order - b.order);
}

export class EPGAggregator {
  private opts: EPGAggregatorOptions;
  private fetcher: XmltvFetcher;
  private log: Logger;
  private now: () => DateTime;
  private write: (doc: MergedDocument, path: string) => Promise<number>;

  constructor(opts: EPGAggregatorOptions) {
    this.opts = opts;
    this.log = opts.logger || createLogger('EPG');
    this.fetcher = opts.fetcher || new XmltvFetcher({ logger: this.log });
    this.now = opts.now || (() => DateTime.local());
    this.write = opts.write || writeGzipped;
  }

  /**
   * Turns one fetched payload into a source outcome. Parse failures
   * become a skip rather than an exception.
   */
  public processSource(source: SourceDescriptor, fetched: FetchResult, now: DateTime): SourceOutcome {
    if (!fetched.ok) {
      return { status: 'skipped', source, reason: errorMessage(fetched.error), error: fetched.error };
    }
    let doc: XmlElement;
    try {
      doc = parseXmltv(fetched.text);
    } catch (e) {
      const error = e instanceof EpgError ? e : new EpgError(errorMessage(e), { cause: e });
      return { status: 'skipped', source, reason: error.message, error };
    }
    const selected = extract(doc, source.keywords, this.opts.window, now);
    const { channels, removed } = exclude(selected.channels, source.excludeKeywords);
    if (removed.length) this.log.info(`[${source.id}] excluded ${removed.length} channels`);
    const programmes = retainProgrammes(selected.programmes, channels);
    return { status: 'ok', source, result: { channels, programmes }, excluded: removed };
  }

  private async fetchAll(sources: SourceDescriptor[]): Promise<FetchResult[]> {
    const { maxRetries, timeoutSeconds } = this.opts;
    if (this.opts.parallelFetch) {
      return Promise.all(sources.map((s) => this.fetcher.fetch(s.url, maxRetries, timeoutSeconds)));
    }
    const out: FetchResult[] = [];
    for (const s of sources) out.push(await this.fetcher.fetch(s.url, maxRetries, timeoutSeconds));
    return out;
  }

  public async run(): Promise<RunSummary> {
    const sources = sortSources(this.opts.sources);
    const fetched = await this.fetchAll(sources);
    const now = this.now();

    const outcomes: SourceOutcome[] = [];
    for (let i = 0; i < sources.length; i++) {
      const outcome = this.processSource(sources[i], fetched[i], now);
      outcomes.push(outcome);
      if (outcome.status === 'ok') {
        this.log.info(`[${outcome.source.id}] ${outcome.result.channels.size} channels, ${outcome.result.programmes.length} programmes`);
        continue;
      }
      if (outcome.source.required) throw outcome.error;
      if (outcome.source.optional) this.log.warn(`[${outcome.source.id}] optional source skipped: ${outcome.reason}`);
      else this.log.error(`[${outcome.source.id}] failed, continuing without it: ${outcome.reason}`);
    }

    const results = outcomes.flatMap((o) => (o.status === 'ok' ? [o.result] : []));
    const document = merge(results, this.opts.generator);
    const bytesWritten = await this.write(document, this.opts.outputPath);

    return {
      outputPath: this.opts.outputPath,
      bytesWritten,
      channelCount: document.channels.size,
      programmeCount: document.programmes.length,
      outcomes,
      document,
    };
  }
}
