#!/usr/bin/env node
import { loadConfig } from './config';
import { errorMessage } from './epg/errors';
import { HttpFetch, XmltvFetcher } from './epg/fetcher';
import { EPGAggregator } from './epg/service';
import { RunSummary } from './epg/types';
import { Logger, createLogger, envBool } from './log';

const log = createLogger('EPG');

process.on('unhandledRejection', (reason: unknown) => { log.error('unhandledRejection', reason); });

export function reportSummary(summary: RunSummary, logger: Logger = log): void {
  logger.info(
    `EPG written to ${summary.outputPath} (${summary.bytesWritten} bytes). ` +
    `Found ${summary.channelCount} channels and ${summary.programmeCount} programmes.`,
  );
  logger.info('Channels:');
  for (const [id, ch] of summary.document.channels) {
    const name = ch.displayNames.find((n) => !!n);
    if (name) logger.info(`- ${name} (${id})`);
  }
}

export interface MainOptions {
  http?: HttpFetch; // defaults to node-fetch
}

export async function main(env: NodeJS.ProcessEnv = process.env, opts: MainOptions = {}): Promise<number> {
  const debug = envBool(env.EPG_DEBUG);
  const runLog = createLogger('EPG', debug);
  try {
    const config = loadConfig(env);
    for (const w of config.warnings) runLog.warn(w);
    const aggregator = new EPGAggregator({
      ...config,
      fetcher: new XmltvFetcher({ headers: config.headers, http: opts.http, logger: createLogger('FETCH', debug) }),
      logger: runLog,
    });
    reportSummary(await aggregator.run(), runLog);
    return 0;
  } catch (e) {
    runLog.error(`Error fetching or processing EPG: ${errorMessage(e)}`);
    return 1;
  }
}

if (require.main === module) {
  main().then((code) => { process.exitCode = code; });
}
