import fs from 'fs';
import { Duration } from 'luxon';
import { ConfigError, errorMessage } from './epg/errors';
import { DEFAULT_USER_AGENT } from './epg/fetcher';
import { DEFAULT_GENERATOR } from './epg/merger';
import { GeneratorInfo, SourceDescriptor, TimeWindow } from './epg/types';
import { envBool } from './log';
import { DEFAULT_SOURCES } from './sources';

export type EpgConfig = {
  sources: SourceDescriptor[];
  outputPath: string;
  maxRetries: number;
  timeoutSeconds: number;
  window?: TimeWindow; // undefined = keep every programme of a selected channel
  parallelFetch: boolean;
  headers: Record<string, string>;
  generator: GeneratorInfo;
  warnings: string[];
};

type Env = Record<string, string | undefined>;

function envNumber(env: Env, name: string, fallback: number): number {
  const raw = (env[name] || '').trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 0) throw new ConfigError(`${name} must be a non-negative number, got "${raw}"`);
  return n;
}

function envList(val?: string): string[] | undefined {
  if (!val) return undefined;
  const items = val.split(',').map((s) => s.trim()).filter(Boolean);
  return items.length ? items : undefined;
}

function stringList(v: unknown, field: string): string[] | undefined {
  if (v === undefined) return undefined;
  if (!Array.isArray(v) || !v.every((k): k is string => typeof k === 'string')) {
    throw new ConfigError(`${field} must be an array of strings`);
  }
  return v;
}

export function parseSourceList(raw: unknown): SourceDescriptor[] {
  if (!Array.isArray(raw)) throw new ConfigError('sources file must contain a JSON array');
  return raw.map((entry: unknown, i): SourceDescriptor => {
    if (!entry || typeof entry !== 'object') throw new ConfigError(`source #${i} is not an object`);
    const o: Record<string, unknown> = { ...entry };
    if (typeof o.url !== 'string' || !o.url.trim()) throw new ConfigError(`source #${i} has no url`);
    const order = o.order === undefined ? i : o.order;
    if (typeof order !== 'number' || !Number.isInteger(order)) throw new ConfigError(`source #${i} has a non-integer order`);
    return {
      id: typeof o.id === 'string' && o.id ? o.id : `source-${i}`,
      url: o.url.trim(),
      keywords: stringList(o.keywords, `source #${i} keywords`),
      excludeKeywords: stringList(o.excludeKeywords, `source #${i} excludeKeywords`),
      order,
      optional: o.optional === true,
      required: o.required === true,
    };
  });
}

export function loadSourcesFile(file: string): SourceDescriptor[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (e) {
    throw new ConfigError(`cannot read sources file ${file}: ${errorMessage(e)}`, { cause: e });
  }
  return parseSourceList(raw);
}

// Optional env-supplied source; credentials go into the query string.
export function getCustomSource(env: Env, order: number): SourceDescriptor | null {
  const base = (env.EPG_CUSTOM_URL || '').trim();
  if (!base) return null;
  let u: URL;
  try {
    u = new URL(base);
  } catch (e) {
    throw new ConfigError(`EPG_CUSTOM_URL is not a valid URL: ${errorMessage(e)}`, { cause: e });
  }
  const username = (env.EPG_CUSTOM_USERNAME || '').trim();
  const password = (env.EPG_CUSTOM_PASSWORD || '').trim();
  if (username) u.searchParams.set('username', username);
  if (password) u.searchParams.set('password', password);
  return {
    id: 'custom',
    url: u.toString(),
    keywords: envList(env.EPG_CUSTOM_KEYWORDS),
    excludeKeywords: envList(env.EPG_CUSTOM_EXCLUDE),
    order,
    optional: true,
  };
}

export function loadConfig(env: Env = process.env): EpgConfig {
  const warnings: string[] = [];
  const sourcesFile = (env.EPG_SOURCES_FILE || '').trim();
  const sources = sourcesFile ? loadSourcesFile(sourcesFile) : DEFAULT_SOURCES.map((s) => ({ ...s }));

  const lastOrder = sources.reduce((max, s) => Math.max(max, s.order), -1);
  const custom = getCustomSource(env, lastOrder + 1);
  if (custom) sources.push(custom);
  else warnings.push('EPG_CUSTOM_URL not set, skipping custom source');

  const window: TimeWindow | undefined = envBool(env.EPG_WINDOW_DISABLED)
    ? undefined
    : {
        pastGrace: Duration.fromObject({ hours: envNumber(env, 'EPG_PAST_GRACE_HOURS', 24) }),
        futureHorizon: Duration.fromObject({ hours: envNumber(env, 'EPG_FUTURE_HORIZON_HOURS', 192) }),
      };

  // node-fetch treats a zero timeout as none
  const timeoutSeconds = envNumber(env, 'EPG_TIMEOUT_SECONDS', 30);
  if (timeoutSeconds <= 0) throw new ConfigError(`EPG_TIMEOUT_SECONDS must be greater than zero, got "${env.EPG_TIMEOUT_SECONDS}"`);

  const headers: Record<string, string> = {
    'User-Agent': (env.EPG_USER_AGENT || '').trim() || DEFAULT_USER_AGENT,
  };
  const referer = (env.EPG_REFERER || '').trim();
  if (referer) headers.Referer = referer;

  return {
    sources,
    outputPath: (env.EPG_OUTPUT || 'epg.xml.gz').trim(),
    maxRetries: Math.max(1, Math.floor(envNumber(env, 'EPG_MAX_RETRIES', 3))),
    timeoutSeconds,
    window,
    parallelFetch: envBool(env.EPG_PARALLEL_FETCH),
    headers,
    generator: {
      name: (env.EPG_GENERATOR_NAME || '').trim() || DEFAULT_GENERATOR.name,
      url: (env.EPG_GENERATOR_URL || '').trim() || DEFAULT_GENERATOR.url,
    },
    warnings,
  };
}
