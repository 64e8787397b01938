import { Duration } from 'luxon';
import { EpgError } from './errors';

export interface XmlText {
  text: string;
}

export interface XmlElement {
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
}

export type XmlNode = XmlElement | XmlText;

export interface Channel {
  id: string;
  // one entry per <display-name>; undefined when the element is empty
  displayNames: (string | undefined)[];
  element: XmlElement; // owned copy, never shared with the source tree
}

export interface Programme {
  channel: string; // channel id
  start: string;   // raw xmltv attribute, e.g. 20240917101500 +0200
  element: XmlElement;
}

export interface TimeWindow {
  pastGrace: Duration;
  futureHorizon: Duration;
}

export interface SourceDescriptor {
  id: string;
  url: string;
  // case-insensitive substrings matched against display names; absent = all channels
  keywords?: string[];
  excludeKeywords?: string[];
  // processing rank: later ranks win on channel id collisions
  order: number;
  optional?: boolean;
  // a failure of a required source aborts the run
  required?: boolean;
}

export interface SourceResult {
  // insertion order = first seen; overwrites keep the original slot
  channels: Map<string, Channel>;
  programmes: Programme[];
}

export interface GeneratorInfo {
  name: string;
  url: string;
}

export interface MergedDocument extends SourceResult {
  generator: GeneratorInfo;
}

export type FetchResult =
  | { ok: true; text: string; attempts: number }
  | { ok: false; error: EpgError; attempts: number };

export type SourceOutcome =
  | {
      status: 'ok';
      source: SourceDescriptor;
      result: SourceResult;
      excluded: string[];
    }
  | {
      status: 'skipped';
      source: SourceDescriptor;
      reason: string;
      error: EpgError;
    };

export interface RunSummary {
  outputPath: string;
  bytesWritten: number;
  channelCount: number;
  programmeCount: number;
  outcomes: SourceOutcome[];
  document: MergedDocument;
}
