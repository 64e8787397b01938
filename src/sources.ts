import { SourceDescriptor } from './epg/types';

export const DEFAULT_SOURCES: SourceDescriptor[] = [
  {
    id: 'uk',
    url: 'https://epg.pw/xmltv/epg_GB.xml.gz',
    keywords: ['sky sports', 'tnt sports'],
    order: 0,
  },
  {
    id: 'au',
    url: 'https://epg.pw/xmltv/epg_AU.xml',
    keywords: ['fox'],
    order: 1,
  },
  {
    id: 'in',
    url: 'https://avkb.short.gy/epg.xml.gz',
    order: 2,
  },
];
