import { ConfigurationError, MetadataError } from '../errors';
import { MetadataSource } from '../metadata/MetadataSource';
import { DOWNLOAD_TYPES, DownloadType, SegmentRecord } from '../types';
import { ClassMap } from './ClassMap';
import { parseSeconds, splitCsvLine, splitLabelCodes, splitLines } from './tables';

export function segmentsTablePath(split: DownloadType): string {
  return `v1/csv/${split}_segments.csv`;
}

export function assertDownloadType(value: string): DownloadType {
  const match = DOWNLOAD_TYPES.find(type => type === value);
  if (!match) {
    throw new ConfigurationError(
      `Invalid download type "${value}" (expected one of: ${DOWNLOAD_TYPES.join(', ')})`
    );
  }
  return match;
}

/**
 * Parses a `<split>_segments.csv` table, keeping file order.
 * When `filter` is given, only records sharing at least one code with it are kept.
 */
export function parseSegments(content: string, filter: ReadonlySet<string> | null): SegmentRecord[] {
  const records: SegmentRecord[] = [];

  for (const line of splitLines(content)) {
    if (line.startsWith('#')) {
      continue;
    }

    const [videoId, start, end, labels] = splitCsvLine(line);
    const startSeconds = parseSeconds(start ?? '');
    const endSeconds = parseSeconds(end ?? '');

    if (!videoId || Number.isNaN(startSeconds) || Number.isNaN(endSeconds) || labels === undefined) {
      throw new MetadataError(`Malformed segment row: ${line}`);
    }

    const labelCodes = splitLabelCodes(labels);
    if (filter && !labelCodes.some(code => filter.has(code))) {
      continue;
    }

    if (endSeconds <= startSeconds) {
      console.warn(`⚠ Segment ${videoId} ends before it starts (${startSeconds}-${endSeconds})`);
    }

    records.push({ videoId, startSeconds, endSeconds, labelCodes });
  }

  return records;
}

export class SegmentCatalog {
  constructor(
    private readonly source: MetadataSource,
    private readonly classMap: ClassMap
  ) {}

  /**
   * Loads the records of `split` whose labels intersect `labels`.
   * Label names are resolved before the table is read, so an unknown name
   * fails without touching the network.
   */
  async load(split: DownloadType, labels: string[] | 'all'): Promise<SegmentRecord[]> {
    const filter = this.classMap.resolve(labels);
    const content = await this.source.read(segmentsTablePath(split));
    return parseSegments(content, filter);
  }
}
