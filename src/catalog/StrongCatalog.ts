import { ConfigurationError, MetadataError } from '../errors';
import { MetadataSource } from '../metadata/MetadataSource';
import { STRONG_SPLITS, SegmentRecord, StrongAnnotation, StrongSplit } from '../types';
import { ClassMap } from './ClassMap';
import { parseSeconds, splitLines, splitTsvLine } from './tables';

export const STRONG_CLIP_SECONDS = 10;

export const STRONG_CLASS_MAP_PATH = 'strong/mid_to_display_name.tsv';

export function strongTablePath(split: StrongSplit): string {
  return `strong/audioset_${split}_strong.tsv`;
}

export function assertStrongSplit(value: string): StrongSplit {
  const match = STRONG_SPLITS.find(split => split === value);
  if (!match) {
    throw new ConfigurationError(
      `Invalid download set "${value}" (expected one of: ${STRONG_SPLITS.join(', ')})`
    );
  }
  return match;
}

/** All annotation rows of one 10 second clip, plus the record used to fetch it. */
export interface StrongClip {
  segmentId: string;
  record: SegmentRecord;
  annotations: StrongAnnotation[];
}

/** Splits `<videoId>_<startMs>`; video ids may themselves contain underscores. */
export function parseSegmentId(segmentId: string): { videoId: string; clipStartSeconds: number } {
  const separator = segmentId.lastIndexOf('_');
  const offset = separator > 0 ? Number(segmentId.slice(separator + 1)) : NaN;

  if (Number.isNaN(offset) || separator === segmentId.length - 1) {
    throw new MetadataError(`Malformed strong segment id: ${segmentId}`);
  }

  return {
    videoId: segmentId.slice(0, separator),
    clipStartSeconds: offset / 1000
  };
}

export function parseStrongAnnotations(
  content: string,
  classMap: ClassMap,
  filter: ReadonlySet<string> | null
): StrongAnnotation[] {
  const annotations: StrongAnnotation[] = [];

  for (const line of splitLines(content)) {
    const [segmentId, onset, offset, machineLabel] = splitTsvLine(line);
    if (segmentId === 'segment_id') {
      continue;
    }

    const onsetSeconds = parseSeconds(onset ?? '');
    const offsetSeconds = parseSeconds(offset ?? '');
    if (!segmentId || !machineLabel || Number.isNaN(onsetSeconds) || Number.isNaN(offsetSeconds)) {
      throw new MetadataError(`Malformed strong annotation row: ${line}`);
    }

    if (filter && !filter.has(machineLabel)) {
      continue;
    }

    if (!classMap.hasCode(machineLabel)) {
      throw new MetadataError(`Strong annotation uses unknown label ${machineLabel}`);
    }

    const { videoId, clipStartSeconds } = parseSegmentId(segmentId);
    annotations.push({
      segmentId,
      videoId,
      clipStartSeconds,
      clipEndSeconds: clipStartSeconds + STRONG_CLIP_SECONDS,
      onsetSeconds,
      offsetSeconds,
      machineLabel,
      displayLabel: classMap.toDisplayName(machineLabel)
    });
  }

  return annotations;
}

/** Groups annotations per clip, in order of first appearance. */
export function groupByClip(annotations: StrongAnnotation[]): StrongClip[] {
  const clips = new Map<string, StrongClip>();

  for (const annotation of annotations) {
    let clip = clips.get(annotation.segmentId);
    if (!clip) {
      clip = {
        segmentId: annotation.segmentId,
        record: {
          videoId: annotation.videoId,
          startSeconds: annotation.clipStartSeconds,
          endSeconds: annotation.clipEndSeconds,
          labelCodes: []
        },
        annotations: []
      };
      clips.set(annotation.segmentId, clip);
    }

    clip.annotations.push(annotation);
    if (!clip.record.labelCodes.includes(annotation.machineLabel)) {
      clip.record.labelCodes.push(annotation.machineLabel);
    }
  }

  return [...clips.values()];
}

export class StrongCatalog {
  constructor(private readonly source: MetadataSource) {}

  async loadClassMap(): Promise<ClassMap> {
    return ClassMap.fromDisplayNameTsv(await this.source.read(STRONG_CLASS_MAP_PATH));
  }

  async load(split: StrongSplit, classMap: ClassMap, labels: string[] | 'all'): Promise<StrongClip[]> {
    const filter = classMap.resolve(labels);
    const content = await this.source.read(strongTablePath(split));
    return groupByClip(parseStrongAnnotations(content, classMap, filter));
  }
}
