import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { ClassMap } from '../catalog/ClassMap';
import {
  StrongCatalog,
  assertStrongSplit,
  groupByClip,
  parseSegmentId,
  parseStrongAnnotations
} from '../catalog/StrongCatalog';
import { ConfigurationError, MetadataError } from '../errors';
import { makeTempDir, offlineSource, writeFile } from './helpers';

const strongTsv = [
  'segment_id\tstart_time_seconds\tend_time_seconds\tlabel',
  'YxlGt805lTA_30000\t0.000\t2.140\t/m/0284vy3',
  'YxlGt805lTA_30000\t2.140\t10.000\t/m/07qfr4h',
  'a_b_c_90000\t1.000\t3.500\t/m/0284vy3',
  ''
].join('\n');

const classMap = ClassMap.fromDisplayNameTsv('/m/0284vy3\tTrain horn\n/m/07qfr4h\tSpeech\n');

describe('parseSegmentId', () => {
  it('splits off the clip offset in milliseconds', () => {
    expect(parseSegmentId('YxlGt805lTA_30000')).toEqual({ videoId: 'YxlGt805lTA', clipStartSeconds: 30 });
    expect(parseSegmentId('a_b_c_90000')).toEqual({ videoId: 'a_b_c', clipStartSeconds: 90 });
  });

  it('rejects ids without an offset', () => {
    expect(() => parseSegmentId('noseparator')).toThrow(MetadataError);
    expect(() => parseSegmentId('abc_')).toThrow(MetadataError);
    expect(() => parseSegmentId('abc_x1')).toThrow(MetadataError);
  });
});

describe('parseStrongAnnotations', () => {
  it('reads every row with display labels', () => {
    const annotations = parseStrongAnnotations(strongTsv, classMap, null);

    expect(annotations).toHaveLength(3);
    expect(annotations[1]).toEqual({
      segmentId: 'YxlGt805lTA_30000',
      videoId: 'YxlGt805lTA',
      clipStartSeconds: 30,
      clipEndSeconds: 40,
      onsetSeconds: 2.14,
      offsetSeconds: 10,
      machineLabel: '/m/07qfr4h',
      displayLabel: 'Speech'
    });
  });

  it('filters rows by label code', () => {
    const annotations = parseStrongAnnotations(strongTsv, classMap, new Set(['/m/07qfr4h']));

    expect(annotations.map(annotation => annotation.segmentId)).toEqual(['YxlGt805lTA_30000']);
  });

  it('rejects labels missing from the class map', () => {
    expect(() => parseStrongAnnotations('x_0\t0\t1\t/m/unknown', classMap, null)).toThrow(MetadataError);
  });
});

describe('groupByClip', () => {
  it('groups annotations per clip in order of appearance', () => {
    const clips = groupByClip(parseStrongAnnotations(strongTsv, classMap, null));

    expect(clips.map(clip => clip.segmentId)).toEqual(['YxlGt805lTA_30000', 'a_b_c_90000']);
    expect(clips[0].annotations).toHaveLength(2);
    expect(clips[0].record).toEqual({
      videoId: 'YxlGt805lTA',
      startSeconds: 30,
      endSeconds: 40,
      labelCodes: ['/m/0284vy3', '/m/07qfr4h']
    });
    expect(clips[1].record.startSeconds).toBe(90);
  });
});

describe('StrongCatalog', () => {
  it('loads the class map and a split from the cache', async () => {
    const cacheDir = makeTempDir();
    writeFile(path.join(cacheDir, 'strong', 'mid_to_display_name.tsv'), '/m/0284vy3\tTrain horn\n/m/07qfr4h\tSpeech\n');
    writeFile(path.join(cacheDir, 'strong', 'audioset_eval_strong.tsv'), strongTsv);
    const catalog = new StrongCatalog(offlineSource(cacheDir));

    const strongMap = await catalog.loadClassMap();
    const clips = await catalog.load('eval', strongMap, ['Train horn']);

    expect(clips.map(clip => clip.annotations.length)).toEqual([1, 1]);
  });

  it('validates split names', () => {
    expect(assertStrongSplit('train')).toBe('train');
    expect(() => assertStrongSplit('balanced_train')).toThrow(ConfigurationError);
  });
});
