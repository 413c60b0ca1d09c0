import * as path from 'path';
import { ClassMap } from '../catalog/ClassMap';
import { DownloadTask, SegmentRecord } from '../types';

/**
 * Decides which label directories a clip is stored under.
 *
 * With `copyAndReplicate` the clip goes to every requested label it carries,
 * fetched once per label. Without it the clip goes only to the first requested
 * label in the record's own label order; its other labels are dropped for
 * storage purposes. The result depends only on the arguments.
 */
export function selectTargetLabels(
  labelCodes: readonly string[],
  requested: ReadonlySet<string> | null,
  copyAndReplicate: boolean
): string[] {
  const selected: string[] = [];

  for (const code of labelCodes) {
    if (requested && !requested.has(code)) {
      continue;
    }
    if (selected.includes(code)) {
      continue;
    }
    selected.push(code);
    if (!copyAndReplicate) {
      break;
    }
  }

  return selected;
}

const FORMAT_EXTENSIONS: Record<string, string> = {
  vorbis: 'ogg',
  mp3: 'mp3',
  m4a: 'm4a',
  wav: 'wav',
  flac: 'flac',
  opus: 'opus',
  aac: 'm4a',
  alac: 'm4a'
};

/** File extension yt-dlp produces when extracting audio in `format`. */
export function extensionForFormat(format: string): string {
  return FORMAT_EXTENSIONS[format.toLowerCase()] ?? format.toLowerCase();
}

export function formatSeconds(seconds: number): string {
  return seconds.toFixed(3);
}

export function clipFileName(record: SegmentRecord, format: string): string {
  return `${record.videoId}_${formatSeconds(record.startSeconds)}_${formatSeconds(record.endSeconds)}.${extensionForFormat(format)}`;
}

/** Directory names cannot carry path separators; display names such as "Wind instrument, woodwind instrument" are kept otherwise. */
export function labelDirectoryName(displayName: string): string {
  return displayName.replace(/[\\/]/g, '_').replace(/[<>:"|?*]/g, '').trim();
}

export interface TaskBuildOptions {
  rootPath: string;
  classMap: ClassMap;
  requested: ReadonlySet<string> | null;
  copyAndReplicate: boolean;
  format: string;
  quality: number;
}

export function buildDownloadTasks(records: readonly SegmentRecord[], options: TaskBuildOptions): DownloadTask[] {
  const tasks: DownloadTask[] = [];

  for (const record of records) {
    const targets = selectTargetLabels(record.labelCodes, options.requested, options.copyAndReplicate);

    for (const code of targets) {
      const targetLabel = options.classMap.labelForCode(code);
      tasks.push({
        record,
        targetLabel,
        destinationPath: path.join(
          options.rootPath,
          labelDirectoryName(targetLabel.displayName),
          clipFileName(record, options.format)
        ),
        format: options.format,
        quality: options.quality
      });
    }
  }

  return tasks;
}
