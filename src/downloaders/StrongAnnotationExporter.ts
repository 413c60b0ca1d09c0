import * as path from 'path';
import { ClassMap } from '../catalog/ClassMap';
import { StrongCatalog, StrongClip } from '../catalog/StrongCatalog';
import { ConfigurationError } from '../errors';
import { TsvAppender } from '../export/TsvAppender';
import { extensionForFormat } from '../policy/labelPolicy';
import { DownloadSummary, DownloadTask, StrongDownloadConfig, StrongSplit } from '../types';
import { BaseDownloader, DownloaderDeps } from './BaseDownloader';

export interface StrongExportDeps extends DownloaderDeps {
  classMap?: ClassMap;
}

export interface StrongSplitSummary extends DownloadSummary {
  split: StrongSplit;
  tsvPath: string;
  rowCount: number;
}

export function strongAudioDir(rootPath: string, split: StrongSplit): string {
  return path.join(rootPath, `${split}_audio`);
}

export function strongTsvPath(rootPath: string, split: StrongSplit): string {
  return path.join(rootPath, `${split}_strong.tsv`);
}

/**
 * Downloads the strongly labelled clips of each requested split into
 * `<root>/<split>_audio/` and lists every annotation of every clip that made
 * it to disk in `<root>/<split>_strong.tsv` as `path, mid, display name`.
 * Clips are fetched once; labels are not deduplicated in the TSV.
 */
export class StrongAnnotationExporter extends BaseDownloader<StrongDownloadConfig> {
  private classMap: ClassMap | null;

  constructor(config: StrongDownloadConfig, deps: StrongExportDeps = {}) {
    super(config, deps);
    if (config.downloadSets.length === 0) {
      throw new ConfigurationError('At least one download set (train, eval) is required');
    }
    this.classMap = deps.classMap ?? null;
  }

  getName(): string {
    return 'AudioSet strong';
  }

  buildTasks(split: StrongSplit, clips: readonly StrongClip[]): DownloadTask[] {
    const dir = strongAudioDir(this.config.rootPath, split);
    const ext = extensionForFormat(this.config.format);

    return clips.map(clip => ({
      record: clip.record,
      destinationPath: path.join(dir, `${clip.segmentId}.${ext}`),
      format: this.config.format,
      quality: this.config.quality
    }));
  }

  async download(): Promise<StrongSplitSummary[]> {
    const catalog = new StrongCatalog(this.source);
    if (!this.classMap) {
      this.classMap = await catalog.loadClassMap();
    }
    const classMap = this.classMap;
    // Fails on unknown label names before any split is fetched
    classMap.resolve(this.config.labels);

    await this.ensureRoot();

    const summaries: StrongSplitSummary[] = [];
    for (const split of this.config.downloadSets) {
      summaries.push(await this.downloadSplit(split, catalog, classMap));
    }
    return summaries;
  }

  private async downloadSplit(split: StrongSplit, catalog: StrongCatalog, classMap: ClassMap): Promise<StrongSplitSummary> {
    console.log(`\n${'='.repeat(60)}`);
    console.log(`Strong annotations: ${split}`);
    console.log('='.repeat(60));

    const clips = await catalog.load(split, classMap, this.config.labels);
    const tasks = this.buildTasks(split, clips);
    const clipsByPath = new Map(tasks.map((task, i): [string, StrongClip] => [task.destinationPath, clips[i]]));

    const appender = new TsvAppender(strongTsvPath(this.config.rootPath, split));
    await appender.reset();

    console.log(`Found ${clips.length} clips, ${clips.reduce((n, clip) => n + clip.annotations.length, 0)} annotations`);

    const summary = await this.dispatch(tasks, async task => {
      const result = await this.downloadTask(task);
      const clip = clipsByPath.get(task.destinationPath);

      if (clip && (result.status === 'success' || result.status === 'skipped_existing')) {
        for (const annotation of clip.annotations) {
          await appender.append([task.destinationPath, annotation.machineLabel, annotation.displayLabel]);
        }
      }
      return result;
    });

    await appender.flush();

    return {
      ...summary,
      split,
      tsvPath: appender.filePath,
      rowCount: appender.rowCount
    };
  }
}
