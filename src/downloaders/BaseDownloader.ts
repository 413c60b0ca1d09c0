import * as fs from 'fs';
import * as path from 'path';
import { IOFailure, FetchFailure, InvalidDurationFailure, errorMessage } from '../errors';
import { JobDispatcher, TaskWorker } from '../dispatch/JobDispatcher';
import { MetadataSource } from '../metadata/MetadataSource';
import { ClipFetcher, YtDlpClipFetcher } from '../tools/ClipFetcher';
import { DurationProbe, DurationValidator, FfprobeDurationProbe } from '../tools/DurationValidator';
import { DownloadResult, DownloadStats, DownloadSummary, DownloadTask, DownloaderConfig } from '../types';

/** Collaborators a downloader talks to; each defaults to the real tool. */
export interface DownloaderDeps {
  fetcher?: ClipFetcher;
  probe?: DurationProbe;
  source?: MetadataSource;
}

export function summarize(results: readonly DownloadResult[]): DownloadStats {
  const stats: DownloadStats = {
    tasks: results.length,
    downloaded: 0,
    skipped: 0,
    fetchFailed: 0,
    invalidDuration: 0
  };

  for (const result of results) {
    switch (result.status) {
      case 'success':
        stats.downloaded++;
        break;
      case 'skipped_existing':
        stats.skipped++;
        break;
      case 'fetch_failed':
        stats.fetchFailed++;
        break;
      case 'invalid_duration':
        stats.invalidDuration++;
        break;
    }
  }

  return stats;
}

export abstract class BaseDownloader<C extends DownloaderConfig = DownloaderConfig> {
  protected readonly config: C;
  protected readonly fetcher: ClipFetcher;
  protected readonly validator: DurationValidator;
  protected readonly source: MetadataSource;
  protected readonly dispatcher: JobDispatcher;

  constructor(config: C, deps: DownloaderDeps = {}) {
    this.config = config;
    this.fetcher = deps.fetcher ?? new YtDlpClipFetcher(config.ytDlpPath);
    this.validator = new DurationValidator(deps.probe ?? new FfprobeDurationProbe(config.ffprobePath));
    this.source = deps.source ?? new MetadataSource({
      baseUrl: config.metadataUrl,
      cacheDir: config.metadataDir,
      quiet: config.quiet
    });
    this.dispatcher = new JobDispatcher({
      nJobs: config.nJobs,
      onProgress: (done, total, result) => this.reportProgress(done, total, result)
    });
  }

  abstract getName(): string;

  /**
   * Fetch, then validate, one task. An existing valid file is kept as is when
   * `skipExisting` is set; an existing invalid one is deleted and fetched again.
   */
  async downloadTask(task: DownloadTask): Promise<DownloadResult> {
    const { record, destinationPath } = task;

    if (this.config.skipExisting && fs.existsSync(destinationPath)) {
      const existing = await this.validator.validate(destinationPath);
      if (existing.valid) {
        return { task, status: 'skipped_existing' };
      }
    }

    const outcome = await this.fetcher.fetch({
      videoId: record.videoId,
      startSeconds: record.startSeconds,
      endSeconds: record.endSeconds,
      format: task.format,
      quality: task.quality,
      destinationPath
    });

    if (!outcome.ok) {
      return {
        task,
        status: 'fetch_failed',
        error: new FetchFailure(record.videoId, outcome.reason)
      };
    }

    const validation = await this.validator.validate(destinationPath);
    if (!validation.valid) {
      return {
        task,
        status: 'invalid_duration',
        error: new InvalidDurationFailure(destinationPath, validation.durationSeconds)
      };
    }

    return { task, status: 'success' };
  }

  protected async ensureRoot(): Promise<void> {
    try {
      await fs.promises.mkdir(this.config.rootPath, { recursive: true });
    } catch (error) {
      throw new IOFailure(this.config.rootPath, `Could not create ${this.config.rootPath}: ${errorMessage(error)}`, { cause: error });
    }
  }

  protected async dispatch(
    tasks: readonly DownloadTask[],
    worker: TaskWorker = task => this.downloadTask(task)
  ): Promise<DownloadSummary> {
    this.log(`\nStarting downloads (max ${this.dispatcher.concurrency} concurrent)...`);
    const results = await this.dispatcher.run(tasks, worker);
    return { stats: summarize(results), results };
  }

  protected log(message: string): void {
    if (!this.config.quiet) {
      console.log(message);
    }
  }

  private reportProgress(done: number, total: number, result: DownloadResult): void {
    const name = path.relative(this.config.rootPath, result.task.destinationPath);
    const prefix = `[${done}/${total}]`;

    switch (result.status) {
      case 'success':
        this.log(`${prefix} ✓ Downloaded: ${name}`);
        break;
      case 'skipped_existing':
        this.log(`${prefix} Skipping (already exists): ${name}`);
        break;
      default:
        if (!this.config.quiet) {
          console.error(`${prefix} ✗ Failed: ${name} - ${result.error?.message ?? result.status}`);
        }
    }
  }

  printStats(stats: DownloadStats): void {
    console.log('\n' + '='.repeat(50));
    console.log(`${this.getName()} Statistics:`);
    console.log('='.repeat(50));
    console.log(`Tasks:             ${stats.tasks}`);
    console.log(`Downloaded:        ${stats.downloaded}`);
    console.log(`Skipped:           ${stats.skipped}`);
    console.log(`Fetch failed:      ${stats.fetchFailed}`);
    console.log(`Invalid duration:  ${stats.invalidDuration}`);
    console.log('='.repeat(50) + '\n');
  }
}
