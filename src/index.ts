#!/usr/bin/env node

import { Command } from 'commander';
import * as dotenv from 'dotenv';
import {
  DownloadOptions,
  StrongOptions,
  buildSegmentConfig,
  buildStrongConfig
} from './config';
import { SegmentDownloader } from './downloaders/SegmentDownloader';
import { StrongAnnotationExporter } from './downloaders/StrongAnnotationExporter';
import { errorMessage } from './errors';

// Load environment variables
dotenv.config();

const env = process.env;

function addCommonOptions(command: Command): Command {
  return command
    .option('-o, --root <dir>', 'Dataset root directory', env.AUDIOSET_ROOT || './audioset')
    .option('-l, --labels <names...>', 'Label display names to download (default: all)')
    .option('-j, --jobs <number>', 'Number of parallel downloads', env.AUDIOSET_N_JOBS || '1')
    .option('-f, --format <format>', 'Audio format passed to yt-dlp (vorbis, mp3, m4a, wav, ...)', env.AUDIOSET_FORMAT || 'vorbis')
    .option('-q, --quality <number>', 'Audio quality, 0 (best) to 10 (worst)', env.AUDIOSET_QUALITY || '5')
    .option('--no-skip-existing', 'Fetch again even when a valid file is already present')
    .option('--quiet', 'Only print summaries')
    .option('--metadata-url <url>', 'Base URL of the AudioSet metadata tables')
    .option('--metadata-dir <dir>', 'Cache directory for metadata tables (default: <root>/metadata)')
    .option('--yt-dlp <path>', 'yt-dlp executable', env.YT_DLP_PATH || 'yt-dlp')
    .option('--ffprobe <path>', 'ffprobe executable', env.FFPROBE_PATH || 'ffprobe');
}

function printBanner(title: string, lines: string[]): void {
  console.log('='.repeat(60));
  console.log(title);
  console.log('='.repeat(60));
  for (const line of lines) {
    console.log(line);
  }
  console.log('='.repeat(60));
}

async function runDownload(options: DownloadOptions): Promise<void> {
  const config = buildSegmentConfig(options, env);

  printBanner('AudioSet Downloader', [
    `Split: ${config.downloadType}`,
    `Output: ${config.rootPath}`,
    `Labels: ${config.labels === 'all' ? 'all' : config.labels.join('; ')}`,
    `Copy and replicate: ${config.copyAndReplicate ? 'yes' : 'no'}`,
    `Format: ${config.format} (quality ${config.quality})`,
    `Parallel jobs: ${config.nJobs}`
  ]);

  const downloader = new SegmentDownloader(config);
  const summary = await downloader.download();
  downloader.printStats(summary.stats);

  console.log(`Check your files in: ${config.rootPath}\n`);
}

async function runStrong(options: StrongOptions): Promise<void> {
  const config = buildStrongConfig(options, env);

  printBanner('AudioSet Strong Annotation Downloader', [
    `Sets: ${config.downloadSets.join(', ')}`,
    `Output: ${config.rootPath}`,
    `Labels: ${config.labels === 'all' ? 'all' : config.labels.join('; ')}`,
    `Format: ${config.format} (quality ${config.quality})`,
    `Parallel jobs: ${config.nJobs}`
  ]);

  const exporter = new StrongAnnotationExporter(config);
  const summaries = await exporter.download();

  for (const summary of summaries) {
    exporter.printStats(summary.stats);
    console.log(`${summary.rowCount} annotation rows written to ${summary.tsvPath}\n`);
  }
}

const program = new Command();

program
  .name('audioset-download')
  .description('Download AudioSet clips from YouTube, trimmed to their labelled segments')
  .version('1.0.0');

addCommonOptions(
  program
    .command('download', { isDefault: true })
    .description('Download a weakly labelled split into one directory per label')
    .option('-t, --type <split>', 'balanced_train | unbalanced_train | eval', env.AUDIOSET_DOWNLOAD_TYPE || 'unbalanced_train')
    .option('--no-replicate', 'Store each clip only under its first requested label')
).action((options: DownloadOptions) => runDownload(options));

addCommonOptions(
  program
    .command('strong')
    .description('Download the strongly labelled splits and write <split>_strong.tsv files')
    .option('-s, --sets <sets...>', 'Splits to download: train, eval (default: both)')
).action((options: StrongOptions) => runStrong(options));

program.parseAsync().catch((error: unknown) => {
  console.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(1);
});
