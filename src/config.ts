import * as path from 'path';
import { assertDownloadType } from './catalog/SegmentCatalog';
import { assertStrongSplit } from './catalog/StrongCatalog';
import { ConfigurationError } from './errors';
import { DEFAULT_METADATA_URL } from './metadata/MetadataSource';
import { DownloaderConfig, SegmentDownloadConfig, StrongDownloadConfig } from './types';

/** Raw option values as commander hands them over (strings from flags or env). */
export interface CommonOptions {
  root: string;
  labels?: string[];
  jobs: string;
  format: string;
  quality: string;
  skipExisting: boolean;
  quiet?: boolean;
  metadataUrl?: string;
  metadataDir?: string;
  ytDlp: string;
  ffprobe: string;
}

export interface DownloadOptions extends CommonOptions {
  type: string;
  replicate: boolean;
}

export interface StrongOptions extends CommonOptions {
  sets?: string[];
}

export type Env = Record<string, string | undefined>;

export function parseInteger(value: string, name: string, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed) || parsed < min || parsed > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `${min}-${max}`;
    throw new ConfigurationError(`${name} must be an integer ${range} (got "${value}")`);
  }
  return parsed;
}

/** No labels, or the single word "all", means the whole ontology. */
export function parseLabels(labels: string[] | undefined, env: Env = process.env): string[] | 'all' {
  const values = labels && labels.length > 0
    ? labels
    : (env.AUDIOSET_LABELS ?? '').split(';');

  const names = values.map(label => label.trim()).filter(label => label.length > 0);
  if (names.length === 0 || (names.length === 1 && names[0].toLowerCase() === 'all')) {
    return 'all';
  }
  return names;
}

export function buildCommonConfig(options: CommonOptions, env: Env = process.env): DownloaderConfig {
  const format = options.format.trim();
  if (!format) {
    throw new ConfigurationError('format must not be empty');
  }

  const rootPath = path.resolve(options.root);

  return {
    rootPath,
    labels: parseLabels(options.labels, env),
    nJobs: parseInteger(options.jobs, 'n_jobs', 1),
    format,
    quality: parseInteger(options.quality, 'quality', 0, 10),
    skipExisting: options.skipExisting,
    quiet: options.quiet ?? false,
    metadataUrl: options.metadataUrl || env.AUDIOSET_METADATA_URL || DEFAULT_METADATA_URL,
    metadataDir: path.resolve(options.metadataDir || env.AUDIOSET_METADATA_DIR || path.join(rootPath, 'metadata')),
    ytDlpPath: options.ytDlp,
    ffprobePath: options.ffprobe
  };
}

export function buildSegmentConfig(options: DownloadOptions, env: Env = process.env): SegmentDownloadConfig {
  return {
    ...buildCommonConfig(options, env),
    downloadType: assertDownloadType(options.type),
    copyAndReplicate: options.replicate
  };
}

export function buildStrongConfig(options: StrongOptions, env: Env = process.env): StrongDownloadConfig {
  const sets = options.sets && options.sets.length > 0 ? options.sets : ['train', 'eval'];
  const downloadSets = [...new Set(sets.map(assertStrongSplit))];

  return {
    ...buildCommonConfig(options, env),
    downloadSets
  };
}
