import type { FetchFailure, InvalidDurationFailure } from './errors';

export type DownloadType = 'balanced_train' | 'unbalanced_train' | 'eval';

export type StrongSplit = 'train' | 'eval';

export const DOWNLOAD_TYPES: readonly DownloadType[] = ['balanced_train', 'unbalanced_train', 'eval'];

export const STRONG_SPLITS: readonly StrongSplit[] = ['train', 'eval'];

export interface Label {
  displayName: string;
  machineCode: string;
}

export interface SegmentRecord {
  videoId: string;
  startSeconds: number;
  endSeconds: number;
  labelCodes: string[];
}

export interface StrongAnnotation {
  segmentId: string;
  videoId: string;
  clipStartSeconds: number;
  clipEndSeconds: number;
  onsetSeconds: number;
  offsetSeconds: number;
  machineLabel: string;
  displayLabel: string;
}

export interface DownloadTask {
  record: SegmentRecord;
  // Absent for strong-annotation clips, which are stored per split rather than per label
  targetLabel?: Label;
  destinationPath: string;
  format: string;
  quality: number;
}

export type DownloadStatus = 'success' | 'fetch_failed' | 'invalid_duration' | 'skipped_existing';

export interface DownloadResult {
  task: DownloadTask;
  status: DownloadStatus;
  error?: FetchFailure | InvalidDurationFailure;
}

export interface DownloadStats {
  tasks: number;
  downloaded: number;
  skipped: number;
  fetchFailed: number;
  invalidDuration: number;
}

export interface DownloadSummary {
  stats: DownloadStats;
  results: DownloadResult[];
}

export interface DownloaderConfig {
  rootPath: string;
  labels: string[] | 'all';
  nJobs: number;
  format: string;
  quality: number;
  skipExisting: boolean;
  quiet: boolean;
  metadataUrl: string;
  metadataDir: string;
  ytDlpPath: string;
  ffprobePath: string;
}

export interface SegmentDownloadConfig extends DownloaderConfig {
  downloadType: DownloadType;
  copyAndReplicate: boolean;
}

export interface StrongDownloadConfig extends DownloaderConfig {
  downloadSets: StrongSplit[];
}
