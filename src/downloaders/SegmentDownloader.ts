import { ClassMap } from '../catalog/ClassMap';
import { SegmentCatalog } from '../catalog/SegmentCatalog';
import { buildDownloadTasks } from '../policy/labelPolicy';
import { DownloadSummary, SegmentDownloadConfig } from '../types';
import { BaseDownloader, DownloaderDeps } from './BaseDownloader';

export const CLASS_MAP_PATH = 'v1/csv/class_labels_indices.csv';

export interface SegmentDownloaderDeps extends DownloaderDeps {
  classMap?: ClassMap;
}

/**
 * Downloads the weakly labelled clips of one split into
 * `<root>/<label display name>/`, one directory per label.
 */
export class SegmentDownloader extends BaseDownloader<SegmentDownloadConfig> {
  private classMap: ClassMap | null;

  constructor(config: SegmentDownloadConfig, deps: SegmentDownloaderDeps = {}) {
    super(config, deps);
    this.classMap = deps.classMap ?? null;
  }

  getName(): string {
    return `AudioSet ${this.config.downloadType}`;
  }

  async loadClassMap(): Promise<ClassMap> {
    if (!this.classMap) {
      this.classMap = ClassMap.fromIndicesCsv(await this.source.read(CLASS_MAP_PATH));
    }
    return this.classMap;
  }

  async download(): Promise<DownloadSummary> {
    const { rootPath, labels, downloadType, copyAndReplicate, format, quality } = this.config;

    const classMap = await this.loadClassMap();
    // Resolved up front: an unknown label name aborts before anything is fetched
    const requested = classMap.resolve(labels);

    await this.ensureRoot();

    const catalog = new SegmentCatalog(this.source, classMap);
    const records = await catalog.load(downloadType, labels);
    const tasks = buildDownloadTasks(records, {
      rootPath,
      classMap,
      requested,
      copyAndReplicate,
      format,
      quality
    });

    console.log(`Found ${records.length} segments, ${tasks.length} files to download`);

    return this.dispatch(tasks);
  }
}
