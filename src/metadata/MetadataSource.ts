import axios, { AxiosInstance } from 'axios';
import * as fs from 'fs';
import * as path from 'path';
import { MetadataError, errorMessage } from '../errors';

export const DEFAULT_METADATA_URL = 'http://storage.googleapis.com/us_audioset/youtube_corpus';

export interface MetadataSourceOptions {
  baseUrl: string;
  cacheDir: string;
  client?: AxiosInstance;
  quiet?: boolean;
}

/**
 * Resolves AudioSet metadata tables by their path relative to the corpus root
 * (e.g. `v1/csv/eval_segments.csv`). A table present in the cache directory is
 * read from disk; otherwise it is downloaded once and stored there.
 */
export class MetadataSource {
  private readonly baseUrl: string;
  private readonly cacheDir: string;
  private readonly client: AxiosInstance;
  private readonly quiet: boolean;

  constructor(options: MetadataSourceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.cacheDir = options.cacheDir;
    this.quiet = options.quiet ?? false;
    this.client = options.client ?? axios.create({
      timeout: 300000,
      headers: {
        'User-Agent': 'AudioSetDownloader/1.0'
      }
    });
  }

  cachePath(relativePath: string): string {
    return path.join(this.cacheDir, ...relativePath.split('/'));
  }

  async read(relativePath: string): Promise<string> {
    const cached = this.cachePath(relativePath);

    if (fs.existsSync(cached)) {
      return fs.promises.readFile(cached, 'utf8');
    }

    const url = `${this.baseUrl}/${relativePath}`;
    if (!this.quiet) {
      console.log(`Fetching metadata: ${url}`);
    }

    let content: string;
    try {
      const response = await this.client.get<string>(url, { responseType: 'text' });
      content = response.data;
    } catch (error) {
      throw new MetadataError(`Failed to download ${url}: ${errorMessage(error)}`, { cause: error });
    }

    // Write then rename: a table in the cache is always complete
    const partial = `${cached}.${process.pid}.tmp`;
    try {
      await fs.promises.mkdir(path.dirname(cached), { recursive: true });
      await fs.promises.writeFile(partial, content, 'utf8');
      await fs.promises.rename(partial, cached);
    } catch (error) {
      await fs.promises.rm(partial, { force: true });
      console.warn(`⚠ Could not cache ${relativePath}: ${errorMessage(error)}`);
    }

    return content;
  }
}
