import axios from 'axios';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { MetadataSource } from '../metadata/MetadataSource';
import { ClipFetcher, FetchOutcome, FetchRequest } from '../tools/ClipFetcher';
import { DurationProbe } from '../tools/DurationValidator';
import { DownloaderConfig } from '../types';

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'audioset-test-'));
}

export function writeFile(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, 'utf8');
}

/** Relative paths of all files under `root`, sorted, skipping the metadata cache. */
export function listFiles(root: string, skip: string[] = ['metadata']): string[] {
  const found: string[] = [];

  const walk = (dir: string) => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (dir === root && skip.includes(entry.name)) {
          continue;
        }
        walk(full);
      } else {
        found.push(path.relative(root, full));
      }
    }
  };

  walk(root);
  return found.sort();
}

/** A metadata source that never reaches the network; tables must be in the cache. */
export function offlineSource(cacheDir: string): MetadataSource {
  return new MetadataSource({
    baseUrl: 'http://metadata.test',
    cacheDir,
    quiet: true,
    client: axios.create({
      adapter: () => Promise.reject(new Error('offline'))
    })
  });
}

export class FakeFetcher implements ClipFetcher {
  readonly calls: FetchRequest[] = [];

  constructor(private readonly failing: string[] = []) {}

  async fetch(request: FetchRequest): Promise<FetchOutcome> {
    this.calls.push(request);
    await new Promise(resolve => setTimeout(resolve, 1));

    if (this.failing.includes(request.videoId)) {
      return { ok: false, reason: 'Video unavailable' };
    }
    writeFile(request.destinationPath, `clip:${request.videoId}`);
    return { ok: true };
  }
}

/** Reports 0 seconds for files whose name starts with one of `broken`, 10 otherwise. */
export class FakeProbe implements DurationProbe {
  readonly probed: string[] = [];

  constructor(private readonly broken: string[] = []) {}

  async probe(filePath: string): Promise<number> {
    this.probed.push(filePath);
    const name = path.basename(filePath);
    return this.broken.some(prefix => name.startsWith(prefix)) ? 0 : 10;
  }
}

export function baseConfig(root: string): DownloaderConfig {
  return {
    rootPath: root,
    labels: 'all',
    nJobs: 2,
    format: 'vorbis',
    quality: 5,
    skipExisting: true,
    quiet: true,
    metadataUrl: 'http://metadata.test',
    metadataDir: path.join(root, 'metadata'),
    ytDlpPath: 'yt-dlp',
    ffprobePath: 'ffprobe'
  };
}

/** Writes an executable shell script standing in for an external tool. */
export function writeScript(dir: string, name: string, body: string): string {
  const scriptPath = path.join(dir, name);
  fs.writeFileSync(scriptPath, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
  return scriptPath;
}

/**
 * Mimics yt-dlp: reads --audio-format and --output, writes the file under the
 * extension yt-dlp would pick and prints its path.
 */
export const FAKE_YT_DLP = `
fmt=""
tpl=""
while [ $# -gt 0 ]; do
  case "$1" in
    --audio-format) fmt="$2"; shift ;;
    --output) tpl="$2"; shift ;;
  esac
  shift
done
case "$fmt" in
  aac|alac) ext=m4a ;;
  best) ext=opus ;;
  vorbis) ext=ogg ;;
  *) ext="$fmt" ;;
esac
out="\${tpl%'%(ext)s'}$ext"
printf 'audio' > "$out"
echo "$out"
`;

/** Mimics yt-dlp failing after the download: leaves the source and a partial file, exits 1. */
export const FAILING_YT_DLP = `
tpl=""
while [ $# -gt 0 ]; do
  case "$1" in
    --output) tpl="$2"; shift ;;
  esac
  shift
done
base="\${tpl%'%(ext)s'}"
printf 'video' > "\${base}webm"
printf 'part' > "\${base}m4a.part"
echo "ERROR: Postprocessing: audio conversion failed" >&2
exit 1
`;
