import * as fs from 'fs';
import * as path from 'path';
import { IOFailure, errorMessage } from '../errors';
import { formatSeconds } from '../policy/labelPolicy';
import { run } from './run';

export interface FetchRequest {
  videoId: string;
  startSeconds: number;
  endSeconds: number;
  format: string;
  quality: number;
  destinationPath: string;
}

export type FetchOutcome = { ok: true } | { ok: false; reason: string };

/**
 * Obtains one trimmed clip. Tool failures (video unavailable, network error,
 * unsupported format) come back as `{ ok: false }`; only filesystem errors throw.
 */
export interface ClipFetcher {
  fetch(request: FetchRequest): Promise<FetchOutcome>;
}

export function youtubeUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

/**
 * yt-dlp picks the final extension itself, so the output template swaps the
 * destination's extension for `%(ext)s` and the final path is printed once
 * post-processing is done.
 */
export function buildYtDlpArgs(request: FetchRequest): string[] {
  const parsed = path.parse(request.destinationPath);
  const template = path.join(parsed.dir, `${parsed.name}.%(ext)s`);

  return [
    '-x',
    '--audio-format', request.format,
    '--audio-quality', String(request.quality),
    '--download-sections', `*${formatSeconds(request.startSeconds)}-${formatSeconds(request.endSeconds)}`,
    '--force-keyframes-at-cuts',
    '--no-playlist',
    '--force-overwrites',
    '--no-progress',
    '--quiet',
    '--no-simulate',
    '--print', 'after_move:filepath',
    '--output', template,
    youtubeUrl(request.videoId)
  ];
}

export class YtDlpClipFetcher implements ClipFetcher {
  constructor(private readonly binary: string = 'yt-dlp') {}

  async fetch(request: FetchRequest): Promise<FetchOutcome> {
    const dir = path.dirname(request.destinationPath);
    try {
      await fs.promises.mkdir(dir, { recursive: true });
    } catch (error) {
      throw new IOFailure(dir, `Could not create ${dir}: ${errorMessage(error)}`, { cause: error });
    }

    let stdout: string;
    try {
      ({ stdout } = await run(this.binary, buildYtDlpArgs(request)));
    } catch (error) {
      await removeLeftovers(request.destinationPath);
      return { ok: false, reason: errorMessage(error) };
    }

    const written = printedPath(stdout);
    if (!written || !fs.existsSync(written)) {
      await removeLeftovers(request.destinationPath);
      return { ok: false, reason: `${this.binary} produced no file for ${request.destinationPath}` };
    }

    if (path.resolve(written) !== path.resolve(request.destinationPath)) {
      try {
        await fs.promises.rename(written, request.destinationPath);
      } catch (error) {
        await removeLeftovers(request.destinationPath);
        throw new IOFailure(written, `Could not move ${written} to ${request.destinationPath}: ${errorMessage(error)}`, { cause: error });
      }
    }

    await removeLeftovers(request.destinationPath, request.destinationPath);
    return { ok: true };
  }
}

/** Last non-empty line of yt-dlp's `--print after_move:filepath` output. */
export function printedPath(stdout: string): string | null {
  const lines = stdout.split(/\r?\n/).map(line => line.trim()).filter(line => line.length > 0);
  return lines[lines.length - 1] ?? null;
}

/**
 * Deletes every `<base>.*` file yt-dlp may have left next to the destination
 * (`.part`, the source container, a differently named output), except `keep`.
 */
export async function removeLeftovers(destinationPath: string, keep?: string): Promise<void> {
  const { dir, name } = path.parse(destinationPath);
  const prefix = `${name}.`;
  const kept = keep === undefined ? null : path.resolve(keep);

  let entries: string[];
  try {
    entries = await fs.promises.readdir(dir);
  } catch (error) {
    throw new IOFailure(dir, `Could not list ${dir}: ${errorMessage(error)}`, { cause: error });
  }

  for (const entry of entries) {
    const filePath = path.join(dir, entry);
    if (!entry.startsWith(prefix) || path.resolve(filePath) === kept) {
      continue;
    }
    try {
      await fs.promises.rm(filePath, { force: true, recursive: true });
    } catch (error) {
      throw new IOFailure(filePath, `Could not delete ${filePath}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
