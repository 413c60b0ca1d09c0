import * as fs from 'fs';
import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { extensionForFormat } from '../policy/labelPolicy';
import {
  FetchRequest,
  YtDlpClipFetcher,
  buildYtDlpArgs,
  printedPath,
  youtubeUrl
} from '../tools/ClipFetcher';
import { FAILING_YT_DLP, FAKE_YT_DLP, makeTempDir, writeFile, writeScript } from './helpers';

const request: FetchRequest = {
  videoId: '-0RWZT-miFs',
  startSeconds: 420,
  endSeconds: 430,
  format: 'vorbis',
  quality: 5,
  destinationPath: path.join('/data', 'Car', '-0RWZT-miFs_420.000_430.000.ogg')
};

function clipRequest(root: string, format: string): FetchRequest {
  return {
    ...request,
    videoId: 'vid',
    startSeconds: 0,
    endSeconds: 10,
    format,
    destinationPath: path.join(root, 'Dog', `vid_0.000_10.000.${extensionForFormat(format)}`)
  };
}

describe('buildYtDlpArgs', () => {
  it('requests only the segment, extracted to the target format', () => {
    expect(buildYtDlpArgs(request)).toEqual([
      '-x',
      '--audio-format', 'vorbis',
      '--audio-quality', '5',
      '--download-sections', '*420.000-430.000',
      '--force-keyframes-at-cuts',
      '--no-playlist',
      '--force-overwrites',
      '--no-progress',
      '--quiet',
      '--no-simulate',
      '--print', 'after_move:filepath',
      '--output', path.join('/data', 'Car', '-0RWZT-miFs_420.000_430.000.%(ext)s'),
      'https://www.youtube.com/watch?v=-0RWZT-miFs'
    ]);
  });

  it('builds watch URLs', () => {
    expect(youtubeUrl('abc')).toBe('https://www.youtube.com/watch?v=abc');
  });

  it('reads the last printed path', () => {
    expect(printedPath('[info] something\n/data/Dog/vid.m4a\n\n')).toBe('/data/Dog/vid.m4a');
    expect(printedPath('')).toBeNull();
  });
});

describe('YtDlpClipFetcher', () => {
  it('reports a missing executable as a failed fetch', async () => {
    const root = makeTempDir();
    const fetcher = new YtDlpClipFetcher(path.join(root, 'no-such-yt-dlp'));
    const destinationPath = path.join(root, 'Car', 'clip.ogg');

    const outcome = await fetcher.fetch({ ...request, destinationPath });

    expect(outcome.ok).toBe(false);
    expect(fs.existsSync(path.join(root, 'Car'))).toBe(true);
    expect(fs.existsSync(destinationPath)).toBe(false);
  });

  it('stores aac output, which yt-dlp names .m4a, at the destination', async () => {
    const root = makeTempDir();
    const fetcher = new YtDlpClipFetcher(writeScript(root, 'yt-dlp', FAKE_YT_DLP));
    const clip = clipRequest(root, 'aac');

    const outcome = await fetcher.fetch(clip);

    expect(outcome).toEqual({ ok: true });
    expect(fs.readdirSync(path.join(root, 'Dog'))).toEqual(['vid_0.000_10.000.m4a']);
    expect(clip.destinationPath).toBe(path.join(root, 'Dog', 'vid_0.000_10.000.m4a'));
  });

  it('moves output whose extension depends on the source to the destination', async () => {
    const root = makeTempDir();
    const fetcher = new YtDlpClipFetcher(writeScript(root, 'yt-dlp', FAKE_YT_DLP));
    const clip = clipRequest(root, 'best');

    const outcome = await fetcher.fetch(clip);

    expect(outcome).toEqual({ ok: true });
    expect(fs.readdirSync(path.join(root, 'Dog'))).toEqual(['vid_0.000_10.000.best']);
    expect(fs.readFileSync(clip.destinationPath, 'utf8')).toBe('audio');
  });

  it('removes everything a failed run left behind', async () => {
    const root = makeTempDir();
    const fetcher = new YtDlpClipFetcher(writeScript(root, 'yt-dlp', FAILING_YT_DLP));
    const clip = clipRequest(root, 'vorbis');
    const neighbour = path.join(root, 'Dog', 'other_0.000_10.000.ogg');
    writeFile(neighbour, 'kept');

    const outcome = await fetcher.fetch(clip);

    expect(outcome.ok).toBe(false);
    expect(outcome.ok ? '' : outcome.reason).toContain('audio conversion failed');
    expect(fs.readdirSync(path.join(root, 'Dog'))).toEqual(['other_0.000_10.000.ogg']);
  });

  it('fails and cleans up when the tool prints no path', async () => {
    const root = makeTempDir();
    const script = writeScript(root, 'yt-dlp', 'printf x > "$(dirname "$0")/Dog/vid_0.000_10.000.webm"');
    const fetcher = new YtDlpClipFetcher(script);

    const outcome = await fetcher.fetch(clipRequest(root, 'vorbis'));

    expect(outcome.ok).toBe(false);
    expect(fs.readdirSync(path.join(root, 'Dog'))).toEqual([]);
  });
});
