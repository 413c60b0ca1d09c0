import * as fs from 'fs';
import { IOFailure, errorMessage } from '../errors';
import { run } from './run';

export interface DurationProbe {
  /** Duration of the media file in seconds; rejects when the file cannot be probed. */
  probe(filePath: string): Promise<number>;
}

export function parseProbeOutput(stdout: string): number {
  const value = stdout.trim().split(/\r?\n/)[0] ?? '';
  return value === '' || value === 'N/A' ? NaN : Number(value);
}

export class FfprobeDurationProbe implements DurationProbe {
  constructor(private readonly binary: string = 'ffprobe') {}

  async probe(filePath: string): Promise<number> {
    const { stdout } = await run(this.binary, [
      '-v', 'error',
      '-show_entries', 'format=duration',
      '-of', 'default=noprint_wrappers=1:nokey=1',
      filePath
    ]);
    return parseProbeOutput(stdout);
  }
}

export interface ValidationResult {
  valid: boolean;
  durationSeconds: number | null;
  reason?: string;
}

/** Keeps files with a positive duration; deletes the file on probe failure, NaN, zero or negative. */
export class DurationValidator {
  constructor(private readonly probe: DurationProbe) {}

  async validate(filePath: string): Promise<ValidationResult> {
    let duration: number;
    try {
      duration = await this.probe.probe(filePath);
    } catch (error) {
      await this.remove(filePath);
      return { valid: false, durationSeconds: null, reason: errorMessage(error) };
    }

    if (Number.isFinite(duration) && duration > 0) {
      return { valid: true, durationSeconds: duration };
    }

    await this.remove(filePath);
    return {
      valid: false,
      durationSeconds: Number.isNaN(duration) ? null : duration,
      reason: `duration ${Number.isNaN(duration) ? 'unreadable' : duration}`
    };
  }

  private async remove(filePath: string): Promise<void> {
    try {
      await fs.promises.rm(filePath, { force: true });
    } catch (error) {
      throw new IOFailure(filePath, `Could not delete ${filePath}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
