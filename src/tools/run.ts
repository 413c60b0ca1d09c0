import { spawn } from 'child_process';
import { DownloaderError } from '../errors';

export interface RunResult {
  stdout: string;
  stderr: string;
}

export class CommandError extends DownloaderError {
  constructor(
    readonly command: string,
    readonly exitCode: number | null,
    readonly stderr: string
  ) {
    super(`${command} exited with code ${exitCode}${stderr ? `: ${lastLine(stderr)}` : ''}`);
  }
}

function lastLine(text: string): string {
  const lines = text.trim().split(/\r?\n/);
  return lines[lines.length - 1] ?? '';
}

/** Spawn a command and collect its output; resolve on exit code 0, reject otherwise. */
export function run(command: string, args: string[]): Promise<RunResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe']
    });

    let stdout = '';
    let stderr = '';
    child.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on('error', reject);
    child.on('close', (code) => {
      if (code === 0) {
        resolve({ stdout, stderr });
      } else {
        reject(new CommandError(command, code, stderr));
      }
    });
  });
}
