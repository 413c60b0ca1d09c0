import PQueue from 'p-queue';
import { ConfigurationError, FetchFailure, IOFailure, errorMessage } from '../errors';
import { DownloadResult, DownloadTask } from '../types';

export type TaskWorker = (task: DownloadTask) => Promise<DownloadResult>;

export type ProgressCallback = (done: number, total: number, result: DownloadResult) => void;

export interface JobDispatcherOptions {
  nJobs: number;
  onProgress?: ProgressCallback;
}

/**
 * Runs every task through `worker` on a pool of at most `nJobs` concurrent
 * workers. Tasks are handed out in list order; completion order is not
 * guaranteed. Results are returned in task order once all tasks are done.
 */
export class JobDispatcher {
  private readonly nJobs: number;
  private readonly onProgress?: ProgressCallback;

  constructor(options: JobDispatcherOptions) {
    if (!Number.isInteger(options.nJobs) || options.nJobs < 1) {
      throw new ConfigurationError(`n_jobs must be a positive integer (got ${options.nJobs})`);
    }
    this.nJobs = options.nJobs;
    this.onProgress = options.onProgress;
  }

  get concurrency(): number {
    return this.nJobs;
  }

  async run(tasks: readonly DownloadTask[], worker: TaskWorker): Promise<DownloadResult[]> {
    const queue = new PQueue({ concurrency: this.nJobs });
    let done = 0;
    const ioFailures: IOFailure[] = [];

    const settle = async (task: DownloadTask): Promise<DownloadResult> => {
      let result: DownloadResult;
      try {
        result = await worker(task);
      } catch (error) {
        if (error instanceof IOFailure) {
          ioFailures.push(error);
        }
        result = {
          task,
          status: 'fetch_failed',
          error: new FetchFailure(task.record.videoId, errorMessage(error), { cause: error })
        };
      }
      done++;
      this.onProgress?.(done, tasks.length, result);
      return result;
    };

    const results = await Promise.all(tasks.map(task => queue.add(() => settle(task))));

    const [firstIoFailure] = ioFailures;
    if (firstIoFailure) {
      throw firstIoFailure;
    }
    return results;
  }
}
