import { inject, singleton } from 'tsyringe';
import DecodeError from '../minecraft/errors/DecodeError.js';
import type { ErrorLog } from '../util/ErrorLog.js';
import type { BatchEntry, BatchSource } from './batch/BatchSource.js';
import BatchSourceReader from './batch/BatchSourceReader.js';
import type { RenderOptions } from './PlayerEntry.js';
import PlayerHeadWriter from './PlayerHeadWriter.js';

export type BatchResult = {
  succeeded: number;
  failed: number;
};

@singleton()
export default class BatchRunner {
  constructor(
    private readonly batchSourceReader: BatchSourceReader,
    private readonly playerHeadWriter: PlayerHeadWriter,
    @inject('ErrorLog') private readonly errorLog: ErrorLog
  ) {
  }

  /**
   * Players are processed strictly one after another, a failing player does not stop the batch.
   * Once `signal` is aborted, the player currently being processed is finished and no further ones are read.
   */
  async run(source: BatchSource, options: RenderOptions, signal?: AbortSignal): Promise<BatchResult> {
    const result: BatchResult = { succeeded: 0, failed: 0 };

    try {
      for await (const entry of this.batchSourceReader.read(source, signal)) {
        if (await this.process(entry, options)) {
          ++result.succeeded;
        } else {
          ++result.failed;
        }

        if (signal?.aborted) {
          break;
        }
      }
    } catch (err: unknown) {
      this.errorLog.error(`Failed to read players from ${source.type} source`);
      this.errorLog.error(err);
      ++result.failed;
    }

    return result;
  }

  private async process(entry: BatchEntry, options: RenderOptions): Promise<boolean> {
    if (entry instanceof DecodeError) {
      this.errorLog.error(`Skipping invalid entry: ${entry.message}`);
      return false;
    }
    return this.playerHeadWriter.write(entry, options);
  }
}
