import fs from 'fs-extra';
import type { WriteStream } from 'fs';
import { DownloadProgressCallback, DownloadResult } from '../types/engine';
import { EngineIOError, EngineNetworkError, errorMessage } from '../utils/errors';
import { Logger } from '../utils/logger';
import { HttpClient } from './http-client';

export interface DownloaderOptions {
  /** Minimum delay between two progress reports */
  progressIntervalMs: number;
  clock?: () => number;
}

class WriteFailure extends Error {
  constructor(readonly original: unknown) {
    super(errorMessage(original));
  }
}

function writeChunk(stream: WriteStream, chunk: Uint8Array): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    stream.write(chunk, (error) => {
      if (error) reject(new WriteFailure(error));
      else resolve();
    });
  });
}

function closeStream(stream: WriteStream): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    stream.end((error?: Error | null) => {
      if (error) reject(new WriteFailure(error));
      else resolve();
    });
  });
}

/**
 * Streams a package to a temporary file. The destination is deleted again
 * whenever the transfer does not complete.
 */
export class Downloader {
  private readonly clock: () => number;

  constructor(private readonly http: HttpClient, private readonly options: DownloaderOptions) {
    this.clock = options.clock ?? Date.now;
  }

  async fetch(
    url: string,
    destinationTempPath: string,
    progress?: DownloadProgressCallback,
    signal?: AbortSignal
  ): Promise<DownloadResult> {
    if (signal?.aborted) {
      return { status: 'cancelled' };
    }

    const stream = fs.createWriteStream(destinationTempPath, { flags: 'w' });
    // Failures also reach the write/end callbacks; the listener keeps them from going unhandled
    stream.on('error', (error) => {
      Logger.debug(`Write stream for ${destinationTempPath} failed: ${error.message}`);
    });
    let bytesWritten = 0;
    let totalBytes: number | undefined;
    let lastReport = Number.NEGATIVE_INFINITY;

    const report = (force: boolean): void => {
      if (!progress) return;
      const now = this.clock();
      if (!force && now - lastReport < this.options.progressIntervalMs) return;
      lastReport = now;
      try {
        progress(bytesWritten, totalBytes);
      } catch (error) {
        Logger.debug(`Download progress listener failed: ${errorMessage(error)}`);
      }
    };

    try {
      Logger.debug(`Downloading ${url}`);
      const response = await this.http.get(url, {
        headers: { Accept: 'application/octet-stream' },
        signal
      });
      if (response.status < 200 || response.status >= 300) {
        await response.cancel();
        throw new EngineNetworkError(`Download failed (${response.status}): ${url}`);
      }
      totalBytes = response.contentLength;
      report(true);

      for await (const chunk of response.chunks()) {
        if (signal?.aborted) break;
        await writeChunk(stream, chunk);
        bytesWritten += chunk.byteLength;
        report(false);
      }

      if (signal?.aborted) {
        await this.discard(stream, destinationTempPath);
        Logger.debug(`Download of ${url} cancelled after ${bytesWritten} bytes`);
        return { status: 'cancelled' };
      }

      await closeStream(stream);
      report(true);
      return { status: 'ok', bytesWritten };
    } catch (error) {
      await this.discard(stream, destinationTempPath);
      if (signal?.aborted) {
        return { status: 'cancelled' };
      }
      if (error instanceof WriteFailure) {
        throw new EngineIOError(`Failed to write ${destinationTempPath}: ${error.message}`, { cause: error.original });
      }
      if (error instanceof EngineNetworkError) {
        throw error;
      }
      throw new EngineNetworkError(`Download failed for ${url}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async discard(stream: WriteStream, filePath: string): Promise<void> {
    if (!stream.closed) {
      await new Promise<void>((resolve) => {
        stream.once('close', () => resolve());
        stream.destroy();
      });
    }
    try {
      await fs.remove(filePath);
    } catch (error) {
      Logger.warning(`Failed to delete partial download ${filePath}: ${errorMessage(error)}`);
    }
  }
}
