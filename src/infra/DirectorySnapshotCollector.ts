import fs from 'node:fs/promises';
import type { Dirent, Stats } from 'node:fs';
import path from 'node:path';
import { minimatch } from 'minimatch';
import type { FileMetadataSnapshot } from '../domain/entities/FileMetadataSnapshot.js';
import { MalformedSnapshotError, PathUnavailableError } from '../domain/errors.js';
import type { FileFilterRules } from './counterConfig.js';
import { logger } from './logger.js';

export interface SnapshotRequest {
  deviceId: string;
  directory: string;
  /** Files modified after this instant are left for the next pass */
  captureTime: Date;
}

export interface SnapshotCollector {
  collect(request: SnapshotRequest): Promise<FileMetadataSnapshot>;
}

export interface CollectorOptions {
  /** Upper bound for the whole enumeration, network shares included */
  timeoutMs: number;
  /** Concurrent stat calls per batch */
  statBatchSize?: number;
}

/**
 * A listed entry that is gone by the time it is stat'ed is dropped.
 * Any other failure (permissions included) fails the whole snapshot: a
 * committed scan moves the cutoff past every file it did not see.
 */
const VANISHED_ENTRY_CODE = 'ENOENT';

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Builds the name/size predicate for a set of filtering rules
 */
export function createFileFilter(rules: FileFilterRules): (name: string, size: number) => boolean {
  const extensions = new Set(rules.includeExtensions);

  return (name, size) => {
    if (extensions.size > 0 && !extensions.has(path.extname(name).toLowerCase())) {
      return false;
    }

    for (const pattern of rules.excludePatterns) {
      if (minimatch(name, pattern, { dot: true, nocase: true })) {
        return false;
      }
    }

    return !(rules.minFileSizeBytes > 0 && size < rules.minFileSizeBytes);
  };
}

/**
 * Collects sorted modification times for one device directory.
 * One listing of the directory, then metadata for the listed files only;
 * subdirectories are not walked.
 */
export class DirectorySnapshotCollector implements SnapshotCollector {
  private readonly accepts: (name: string, size: number) => boolean;
  private readonly statBatchSize: number;

  constructor(
    rules: FileFilterRules,
    private options: CollectorOptions
  ) {
    this.accepts = createFileFilter(rules);
    this.statBatchSize = options.statBatchSize ?? 64;
  }

  async collect(request: SnapshotRequest): Promise<FileMetadataSnapshot> {
    const started = Date.now();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(
          new PathUnavailableError(
            `Enumeration of ${request.directory} exceeded ${this.options.timeoutMs}ms`,
            { deviceId: request.deviceId, directory: request.directory }
          )
        );
      }, this.options.timeoutMs);
    });

    try {
      const { timestamps, skippedEntries } = await Promise.race([
        this.enumerate(request),
        timeout,
      ]);

      timestamps.sort((a, b) => a - b);
      const durationMs = Date.now() - started;

      logger.debug('Snapshot collected', {
        deviceId: request.deviceId,
        files: timestamps.length,
        skippedEntries,
        durationMs,
      });

      return {
        deviceId: request.deviceId,
        directory: request.directory,
        timestamps,
        captureTime: request.captureTime,
        skippedEntries,
        durationMs,
      };
    } finally {
      clearTimeout(timer);
    }
  }

  private async enumerate(
    request: SnapshotRequest
  ): Promise<{ timestamps: number[]; skippedEntries: number }> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(request.directory, { withFileTypes: true });
    } catch (error) {
      throw new PathUnavailableError(`Cannot read directory ${request.directory}`, {
        deviceId: request.deviceId,
        directory: request.directory,
        code: errorCode(error),
      });
    }

    const candidates = entries.filter((entry) => entry.isFile() || entry.isSymbolicLink());
    const timestamps: number[] = [];
    let skippedEntries = 0;

    for (let offset = 0; offset < candidates.length; offset += this.statBatchSize) {
      const batch = candidates.slice(offset, offset + this.statBatchSize);
      const stats = await Promise.all(batch.map((entry) => this.statEntry(request, entry)));

      batch.forEach((entry, index) => {
        const stat = stats[index];
        if (!stat) {
          skippedEntries += 1;
          return;
        }
        if (!stat.isFile()) {
          return;
        }
        if (!Number.isFinite(stat.mtimeMs)) {
          throw new MalformedSnapshotError(`Entry ${entry.name} has no usable modification time`, {
            deviceId: request.deviceId,
            entry: entry.name,
          });
        }
        if (this.accepts(entry.name, stat.size)) {
          timestamps.push(stat.mtimeMs);
        }
      });
    }

    return { timestamps, skippedEntries };
  }

  private async statEntry(request: SnapshotRequest, entry: Dirent): Promise<Stats | null> {
    const entryPath = path.join(request.directory, entry.name);
    try {
      return await fs.stat(entryPath);
    } catch (error) {
      const code = errorCode(error);
      if (code === VANISHED_ENTRY_CODE) {
        logger.warn('File vanished during enumeration, skipping', { deviceId: request.deviceId, entryPath });
        return null;
      }
      throw new PathUnavailableError(`Cannot read metadata of ${entryPath}`, {
        deviceId: request.deviceId,
        directory: request.directory,
        code,
      });
    }
  }
}
