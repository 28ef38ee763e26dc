import * as fs from 'fs';
import * as path from 'path';
import { promisify } from 'util';
import { pipeline, Transform } from 'stream';
import { glob } from 'glob';
import { IFileStorage, SaveOptions, SaveProgress } from '../../domain/interfaces/IFileStorage';
import { DownloadedFile } from '../../domain/entities/DownloadResult';
import { MediaKind } from '../../domain/entities/Media';
import { FILENAME_PREFIX } from '../../domain/value-objects/Filename';
import { WriteError, errorMessage } from '../../shared/errors/AppError';
import { Logger } from '../../shared/logging/Logger';

const pipelineAsync = promisify(pipeline);
const fsPromises = fs.promises;

export const TEMP_SUFFIX = '.part';
export const STALE_TEMPORARY_AGE_MS = 10 * 60 * 1000;

export class LocalFileStorage implements IFileStorage {
    constructor(private logger: Logger) {}

    async createDirectory(dirPath: string): Promise<string> {
        const fullPath = path.resolve(dirPath);

        try {
            await fsPromises.mkdir(fullPath, { recursive: true });
        } catch (error) {
            throw new WriteError(dirPath, `cannot create directory: ${errorMessage(error)}`, errnoDetails(error));
        }

        return fullPath;
    }

    /**
     * Stream data into `<path>.part`, then rename it into place. A source
     * error is rethrown as is, whenever it fires; failures of the
     * directory, the temporary file or the rename become WriteErrors. The
     * temporary file never outlives a failure.
     */
    async save(
        filePath: string,
        data: NodeJS.ReadableStream,
        options: SaveOptions = {}
    ): Promise<DownloadedFile> {
        // Must be attached before the first await
        let sourceError: unknown;
        data.on('error', (error: unknown) => {
            sourceError = sourceError ?? error;
        });

        const fullPath = path.resolve(filePath);
        const tempPath = fullPath + TEMP_SUFFIX;
        const { overwrite = false, progressCallback } = options;

        if (!overwrite && await this.exists(fullPath)) {
            throw new WriteError(filePath, 'file already exists');
        }

        await this.createDirectory(path.dirname(fullPath));
        if (sourceError !== undefined) {
            throw sourceError;
        }

        try {
            await pipelineAsync(data, this.progressCounter(progressCallback), fs.createWriteStream(tempPath));
            await fsPromises.rename(tempPath, fullPath);
        } catch (error) {
            await this.removeTemporary(tempPath);
            if (sourceError !== undefined) {
                throw sourceError;
            }
            throw new WriteError(filePath, errorMessage(error), errnoDetails(error));
        }

        const stats = await fsPromises.stat(fullPath);
        this.logger.debug(`File saved: ${fullPath} (${stats.size} bytes)`);

        return {
            path: fullPath,
            filename: path.basename(fullPath),
            size: stats.size
        };
    }

    async exists(filePath: string): Promise<boolean> {
        try {
            await fsPromises.access(path.resolve(filePath), fs.constants.F_OK);
            return true;
        } catch {
            return false;
        }
    }

    async delete(filePath: string): Promise<void> {
        try {
            await fsPromises.unlink(path.resolve(filePath));
            this.logger.debug(`File deleted: ${filePath}`);
        } catch (error) {
            if (isErrno(error) && error.code === 'ENOENT') {
                return;
            }
            throw new WriteError(filePath, `cannot delete: ${errorMessage(error)}`, errnoDetails(error));
        }
    }

    /**
     * Delete `twitter_<kind>_*.part` files untouched for olderThanMs. Other
     * `.part` files, and temporaries a running transfer still writes to,
     * are left alone.
     */
    async removeStaleTemporaries(
        directory: string,
        olderThanMs: number = STALE_TEMPORARY_AGE_MS
    ): Promise<string[]> {
        const kinds = Object.values(MediaKind).join(',');
        const candidates = await glob(`${FILENAME_PREFIX}_{${kinds}}_*${TEMP_SUFFIX}`, {
            cwd: path.resolve(directory),
            absolute: true,
            nodir: true,
            dot: true
        });

        const cutoff = Date.now() - olderThanMs;
        const removed: string[] = [];
        for (const file of candidates.sort()) {
            const modified = await this.modifiedAt(file);
            if (modified === undefined || modified > cutoff) continue;

            await this.delete(file);
            removed.push(file);
        }
        if (removed.length > 0) {
            this.logger.info(`Removed ${removed.length} stale temporary file(s) from ${directory}`);
        }

        return removed;
    }

    /**
     * mtime in ms, undefined once the file is gone
     */
    private async modifiedAt(file: string): Promise<number | undefined> {
        try {
            return (await fsPromises.stat(file)).mtimeMs;
        } catch (error) {
            if (isErrno(error) && error.code === 'ENOENT') {
                return undefined;
            }
            throw new WriteError(file, `cannot inspect: ${errorMessage(error)}`, errnoDetails(error));
        }
    }

    private progressCounter(progressCallback?: (progress: SaveProgress) => void): Transform {
        let savedBytes = 0;
        return new Transform({
            transform(chunk: Buffer, _encoding, callback) {
                savedBytes += chunk.length;
                progressCallback?.({ savedBytes });
                callback(null, chunk);
            }
        });
    }

    private async removeTemporary(tempPath: string): Promise<void> {
        try {
            await this.delete(tempPath);
        } catch (error) {
            this.logger.warn(`Could not remove temporary file ${tempPath}`, { error: errorMessage(error) });
        }
    }
}

// Duck-typed: fs errors from another realm fail instanceof Error
function isErrno(error: unknown): error is NodeJS.ErrnoException {
    return typeof error === 'object' && error !== null && 'code' in error;
}

function errnoDetails(error: unknown): Record<string, unknown> | undefined {
    return isErrno(error) && error.code ? { errno: error.code } : undefined;
}
