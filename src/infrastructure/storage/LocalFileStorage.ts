import * as fs from 'fs';
import * as path from 'path';
import { Readable, Transform, TransformCallback } from 'stream';
import { pipeline } from 'stream/promises';
import { IFileStorage, SavedFile } from '../../domain/interfaces/IFileStorage';
import { FileSystemError, errorCode, errorMessage } from '../../shared/errors/AppError';
import { ILogger } from '../../shared/logging/Logger';

const fsPromises = fs.promises;

/**
 * Size of the slices written to disk
 */
export const CHUNK_SIZE = 8192;

export class LocalFileStorage implements IFileStorage {
    readonly baseDir: string;

    constructor(
        private readonly logger: ILogger,
        baseDir: string = 'out'
    ) {
        this.baseDir = path.resolve(baseDir);
    }

    async createDirectory(): Promise<void> {
        try {
            await fsPromises.mkdir(this.baseDir, { recursive: true });
            this.logger.debug(`Output directory ready: ${this.baseDir}`);
        } catch (error) {
            throw new FileSystemError(
                `Failed to create directory ${this.baseDir}: ${errorMessage(error)}`,
                { path: this.baseDir, code: errorCode(error) },
                error
            );
        }
    }

    async exists(filename: string): Promise<boolean> {
        const fullPath = this.resolvePath(filename);

        try {
            await fsPromises.access(fullPath, fs.constants.F_OK);
            return true;
        } catch {
            return false;
        }
    }

    async save(filename: string, data: Readable): Promise<SavedFile> {
        const fullPath = this.resolvePath(filename);

        try {
            const bytesWritten = await this.saveStream(fullPath, data);
            this.logger.info(`File saved: ${filename} (${bytesWritten} bytes)`);

            return { filename, path: fullPath, bytesWritten };

        } catch (error) {
            const code = errorCode(error);
            // EEXIST: the file was there before us, leave it
            if (code !== 'EEXIST') {
                await this.removePartial(fullPath);
            }
            throw new FileSystemError(
                `Failed to save file ${filename}: ${errorMessage(error)}`,
                { path: fullPath, code },
                error
            );
        }
    }

    async delete(filename: string): Promise<void> {
        const fullPath = this.resolvePath(filename);

        try {
            await fsPromises.unlink(fullPath);
            this.logger.info(`File deleted: ${filename}`);
        } catch (error) {
            if (errorCode(error) === 'ENOENT') {
                return;
            }
            throw new FileSystemError(
                `Failed to delete file ${filename}: ${errorMessage(error)}`,
                { path: fullPath },
                error
            );
        }
    }

    private resolvePath(filename: string): string {
        const resolved = path.resolve(this.baseDir, filename);

        if (path.dirname(resolved) !== this.baseDir) {
            throw new FileSystemError(
                `Refusing to write outside ${this.baseDir}: ${filename}`,
                { filename }
            );
        }

        return resolved;
    }

    /**
     * Exclusive write of the stream in CHUNK_SIZE slices; resolves to the byte count
     */
    private async saveStream(fullPath: string, stream: Readable): Promise<number> {
        const writeStream = fs.createWriteStream(fullPath, { flags: 'wx' });
        const chunker = new ChunkSlicer(CHUNK_SIZE);

        await pipeline(stream, chunker, writeStream);

        return chunker.bytesPassed;
    }

    private async removePartial(fullPath: string): Promise<void> {
        try {
            await fsPromises.unlink(fullPath);
            this.logger.debug(`Removed partial file: ${fullPath}`);
        } catch (error) {
            if (errorCode(error) !== 'ENOENT') {
                this.logger.warn(`Could not remove partial file ${fullPath}: ${errorMessage(error)}`);
            }
        }
    }
}

/**
 * Re-slices incoming data into chunks of at most `sliceSize` bytes, dropping empty ones
 */
export class ChunkSlicer extends Transform {
    private passed = 0;

    constructor(private readonly sliceSize: number) {
        super();
    }

    get bytesPassed(): number {
        return this.passed;
    }

    _transform(chunk: Buffer | string, _encoding: BufferEncoding, callback: TransformCallback): void {
        const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;

        for (let offset = 0; offset < buffer.length; offset += this.sliceSize) {
            const slice = buffer.subarray(offset, offset + this.sliceSize);
            if (slice.length > 0) {
                this.passed += slice.length;
                this.push(slice);
            }
        }

        callback();
    }
}
