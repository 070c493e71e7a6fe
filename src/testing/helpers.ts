import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ILogger, LogLevel, createLogger } from '../shared/logging/Logger';

export function silentLogger(): ILogger {
    return createLogger('test', { level: LogLevel.SILENT });
}

export function makeTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'webdoc-'));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}
