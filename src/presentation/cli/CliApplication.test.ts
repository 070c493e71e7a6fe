import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as path from 'path';
import { CliApplication } from './CliApplication';
import { DownloadCommand } from './commands/DownloadCommand';
import { SilentSpinner } from './Spinner';
import { UseCaseFactory } from './setup';
import { ConfigLoader } from '../config/ConfigLoader';
import { DownloadDocumentsUseCase } from '../../application/use-cases/DownloadDocumentsUseCase';
import { DownloaderConfig } from '../../domain/entities/DownloaderConfig';
import { HtmlLinkExtractor } from '../../infrastructure/parsers/HtmlLinkExtractor';
import { LocalFileStorage } from '../../infrastructure/storage/LocalFileStorage';
import { ErrorHandler } from '../../shared/errors/ErrorHandler';
import { FakeHttpClient } from '../../testing/FakeHttpClient';
import { makeTempDir, removeDir, silentLogger } from '../../testing/helpers';

const PAGE = 'https://example.com/docs';

describe('CliApplication', () => {
    let tempDir: string;
    let outputDir: string;
    let configs: DownloaderConfig[];
    let output: string[];
    let errors: string[];
    let app: CliApplication;

    beforeEach(() => {
        tempDir = makeTempDir();
        outputDir = path.join(tempDir, 'out');
        configs = [];
        output = [];
        errors = [];

        const http = new FakeHttpClient()
            .page(PAGE, '<a href="/a.pdf">A</a>')
            .file('https://example.com/a.pdf', { body: Buffer.from('PDF') });
        const createUseCase: UseCaseFactory = config => {
            configs.push(config);
            const logger = silentLogger();
            return new DownloadDocumentsUseCase(
                http,
                new LocalFileStorage(logger, config.outputDir),
                new HtmlLinkExtractor(logger, config.allowedExtensions),
                config,
                logger
            );
        };

        const logger = silentLogger();
        const configLoader = new ConfigLoader(logger, { cwd: tempDir, homeDir: tempDir, env: {} });
        configLoader.load();
        const errorHandler = new ErrorHandler(logger, line => errors.push(line));

        app = new CliApplication(logger, errorHandler, 'webdoc', '1.2.3');
        app.registerCommand(new DownloadCommand(logger, configLoader, errorHandler, {
            createUseCase,
            createSpinner: () => new SilentSpinner(),
            print: line => output.push(line)
        }), true);
    });

    afterEach(() => {
        removeDir(tempDir);
    });

    const run = (...args: string[]): Promise<number> => app.run(['node', 'webdoc', ...args]);

    it('should download from a bare URL', async () => {
        const code = await run(PAGE, '-o', outputDir);

        expect(code).toBe(0);
        expect(errors).toEqual([]);
        expect(configs).toHaveLength(1);
        expect(configs[0].outputDir).toBe(outputDir);
        expect(output).toContain('Successfully downloaded: 1 files');
    });

    it('should accept the download command and its alias', async () => {
        expect(await run('download', PAGE, '--output-dir', outputDir)).toBe(0);
        expect(await run('dl', PAGE, '--output-dir', path.join(tempDir, 'second'))).toBe(0);

        expect(configs.map(config => config.outputDir)).toEqual([outputDir, path.join(tempDir, 'second')]);
    });

    it('should parse short option aliases', async () => {
        const code = await run(PAGE, '-o', outputDir, '-r', '4', '-t', '12', '-e', '.docx,.PDF', '--insecure');

        expect(code).toBe(0);
        expect(configs[0].maxRetries).toBe(4);
        expect(configs[0].timeout).toBe(12);
        expect(configs[0].allowedExtensions).toEqual(['.docx', '.pdf']);
        expect(configs[0].verifySsl).toBe(false);
    });

    it('should exit with 1 on an unknown option', async () => {
        const code = await run(PAGE, '--bogus');

        expect(code).toBe(1);
        expect(errors).toHaveLength(1);
        expect(errors[0]).toContain('Unknown argument: bogus');
        expect(configs).toEqual([]);
    });

    it('should exit with 1 without a URL', async () => {
        const code = await run();

        expect(code).toBe(1);
        expect(errors[0]).toContain('Not enough non-option arguments');
    });

    it('should exit with 1 on a non-numeric retry count', async () => {
        const code = await run(PAGE, '-r', 'many');

        expect(code).toBe(1);
        expect(errors[0]).toContain('Error: --max-retries expects a number');
    });

    it('should list registered commands', () => {
        expect(app.getCommands().map(command => command.name)).toEqual(['download']);
    });
});
