import chalk from 'chalk';
import { BaseCommand, CommandArgs, CommandOption } from './ICommand';
import { DownloadReport } from '../../../domain/entities/DownloadReport';
import { parseExtensionList } from '../../../domain/entities/DownloaderConfig';
import { ConfigLoader, parseSize } from '../../config/ConfigLoader';
import { UseCaseFactory, createDownloadUseCase } from '../setup';
import { SpinnerFactory, createSpinner } from '../Spinner';
import { ErrorHandler } from '../../../shared/errors/ErrorHandler';
import { ValidationError } from '../../../shared/errors/AppError';
import { ILogger, LogLevel } from '../../../shared/logging/Logger';

/**
 * Extensions the command downloads when neither a flag nor a config source names any
 */
export const CLI_DEFAULT_EXTENSIONS: readonly string[] = ['.pdf', '.doc', '.docx'];

export interface DownloadCommandOptions {
    createUseCase?: UseCaseFactory;
    createSpinner?: SpinnerFactory;
    print?: (line: string) => void;
}

export class DownloadCommand extends BaseCommand {
    name = 'download';
    positionals = '<url>';
    description = 'Download every linked document from a web page';
    aliases = ['dl'];

    private readonly createUseCase: UseCaseFactory;
    private readonly createSpinner: SpinnerFactory;
    private readonly print: (line: string) => void;

    constructor(
        logger: ILogger,
        private readonly configLoader: ConfigLoader,
        private readonly errorHandler: ErrorHandler,
        options: DownloadCommandOptions = {}
    ) {
        super(logger);
        this.createUseCase = options.createUseCase ?? createDownloadUseCase;
        this.createSpinner = options.createSpinner ?? createSpinner;
        this.print = options.print ?? (line => console.log(line));
    }

    async execute(args: CommandArgs): Promise<number> {
        try {
            this.validateArgs(args);

            const url = this.getString(args, 'url');
            if (!url) {
                throw new ValidationError('No URL provided. Usage: webdoc <url>');
            }

            const verbose = this.getBoolean(args, 'verbose') === true || this.configLoader.getConfig().verbose === true;
            if (verbose) {
                this.logger.setLevel(LogLevel.DEBUG);
            }

            const extensions = this.getString(args, 'allowed-extensions');
            const minSize = this.getString(args, 'min-size');
            const maxSize = this.getString(args, 'max-size');

            const config = this.configLoader.resolve({
                outputDir: this.getString(args, 'output-dir'),
                maxRetries: this.getNumber(args, 'max-retries'),
                timeout: this.getNumber(args, 'timeout'),
                allowedExtensions: extensions === undefined ? undefined : parseExtensionList(extensions),
                minFileSize: minSize === undefined ? undefined : parseSize(minSize),
                maxFileSize: maxSize === undefined ? undefined : parseSize(maxSize),
                verifySsl: this.getBoolean(args, 'insecure') === true ? false : undefined,
                userAgent: this.getString(args, 'user-agent')
            }, { allowedExtensions: [...CLI_DEFAULT_EXTENSIONS] });
            this.logger.debug('Resolved configuration', { ...config });

            const downloadUseCase = this.createUseCase(config, this.logger);

            const spinner = this.createSpinner().start('Downloading documents...');
            let report: DownloadReport;
            try {
                report = await downloadUseCase.execute(url);
                spinner.stop();
            } catch (error) {
                spinner.fail('Download failed');
                throw error;
            }

            this.printSummary(report);
            return 0;

        } catch (error) {
            return this.errorHandler.handle(error);
        }
    }

    getOptions(): CommandOption[] {
        return [
            {
                name: 'verbose',
                alias: 'v',
                description: 'Enable verbose logging',
                type: 'boolean'
            },
            {
                name: 'output-dir',
                alias: 'o',
                description: 'Output directory for downloaded files',
                type: 'string',
                defaultDescription: 'out'
            },
            {
                name: 'max-retries',
                alias: 'r',
                description: 'Maximum number of attempts per request',
                type: 'number',
                defaultDescription: '3'
            },
            {
                name: 'timeout',
                alias: 't',
                description: 'Request timeout in seconds',
                type: 'number',
                defaultDescription: '30'
            },
            {
                name: 'allowed-extensions',
                alias: 'e',
                description: 'Comma-separated list of allowed file extensions',
                type: 'string',
                defaultDescription: CLI_DEFAULT_EXTENSIONS.join(',')
            },
            {
                name: 'min-size',
                description: 'Minimum file size (e.g., 100k, 1m)',
                type: 'string'
            },
            {
                name: 'max-size',
                description: 'Maximum file size (e.g., 100k, 1m)',
                type: 'string'
            },
            {
                name: 'insecure',
                description: 'Skip TLS certificate verification',
                type: 'boolean'
            },
            {
                name: 'user-agent',
                description: 'User-Agent header sent with every request',
                type: 'string'
            }
        ];
    }

    private printSummary(report: DownloadReport): void {
        this.print(chalk.green('Download completed!'));
        this.print(`Successfully downloaded: ${report.successCount} files`);
        this.print(`Failed: ${report.failedCount} files`);
        this.print(`Skipped: ${report.skippedCount} files`);
        this.print(`Total size: ${formatKilobytes(report.totalSize)} KB`);
        this.print(`Duration: ${report.duration.toFixed(2)} seconds`);

        for (const [url, message] of Object.entries(report.failedFiles)) {
            this.print(chalk.red(`  ✗ ${url}: ${message}`));
        }
    }
}

export function formatKilobytes(bytes: number): string {
    return (bytes / 1024).toFixed(2);
}
