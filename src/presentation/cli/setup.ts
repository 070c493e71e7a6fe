import { DownloadDocumentsUseCase } from '../../application/use-cases/DownloadDocumentsUseCase';
import { DownloaderConfig } from '../../domain/entities/DownloaderConfig';
import { IFileStorage } from '../../domain/interfaces/IFileStorage';
import { IHttpClient } from '../../domain/interfaces/IHttpClient';
import { ILinkExtractor } from '../../domain/interfaces/ILinkExtractor';
import { HttpClient } from '../../infrastructure/http/HttpClient';
import { FixedRetryPolicy } from '../../infrastructure/http/RetryPolicy';
import { HtmlLinkExtractor } from '../../infrastructure/parsers/HtmlLinkExtractor';
import { LocalFileStorage } from '../../infrastructure/storage/LocalFileStorage';
import { ILogger, createChildLogger } from '../../shared/logging/Logger';

export interface Dependencies {
    httpClient: IHttpClient;
    storage: IFileStorage;
    linkExtractor: ILinkExtractor;
    downloadUseCase: DownloadDocumentsUseCase;
}

/**
 * Builds the download use case for one configuration
 */
export type UseCaseFactory = (config: DownloaderConfig, logger: ILogger) => DownloadDocumentsUseCase;

/**
 * Set up all dependencies using manual dependency injection
 */
export function setupDependencies(
    config: DownloaderConfig,
    logger: ILogger
): Dependencies {
    const httpClient = new HttpClient(createChildLogger(logger, 'http'), {
        timeout: config.timeout * 1000,
        retryPolicy: new FixedRetryPolicy(config.maxRetries),
        verifySsl: config.verifySsl,
        userAgent: config.userAgent
    });

    const storage = new LocalFileStorage(
        createChildLogger(logger, 'storage'),
        config.outputDir
    );

    const linkExtractor = new HtmlLinkExtractor(
        createChildLogger(logger, 'links'),
        config.allowedExtensions
    );

    const downloadUseCase = new DownloadDocumentsUseCase(
        httpClient,
        storage,
        linkExtractor,
        config,
        createChildLogger(logger, 'download')
    );

    return {
        httpClient,
        storage,
        linkExtractor,
        downloadUseCase
    };
}

export const createDownloadUseCase: UseCaseFactory = (config, logger) =>
    setupDependencies(config, logger).downloadUseCase;
