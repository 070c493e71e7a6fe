#!/usr/bin/env node

import * as dotenv from 'dotenv';
import { CliApplication } from './CliApplication';
import { DownloadCommand } from './commands/DownloadCommand';
import { ConfigLoader } from '../config/ConfigLoader';
import { ErrorHandler } from '../../shared/errors/ErrorHandler';
import { createLogger, loggerConfigFromEnv } from '../../shared/logging/Logger';

async function main(argv: string[] = process.argv): Promise<number> {
    dotenv.config();

    const logger = createLogger('webdoc', loggerConfigFromEnv(process.env));
    const errorHandler = new ErrorHandler(logger);

    try {
        const configLoader = new ConfigLoader(logger);
        configLoader.load();

        const app = new CliApplication(
            logger,
            errorHandler,
            'webdoc',
            process.env.npm_package_version ?? '1.0.0'
        );
        app.registerCommand(new DownloadCommand(logger, configLoader, errorHandler), true);

        return await app.run(argv);

    } catch (error) {
        return errorHandler.handle(error);
    }
}

// Run if this is the main module
if (require.main === module) {
    main().then(code => {
        process.exitCode = code;
    }, (error: unknown) => {
        console.error('Fatal error:', error);
        process.exitCode = 1;
    });
}

export { main };
