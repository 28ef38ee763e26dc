#!/usr/bin/env node

import { CliApplication } from './CliApplication';
import { DownloadCommand, EXIT_FAILURE } from './commands/DownloadCommand';
import { ConfigLoader } from '../config/ConfigLoader';
import { LoggerFactory } from '../../shared/logging/Logger';
import { ErrorHandler } from '../../shared/errors/ErrorHandler';

async function main(argv: string[] = process.argv): Promise<number> {
    // Logs go to stderr; stdout carries only saved paths
    const logger = LoggerFactory.getLogger('twmedia', { destination: 'stderr' });
    const errorHandler = new ErrorHandler(logger);

    try {
        const app = new CliApplication(logger, 'twmedia', process.env.npm_package_version || '1.0.0');
        app.registerCommand(new DownloadCommand(logger, new ConfigLoader(logger), errorHandler));
        return await app.run(argv);
    } catch (error) {
        errorHandler.handle(error);
        console.error(errorHandler.describe(error));
        return EXIT_FAILURE;
    }
}

// Run if this is the main module
if (require.main === module) {
    main().then(code => {
        process.exitCode = code;
    });
}

export { main };
