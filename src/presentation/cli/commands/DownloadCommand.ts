import { BaseCommand, CommandArgs, CommandOption } from './ICommand';
import { AppConfig, ConfigLoader, ConfigOverrides } from '../../config/ConfigLoader';
import { Dependencies, setupDependencies } from '../setup';
import { DownloadProgress } from '../../../domain/interfaces/IMediaDownloader';
import { Logger, LoggerFactory, LogLevel } from '../../../shared/logging/Logger';
import { ConfigurationError, InvalidUrlError } from '../../../shared/errors/AppError';
import { ErrorHandler } from '../../../shared/errors/ErrorHandler';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export type DependencyFactory = (config: AppConfig, logger: Logger) => Dependencies;

/**
 * `twmedia <url>`: saves a post's media and prints one path per line
 */
export class DownloadCommand extends BaseCommand {
    name = '$0';
    description = 'Download the photos, videos and GIFs of an X/Twitter post';

    constructor(
        logger: Logger,
        private configLoader: ConfigLoader,
        private errorHandler: ErrorHandler,
        private createDependencies: DependencyFactory = setupDependencies
    ) {
        super(logger);
    }

    async execute(args: CommandArgs): Promise<number> {
        let config: AppConfig;
        try {
            config = this.configLoader.load(this.getOverrides(args));
        } catch (error) {
            return this.fail(error, EXIT_USAGE);
        }

        LoggerFactory.setDefaultConfig({
            level: config.verbose ? LogLevel.DEBUG : LogLevel.INFO,
            json: config.json
        });

        const url = this.getString(args, 'url') ?? '';
        const dependencies = this.createDependencies(config, this.logger);

        try {
            const report = await dependencies.useCase.execute({
                url,
                outputDir: config.outputDir,
                concurrency: config.concurrency,
                progressInterval: config.progressInterval,
                progressCallback: progress => this.reportProgress(progress)
            });

            report.paths.forEach(path => console.log(path));
            report.failures.forEach(result => {
                if (result.error) {
                    console.error(`[${result.error.stage}] ${result.error.message}`);
                }
            });

            return report.success ? EXIT_SUCCESS : EXIT_FAILURE;
        } catch (error) {
            return this.fail(error, error instanceof InvalidUrlError ? EXIT_USAGE : EXIT_FAILURE);
        } finally {
            dependencies.close();
        }
    }

    getPositionals(): CommandOption[] {
        return [
            {
                name: 'url',
                description: 'Post URL, e.g. https://x.com/<handle>/status/<id>',
                type: 'string',
                required: true
            }
        ];
    }

    getOptions(): CommandOption[] {
        return [
            {
                name: 'output',
                alias: 'o',
                description: 'Output directory (default ./downloads)',
                type: 'string'
            },
            {
                name: 'source',
                description: 'Where to read the post from',
                type: 'string',
                choices: ['page', 'syndication']
            },
            {
                name: 'concurrency',
                alias: 'c',
                description: 'Number of files downloaded at once',
                type: 'number'
            },
            {
                name: 'timeout',
                description: 'Request timeout in milliseconds',
                type: 'number'
            },
            {
                name: 'include-hls',
                description: 'Allow HLS playlists when picking a video variant',
                type: 'boolean'
            },
            {
                name: 'verbose',
                alias: 'v',
                description: 'Enable verbose logging',
                type: 'boolean'
            },
            {
                name: 'json',
                description: 'Log JSON lines',
                type: 'boolean'
            }
        ];
    }

    private getOverrides(args: CommandArgs): ConfigOverrides {
        const source = this.getString(args, 'source');
        if (source !== undefined && source !== 'page' && source !== 'syndication') {
            throw new ConfigurationError(`--source must be page or syndication, got '${source}'`);
        }

        return {
            outputDir: this.getString(args, 'output'),
            source,
            concurrency: this.getNumber(args, 'concurrency'),
            timeout: this.getNumber(args, 'timeout'),
            includeHls: this.getBoolean(args, 'include-hls'),
            verbose: this.getBoolean(args, 'verbose'),
            json: this.getBoolean(args, 'json')
        };
    }

    private reportProgress(progress: DownloadProgress): void {
        const amount = progress.percentage !== undefined
            ? `${progress.percentage}%`
            : `${progress.receivedBytes} bytes`;
        this.logger.debug(`${progress.filename}: ${amount}${progress.done ? ' (done)' : ''}`);
    }

    private fail(error: unknown, exitCode: number): number {
        this.errorHandler.handle(error);
        console.error(this.errorHandler.describe(error));
        return exitCode;
    }
}
