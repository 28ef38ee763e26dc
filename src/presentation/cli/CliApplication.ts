import yargs from 'yargs';
import type { Argv, Options, PositionalOptions } from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ICommand, CommandArgs } from './commands/ICommand';
import { EXIT_SUCCESS, EXIT_USAGE } from './commands/DownloadCommand';
import { Logger } from '../../shared/logging/Logger';

export class CliApplication {
    private commands: Map<string, ICommand> = new Map();

    constructor(
        private logger: Logger,
        private appName: string = 'twmedia',
        private version: string = '1.0.0'
    ) {}

    /**
     * Register a command
     */
    registerCommand(command: ICommand): void {
        this.commands.set(command.name, command);
        this.logger.debug(`Registered command: ${command.name}`);
    }

    /**
     * Run the CLI application and resolve to the exit code
     */
    async run(argv: string[] = process.argv): Promise<number> {
        const args = hideBin(argv);
        let exitCode = EXIT_SUCCESS;

        const yargsInstance = yargs(args)
            .scriptName(this.appName)
            .version(this.version)
            .help()
            .alias('h', 'help')
            .strict()
            .exitProcess(false)
            .wrap(100)
            .fail((message, error, instance) => {
                if (error) {
                    throw error;
                }
                instance.showHelp('error');
                console.error(`\n${message}`);
                exitCode = EXIT_USAGE;
            });

        this.commands.forEach(command => {
            yargsInstance.command(
                this.usage(command),
                command.description,
                builder => this.configureCommand(builder, command),
                async parsed => {
                    exitCode = await this.executeCommand(command, parsed);
                }
            );
        });

        await yargsInstance.parseAsync();
        return exitCode;
    }

    private usage(command: ICommand): string {
        const positionals = command.getPositionals().map(option =>
            option.required ? `<${option.name}>` : `[${option.name}]`
        );
        return [command.name, ...positionals].join(' ');
    }

    private configureCommand(builder: Argv, command: ICommand): Argv {
        command.getPositionals().forEach(option => {
            const config: PositionalOptions = {
                describe: option.description,
                type: option.type,
                default: option.default,
                choices: option.choices
            };
            builder.positional(option.name, config);
        });

        command.getOptions().forEach(option => {
            const config: Options = {
                describe: option.description,
                type: option.type,
                default: option.default,
                demandOption: option.required,
                choices: option.choices,
                alias: option.alias
            };
            builder.option(option.name, config);
        });

        return builder;
    }

    private async executeCommand(command: ICommand, argv: CommandArgs): Promise<number> {
        try {
            return await command.execute(argv);
        } catch (error) {
            this.logger.error(`Command '${command.name}' failed`, error);
            throw error;
        }
    }

    /**
     * Get registered commands
     */
    getCommands(): ICommand[] {
        return Array.from(this.commands.values());
    }
}
