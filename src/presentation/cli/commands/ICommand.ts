import { Logger } from '../../../shared/logging/Logger';
import { ConfigurationError } from '../../../shared/errors/AppError';

/**
 * Base interface for CLI commands
 */
export interface ICommand {
    /**
     * Command name; `$0` for the default command
     */
    name: string;

    /**
     * Command description for help text
     */
    description: string;

    /**
     * Execute the command and resolve to the process exit code
     */
    execute(args: CommandArgs): Promise<number>;

    /**
     * Positional arguments, in order
     */
    getPositionals(): CommandOption[];

    /**
     * Get command-specific options
     */
    getOptions(): CommandOption[];
}

/**
 * Command arguments passed from CLI
 */
export interface CommandArgs {
    /**
     * Extra positional arguments
     */
    _: Array<string | number>;

    /**
     * Named options/flags
     */
    [key: string]: unknown;
}

/**
 * Command option definition
 */
export interface CommandOption {
    name: string;
    alias?: string;
    description: string;
    type: 'string' | 'number' | 'boolean';
    default?: string | number | boolean;
    required?: boolean;
    choices?: string[];
}

/**
 * Base command class with common functionality
 */
export abstract class BaseCommand implements ICommand {
    abstract name: string;
    abstract description: string;

    constructor(protected logger: Logger) {}

    abstract execute(args: CommandArgs): Promise<number>;

    getPositionals(): CommandOption[] {
        return [];
    }

    abstract getOptions(): CommandOption[];

    protected getString(args: CommandArgs, name: string): string | undefined {
        const value = args[name];
        return typeof value === 'string' ? value : undefined;
    }

    protected getNumber(args: CommandArgs, name: string): number | undefined {
        const value = args[name];
        if (typeof value !== 'number') {
            return undefined;
        }
        if (Number.isNaN(value)) {
            throw new ConfigurationError(`--${name} must be a number`);
        }
        return value;
    }

    protected getBoolean(args: CommandArgs, name: string): boolean | undefined {
        const value = args[name];
        return typeof value === 'boolean' ? value : undefined;
    }
}
