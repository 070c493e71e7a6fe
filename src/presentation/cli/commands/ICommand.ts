import { ILogger } from '../../../shared/logging/Logger';
import { ValidationError } from '../../../shared/errors/AppError';

/**
 * Base interface for CLI commands
 */
export interface ICommand {
    /**
     * Command name (e.g., 'download')
     */
    name: string;

    /**
     * Positional arguments in yargs notation (e.g., '<url>')
     */
    positionals: string;

    /**
     * Command description for help text
     */
    description: string;

    /**
     * Command aliases (e.g., ['dl'] for 'download')
     */
    aliases?: string[];

    /**
     * Execute the command; resolves to the process exit code
     */
    execute(args: CommandArgs): Promise<number>;

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
     * Named options/flags and declared positionals
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
    /** default shown in help when the real default comes from configuration */
    defaultDescription?: string;
    required?: boolean;
    choices?: string[];
}

/**
 * Base command class with common functionality
 */
export abstract class BaseCommand implements ICommand {
    abstract name: string;
    abstract positionals: string;
    abstract description: string;
    aliases?: string[];

    constructor(protected logger: ILogger) {}

    abstract execute(args: CommandArgs): Promise<number>;

    abstract getOptions(): CommandOption[];

    /**
     * Validate command arguments
     */
    protected validateArgs(args: CommandArgs): void {
        for (const option of this.getOptions()) {
            const value = args[option.name];

            if (option.required && value === undefined) {
                throw new ValidationError(`Missing required option: --${option.name}`);
            }

            if (option.choices && typeof value === 'string' && !option.choices.includes(value)) {
                throw new ValidationError(
                    `Invalid value for --${option.name}: ${value}. ` +
                    `Valid choices are: ${option.choices.join(', ')}`
                );
            }
        }
    }

    protected getString(args: CommandArgs, name: string): string | undefined {
        const value = args[name];
        if (value === undefined) {
            return undefined;
        }
        if (typeof value !== 'string') {
            throw new ValidationError(`--${name} expects a text value`);
        }
        return value;
    }

    protected getNumber(args: CommandArgs, name: string): number | undefined {
        const value = args[name];
        if (value === undefined) {
            return undefined;
        }
        if (typeof value !== 'number' || Number.isNaN(value)) {
            throw new ValidationError(`--${name} expects a number`);
        }
        return value;
    }

    protected getBoolean(args: CommandArgs, name: string): boolean | undefined {
        const value = args[name];
        if (value === undefined) {
            return undefined;
        }
        if (typeof value !== 'boolean') {
            throw new ValidationError(`--${name} expects true or false`);
        }
        return value;
    }
}
