import yargs, { Argv, Options } from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ICommand } from './commands/ICommand';
import { ErrorHandler } from '../../shared/errors/ErrorHandler';
import { ValidationError } from '../../shared/errors/AppError';
import { ILogger } from '../../shared/logging/Logger';

export class CliApplication {
    private commands: Map<string, ICommand> = new Map();
    private defaultCommand?: string;

    constructor(
        private logger: ILogger,
        private errorHandler: ErrorHandler,
        private appName: string = 'webdoc',
        private version: string = '1.0.0'
    ) {}

    /**
     * Register a command; the default command also runs when no command name is given
     */
    registerCommand(command: ICommand, isDefault: boolean = false): void {
        this.commands.set(command.name, command);

        if (isDefault) {
            this.defaultCommand = command.name;
        }

        this.logger.debug(`Registered command: ${command.name}`);
    }

    /**
     * Run the CLI application; resolves to the process exit code
     */
    async run(argv: string[] = process.argv): Promise<number> {
        let exitCode = 0;

        try {
            const parser = yargs(hideBin(argv))
                .scriptName(this.appName)
                .version(this.version)
                .help()
                .alias('h', 'help')
                .strict()
                .exitProcess(false)
                .fail((message, error) => {
                    throw error ?? new ValidationError(message);
                })
                .wrap(100);

            this.commands.forEach((command, name) => {
                const aliases = [...(command.aliases ?? [])];
                if (name === this.defaultCommand) {
                    aliases.push('$0');
                }

                parser.command(
                    [`${name} ${command.positionals}`, ...aliases],
                    command.description,
                    builder => this.configureCommand(builder, command),
                    async args => {
                        exitCode = await command.execute(args);
                    }
                );
            });

            await parser.parseAsync();

        } catch (error) {
            return this.errorHandler.handle(error);
        }

        return exitCode;
    }

    private configureCommand(builder: Argv, command: ICommand): Argv {
        for (const option of command.getOptions()) {
            const config: Options = {
                describe: option.description,
                type: option.type,
                demandOption: option.required
            };

            if (option.default !== undefined) {
                config.default = option.default;
            }

            if (option.defaultDescription) {
                config.defaultDescription = option.defaultDescription;
            }

            if (option.choices) {
                config.choices = option.choices;
            }

            if (option.alias) {
                config.alias = option.alias;
            }

            builder.option(option.name, config);
        }

        return builder;
    }

    /**
     * Get registered commands
     */
    getCommands(): ICommand[] {
        return Array.from(this.commands.values());
    }
}
