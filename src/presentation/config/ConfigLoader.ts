import * as os from 'os';
import { cosmiconfigSync } from 'cosmiconfig';
import {
    DownloaderConfig,
    createDownloaderConfig,
    parseExtensionList
} from '../../domain/entities/DownloaderConfig';
import { ValidationError } from '../../shared/errors/AppError';
import { ILogger } from '../../shared/logging/Logger';

export const MODULE_NAME = 'webdoc';

/**
 * Settings gathered from config files and the environment; everything optional
 */
export interface AppConfig {
    outputDir?: string;
    maxRetries?: number;
    timeout?: number;
    minFileSize?: number;
    maxFileSize?: number;
    allowedExtensions?: string[];
    verifySsl?: boolean;
    userAgent?: string;
    verbose?: boolean;
}

export interface ConfigLoaderOptions {
    /** directory searched for a project config file */
    cwd?: string;
    /** directory searched for a user config file */
    homeDir?: string;
    env?: NodeJS.ProcessEnv;
}

const ENV_PREFIX = 'WEBDOC_';

export class ConfigLoader {
    private config: AppConfig = {};
    private readonly sources: string[] = [];
    private readonly cwd: string;
    private readonly homeDir: string;
    private readonly env: NodeJS.ProcessEnv;

    constructor(
        private readonly logger: ILogger,
        options: ConfigLoaderOptions = {}
    ) {
        this.cwd = options.cwd ?? process.cwd();
        this.homeDir = options.homeDir ?? os.homedir();
        this.env = options.env ?? process.env;
    }

    /**
     * Load configuration from files and environment
     */
    load(): AppConfig {
        const explorer = cosmiconfigSync(MODULE_NAME, {
            searchPlaces: [
                'package.json',
                `.${MODULE_NAME}rc`,
                `.${MODULE_NAME}rc.json`,
                `${MODULE_NAME}.config.json`,
                `${MODULE_NAME}.config.js`
            ],
            packageProp: MODULE_NAME,
            searchStrategy: 'none'
        });

        const homeConfig = this.loadFromDirectory(explorer, this.homeDir);
        const localConfig = this.cwd === this.homeDir
            ? {}
            : this.loadFromDirectory(explorer, this.cwd);
        const envConfig = this.loadFromEnvironment();

        // Later overrides earlier
        this.config = mergeConfigs(homeConfig, localConfig, envConfig);

        this.logger.debug('Configuration loaded', { sources: [...this.sources] });

        return this.getConfig();
    }

    /**
     * Get current configuration
     */
    getConfig(): AppConfig {
        return { ...this.config };
    }

    /**
     * Where the current configuration came from
     */
    getSources(): readonly string[] {
        return this.sources;
    }

    /**
     * Loaded configuration between a baseline and command-line values, validated and frozen
     */
    resolve(overrides: AppConfig = {}, baseline: AppConfig = {}): DownloaderConfig {
        const merged = mergeConfigs(baseline, this.config, overrides);
        return createDownloaderConfig({
            outputDir: merged.outputDir,
            maxRetries: merged.maxRetries,
            timeout: merged.timeout,
            minFileSize: merged.minFileSize,
            maxFileSize: merged.maxFileSize,
            allowedExtensions: merged.allowedExtensions,
            verifySsl: merged.verifySsl,
            userAgent: merged.userAgent
        });
    }

    private loadFromDirectory(
        explorer: ReturnType<typeof cosmiconfigSync>,
        dir: string
    ): AppConfig {
        const result = explorer.search(dir);
        if (!result || result.isEmpty) {
            return {};
        }

        this.logger.debug(`Loaded config from ${result.filepath}`);
        this.sources.push(result.filepath);
        return parseConfigObject(result.config, result.filepath);
    }

    private loadFromEnvironment(): AppConfig {
        const env = this.env;
        const source = 'environment';
        const config: AppConfig = {};
        const read = (key: string): string | undefined => {
            const value = env[ENV_PREFIX + key];
            return value === undefined || value.trim() === '' ? undefined : value.trim();
        };

        const outputDir = read('OUTPUT_DIR');
        if (outputDir !== undefined) config.outputDir = outputDir;

        const maxRetries = read('MAX_RETRIES');
        if (maxRetries !== undefined) config.maxRetries = parseInteger(maxRetries, `${ENV_PREFIX}MAX_RETRIES`, source);

        const timeout = read('TIMEOUT');
        if (timeout !== undefined) config.timeout = parseInteger(timeout, `${ENV_PREFIX}TIMEOUT`, source);

        const minFileSize = read('MIN_FILE_SIZE');
        if (minFileSize !== undefined) config.minFileSize = parseSize(minFileSize);

        const maxFileSize = read('MAX_FILE_SIZE');
        if (maxFileSize !== undefined) config.maxFileSize = parseSize(maxFileSize);

        const extensions = read('ALLOWED_EXTENSIONS');
        if (extensions !== undefined) config.allowedExtensions = parseExtensionList(extensions);

        const verifySsl = read('VERIFY_SSL');
        if (verifySsl !== undefined) config.verifySsl = parseBoolean(verifySsl, `${ENV_PREFIX}VERIFY_SSL`, source);

        const userAgent = read('USER_AGENT');
        if (userAgent !== undefined) config.userAgent = userAgent;

        const verbose = read('VERBOSE');
        if (verbose !== undefined) config.verbose = parseBoolean(verbose, `${ENV_PREFIX}VERBOSE`, source);

        if (Object.keys(config).length > 0) {
            this.sources.push(source);
        }

        return config;
    }
}

/**
 * Merge configurations, skipping undefined values; later arguments win
 */
export function mergeConfigs(...configs: AppConfig[]): AppConfig {
    const result: AppConfig = {};

    for (const config of configs) {
        if (config.outputDir !== undefined) result.outputDir = config.outputDir;
        if (config.maxRetries !== undefined) result.maxRetries = config.maxRetries;
        if (config.timeout !== undefined) result.timeout = config.timeout;
        if (config.minFileSize !== undefined) result.minFileSize = config.minFileSize;
        if (config.maxFileSize !== undefined) result.maxFileSize = config.maxFileSize;
        if (config.allowedExtensions !== undefined) result.allowedExtensions = [...config.allowedExtensions];
        if (config.verifySsl !== undefined) result.verifySsl = config.verifySsl;
        if (config.userAgent !== undefined) result.userAgent = config.userAgent;
        if (config.verbose !== undefined) result.verbose = config.verbose;
    }

    return result;
}

/**
 * Parse a size such as "2048", "10k", "1m" or "2g" into bytes
 */
export function parseSize(input: string): number {
    const match = input.trim().match(/^(\d+)([kmg]?)b?$/i);
    if (!match) {
        throw new ValidationError(`Invalid size format: ${input}. Use a format like '100k', '1m', '2g'`);
    }

    const value = parseInt(match[1], 10);
    switch (match[2].toLowerCase()) {
        case 'k': return value * 1024;
        case 'm': return value * 1024 * 1024;
        case 'g': return value * 1024 * 1024 * 1024;
        default: return value;
    }
}

/**
 * Validate an object read from a config file
 */
export function parseConfigObject(raw: unknown, source: string): AppConfig {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        throw new ValidationError(`Configuration in ${source} must be an object`, { source });
    }

    const entries = new Map<string, unknown>(Object.entries(raw));
    const config: AppConfig = {};

    for (const [key, value] of entries) {
        switch (key) {
            case 'outputDir':
            case 'userAgent':
                config[key] = expectString(value, key, source);
                break;
            case 'maxRetries':
            case 'timeout':
                config[key] = expectInteger(value, key, source);
                break;
            case 'minFileSize':
            case 'maxFileSize':
                config[key] = typeof value === 'string' ? parseSize(value) : expectInteger(value, key, source);
                break;
            case 'allowedExtensions':
                config.allowedExtensions = typeof value === 'string'
                    ? parseExtensionList(value)
                    : expectStringArray(value, key, source);
                break;
            case 'verifySsl':
            case 'verbose':
                config[key] = expectBoolean(value, key, source);
                break;
            default:
                throw new ValidationError(`Unknown configuration key '${key}' in ${source}`, { key, source });
        }
    }

    return config;
}

function invalid(key: string, source: string, expected: string): ValidationError {
    return new ValidationError(`Invalid value for '${key}' in ${source}: expected ${expected}`, { key, source });
}

function expectString(value: unknown, key: string, source: string): string {
    if (typeof value !== 'string') throw invalid(key, source, 'a string');
    return value;
}

function expectInteger(value: unknown, key: string, source: string): number {
    if (typeof value !== 'number' || !Number.isInteger(value)) throw invalid(key, source, 'an integer');
    return value;
}

function expectBoolean(value: unknown, key: string, source: string): boolean {
    if (typeof value !== 'boolean') throw invalid(key, source, 'a boolean');
    return value;
}

function expectStringArray(value: unknown, key: string, source: string): string[] {
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
        throw invalid(key, source, 'a list of strings');
    }
    return value;
}

function parseInteger(value: string, key: string, source: string): number {
    if (!/^-?\d+$/.test(value)) throw invalid(key, source, 'an integer');
    return parseInt(value, 10);
}

function parseBoolean(value: string, key: string, source: string): boolean {
    switch (value.toLowerCase()) {
        case 'true':
        case '1':
        case 'yes':
            return true;
        case 'false':
        case '0':
        case 'no':
            return false;
        default:
            throw invalid(key, source, 'true or false');
    }
}
