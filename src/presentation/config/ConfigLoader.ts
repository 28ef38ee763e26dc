import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { cosmiconfigSync, CosmiconfigResult } from 'cosmiconfig';
import * as dotenv from 'dotenv';
import { PostSource } from '../../domain/interfaces/IPageFetcher';
import { Logger } from '../../shared/logging/Logger';
import { ConfigurationError, errorMessage } from '../../shared/errors/AppError';

export const MODULE_NAME = 'twmedia';

export interface AppConfig {
    outputDir: string;
    source: PostSource;
    timeout: number;
    concurrency: number;
    progressInterval: number;
    userAgent?: string;
    includeHls: boolean;
    verbose: boolean;
    json: boolean;
}

export type ConfigOverrides = Partial<AppConfig>;

export interface ConfigLoaderOptions {
    cwd?: string;
    homeDir?: string;
    env?: NodeJS.ProcessEnv;
    /** Read `<cwd>/.env`; variables already set in env win */
    loadDotenv?: boolean;
}

export const DEFAULT_CONFIG: Readonly<AppConfig> = {
    outputDir: './downloads',
    source: 'page',
    timeout: 30000,
    concurrency: 1,
    progressInterval: 500,
    includeHls: false,
    verbose: false,
    json: false
};

const SOURCES: readonly PostSource[] = ['page', 'syndication'];

type ConfigKey = keyof AppConfig;
type ValueKind = 'string' | 'integer' | 'boolean' | 'source';

const FIELDS: Record<ConfigKey, ValueKind> = {
    outputDir: 'string',
    source: 'source',
    timeout: 'integer',
    concurrency: 'integer',
    progressInterval: 'integer',
    userAgent: 'string',
    includeHls: 'boolean',
    verbose: 'boolean',
    json: 'boolean'
};

const ENV_VARS: Partial<Record<ConfigKey, string>> = {
    outputDir: 'TWMEDIA_OUTPUT_DIR',
    source: 'TWMEDIA_SOURCE',
    timeout: 'TWMEDIA_TIMEOUT',
    concurrency: 'TWMEDIA_CONCURRENCY',
    userAgent: 'TWMEDIA_USER_AGENT',
    verbose: 'TWMEDIA_VERBOSE',
    includeHls: 'TWMEDIA_INCLUDE_HLS'
};

/**
 * Layers configuration: defaults < home directory file < working directory
 * file < environment < command line
 */
export class ConfigLoader {
    private readonly explorer = cosmiconfigSync(MODULE_NAME, {
        searchPlaces: [
            'package.json',
            `.${MODULE_NAME}rc`,
            `.${MODULE_NAME}rc.json`,
            `${MODULE_NAME}.config.json`,
            `${MODULE_NAME}.config.js`
        ],
        packageProp: MODULE_NAME
    });
    private readonly sources: string[] = [];

    constructor(
        private logger: Logger,
        private options: ConfigLoaderOptions = {}
    ) {}

    load(overrides: ConfigOverrides = {}): AppConfig {
        const cwd = this.options.cwd ?? process.cwd();
        const homeDir = this.options.homeDir ?? os.homedir();
        const fileEnv = (this.options.loadDotenv ?? true) ? readDotenv(cwd) : {};
        const env: NodeJS.ProcessEnv = { ...fileEnv, ...(this.options.env ?? process.env) };

        this.sources.length = 0;
        const homeConfig = this.loadFromDirectory(homeDir);
        const localConfig = this.loadFromDirectory(cwd);
        const envConfig = this.loadFromEnvironment(env);

        const config: AppConfig = {
            ...DEFAULT_CONFIG,
            ...homeConfig,
            ...localConfig,
            ...envConfig,
            ...withoutUndefined(overrides)
        };
        validateConfig(config);

        this.logger.debug('Configuration loaded', { sources: this.sources });
        return config;
    }

    /**
     * Where the last load found values, in merge order
     */
    getConfigSources(): readonly string[] {
        return [...this.sources];
    }

    private loadFromDirectory(dir: string): ConfigOverrides {
        let result: CosmiconfigResult;
        try {
            result = this.explorer.search(dir);
        } catch (error) {
            throw new ConfigurationError(`Cannot read configuration near ${dir}: ${errorMessage(error)}`);
        }

        if (!result || result.isEmpty || this.sources.includes(result.filepath)) {
            return {};
        }

        this.sources.push(result.filepath);
        this.logger.debug(`Loaded config from ${result.filepath}`);
        return parseConfigObject(result.config, result.filepath);
    }

    private loadFromEnvironment(env: NodeJS.ProcessEnv): ConfigOverrides {
        const config: ConfigOverrides = {};

        for (const [key, name] of Object.entries(ENV_VARS)) {
            const raw = name ? env[name] : undefined;
            if (!isConfigKey(key) || raw === undefined || raw === '') continue;
            assignField(config, key, parseEnvValue(raw, FIELDS[key], name ?? key), name ?? key);
        }

        if (Object.keys(config).length > 0) {
            this.sources.push('environment');
        }
        return config;
    }
}

/**
 * Validate a configuration file's contents. Unknown keys are rejected so
 * typos surface.
 */
export function parseConfigObject(raw: unknown, origin: string): ConfigOverrides {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        throw new ConfigurationError(`Configuration in ${origin} must be an object`);
    }

    const config: ConfigOverrides = {};
    for (const [key, value] of Object.entries(raw)) {
        if (!isConfigKey(key)) {
            throw new ConfigurationError(`Unknown configuration key '${key}' in ${origin}`);
        }
        assignField(config, key, value, `${origin}: ${key}`);
    }
    return config;
}

export function validateConfig(config: AppConfig): void {
    if (!config.outputDir.trim()) {
        throw new ConfigurationError('outputDir must not be empty');
    }
    if (!SOURCES.includes(config.source)) {
        throw new ConfigurationError(`Invalid source '${config.source}'. Must be one of: ${SOURCES.join(', ')}`);
    }
    if (!Number.isInteger(config.timeout) || config.timeout <= 0) {
        throw new ConfigurationError('timeout must be a positive number of milliseconds');
    }
    if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
        throw new ConfigurationError('concurrency must be at least 1');
    }
    if (!Number.isInteger(config.progressInterval) || config.progressInterval < 0) {
        throw new ConfigurationError('progressInterval must not be negative');
    }
}

function readDotenv(cwd: string): Record<string, string> {
    const file = path.join(cwd, '.env');
    if (!fs.existsSync(file)) return {};

    try {
        return dotenv.parse(fs.readFileSync(file));
    } catch (error) {
        throw new ConfigurationError(`Cannot read ${file}: ${errorMessage(error)}`);
    }
}

function isConfigKey(key: string): key is ConfigKey {
    return Object.prototype.hasOwnProperty.call(FIELDS, key);
}

function assignField(config: ConfigOverrides, key: ConfigKey, value: unknown, label: string): void {
    switch (key) {
        case 'outputDir':
        case 'userAgent':
            config[key] = expectString(value, label);
            break;
        case 'source':
            config.source = expectSource(value, label);
            break;
        case 'timeout':
        case 'concurrency':
        case 'progressInterval':
            config[key] = expectInteger(value, label);
            break;
        case 'includeHls':
        case 'verbose':
        case 'json':
            config[key] = expectBoolean(value, label);
            break;
    }
}

function parseEnvValue(raw: string, kind: ValueKind, name: string): unknown {
    switch (kind) {
        case 'integer':
            if (!/^\d+$/.test(raw.trim())) {
                throw new ConfigurationError(`${name} must be a whole number, got '${raw}'`);
            }
            return Number(raw.trim());
        case 'boolean': {
            const normalized = raw.trim().toLowerCase();
            if (['true', '1', 'yes'].includes(normalized)) return true;
            if (['false', '0', 'no'].includes(normalized)) return false;
            throw new ConfigurationError(`${name} must be true or false, got '${raw}'`);
        }
        default:
            return raw;
    }
}

function expectString(value: unknown, label: string): string {
    if (typeof value !== 'string') {
        throw new ConfigurationError(`${label} must be a string`);
    }
    return value;
}

function expectInteger(value: unknown, label: string): number {
    if (typeof value !== 'number' || !Number.isInteger(value)) {
        throw new ConfigurationError(`${label} must be a whole number`);
    }
    return value;
}

function expectBoolean(value: unknown, label: string): boolean {
    if (typeof value !== 'boolean') {
        throw new ConfigurationError(`${label} must be true or false`);
    }
    return value;
}

function expectSource(value: unknown, label: string): PostSource {
    const source = SOURCES.find(candidate => candidate === value);
    if (!source) {
        throw new ConfigurationError(`${label} must be one of: ${SOURCES.join(', ')}`);
    }
    return source;
}

function withoutUndefined(overrides: ConfigOverrides): ConfigOverrides {
    const result: ConfigOverrides = {};
    for (const [key, value] of Object.entries(overrides)) {
        if (value !== undefined && isConfigKey(key)) {
            assignField(result, key, value, key);
        }
    }
    return result;
}
