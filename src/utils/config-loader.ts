import * as fs from 'fs';
import * as yaml from 'js-yaml';
import * as path from 'path';
import { DigestConfiguration } from '@/domain/digest-config';
import { ConfigNode, isConfigNode, parseConfiguration } from './config-schema';
import { logger, errorMessage } from './logger';

export const DEFAULT_CONFIG_PATH = path.join(__dirname, '../../config/defaults.yaml');

export interface LoadConfigOptions {
    /** Treat a missing or unreadable user configuration as fatal. */
    strict?: boolean;
    defaultsPath?: string;
}

/** Objects merge key by key; arrays and scalars from `override` replace the base. */
export function mergeConfig(base: ConfigNode, override: ConfigNode): ConfigNode {
    const merged: ConfigNode = { ...base };
    for (const [key, value] of Object.entries(override)) {
        const current = merged[key];
        merged[key] = isConfigNode(current) && isConfigNode(value) ? mergeConfig(current, value) : value;
    }
    return merged;
}

/**
 * Replaces `${NAME}` placeholders in every string with the environment value.
 * Unset variables become empty strings so that absent credentials read as
 * "not configured" downstream.
 */
export function resolveEnvVars(value: unknown): unknown {
    if (typeof value === 'string') {
        return value.replace(/\$\{([^}]+)\}/g, (_match: string, envVarName: string) => {
            const envValue = process.env[envVarName];
            if (!envValue) {
                logger.warn(`Environment variable ${envVarName} is not set, using empty value`);
                return '';
            }
            return envValue;
        });
    }
    if (Array.isArray(value)) {
        return value.map((entry: unknown) => resolveEnvVars(entry));
    }
    if (isConfigNode(value)) {
        return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, resolveEnvVars(entry)]));
    }
    return value;
}

export class ConfigLoader {
    private static instance: ConfigLoader;
    private config: DigestConfiguration | null = null;

    private constructor() {}

    static getInstance(): ConfigLoader {
        if (!ConfigLoader.instance) {
            ConfigLoader.instance = new ConfigLoader();
        }
        return ConfigLoader.instance;
    }

    loadConfig(configPath?: string, options: LoadConfigOptions = {}): DigestConfiguration {
        if (this.config) {
            return this.config;
        }

        const defaultsPath = options.defaultsPath || DEFAULT_CONFIG_PATH;
        let document = this.readDocument(defaultsPath);

        if (configPath) {
            try {
                document = mergeConfig(document, this.readDocument(configPath));
            } catch (error) {
                if (options.strict) {
                    logger.error('Failed to load configuration', { error: errorMessage(error), path: configPath });
                    throw new Error(`Failed to load configuration from ${configPath}`);
                }
                logger.error('Failed to load configuration, using defaults', {
                    error: errorMessage(error),
                    path: configPath,
                });
            }
        } else if (options.strict) {
            throw new Error('No configuration file given and strict mode is enabled');
        }

        this.config = parseConfiguration(resolveEnvVars(document));

        logger.info('Configuration loaded successfully', {
            path: configPath || defaultsPath,
            articleSources: this.config.sources.articles.length,
            blogSources: this.config.sources.blogs.length,
            emailConfigured: Boolean(this.config.email.username && this.config.email.password),
        });

        return this.config;
    }

    getConfig(): DigestConfiguration {
        if (!this.config) {
            return this.loadConfig();
        }
        return this.config;
    }

    clearCache(): void {
        this.config = null;
    }

    private readDocument(filePath: string): ConfigNode {
        const fileContents = fs.readFileSync(filePath, 'utf8');
        const document: unknown = yaml.load(fileContents);
        if (!isConfigNode(document)) {
            throw new Error(`Configuration file ${filePath} does not contain a mapping`);
        }
        return document;
    }
}
