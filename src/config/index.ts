import { ConfigKey, ENV_KEYS, WatcherConfig, WatcherConfigSchema } from './schema.js';
import { logger } from '../utils/logger.js';

type RawConfig = Partial<Record<ConfigKey, string>>;

function isConfigKey(key: unknown): key is ConfigKey {
    return typeof key === 'string' && key in ENV_KEYS;
}

/**
 * ConfigLoader: environment-driven watcher configuration
 *
 * Features:
 * - Reads every setting once, from the environment it is given
 * - Validates with Zod; empty variables count as unset
 * - An invalid value is reported and replaced by its default, never fatal
 * - Hands out a frozen configuration value
 */
export class ConfigLoader {
    private readonly config: Readonly<WatcherConfig>;

    constructor(private readonly env: NodeJS.ProcessEnv = process.env) {
        this.config = Object.freeze(this.load());
    }

    /**
     * Get the loaded configuration
     */
    public getConfig(): Readonly<WatcherConfig> {
        return this.config;
    }

    /**
     * Collect raw values from the environment
     */
    private readRaw(): RawConfig {
        const raw: RawConfig = {};

        for (const [key, envKey] of Object.entries(ENV_KEYS)) {
            const value = this.env[envKey]?.trim();
            if (value && isConfigKey(key)) {
                raw[key] = value;
            }
        }

        return raw;
    }

    private load(): WatcherConfig {
        const raw = this.readRaw();
        const result = WatcherConfigSchema.safeParse(raw);

        if (result.success) {
            return result.data;
        }

        for (const issue of result.error.issues) {
            const key = issue.path[0];
            if (!isConfigKey(key)) continue;

            if (key === 'webhookUrl') {
                logger.warn(`Ignoring invalid ${ENV_KEYS[key]}: ${issue.message}. Alerts will only be logged`);
            } else {
                logger.warn(`Invalid ${ENV_KEYS[key]}=${raw[key]}: ${issue.message}. Using default`);
            }
            delete raw[key];
        }

        return WatcherConfigSchema.parse(raw);
    }
}

/**
 * Load the watcher configuration from the given environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<WatcherConfig> {
    return new ConfigLoader(env).getConfig();
}

export * from './schema.js';
