import { z } from 'zod';
import { DICTIONARY_FILE_NAME } from '../../domain/constants/default-dictionary';

/**
 * Application configuration interface
 */
export interface AppConfig {
	dictionary: DictionaryConfig;
	logging: LoggingConfig;
	usage: UsageConfig;
}

/**
 * Where the dictionary file is looked up
 */
export interface DictionaryConfig {
	fileName: string;
	defaultDirectory: string;
}

/**
 * Logging configuration
 */
export interface LoggingConfig {
	level: 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';
}

/**
 * Command-line usage rules
 */
export interface UsageConfig {
	/** Reject runs that combine --prefix, --suffix and --list_all */
	exclusiveSwitches: boolean;
}

export const DEFAULT_APP_CONFIG: AppConfig = {
	dictionary: {
		fileName: DICTIONARY_FILE_NAME,
		defaultDirectory: '.',
	},
	logging: {
		level: 'WARN',
	},
	usage: {
		exclusiveSwitches: false,
	},
};

const logLevelSchema = z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']);
const booleanFlagSchema = z
	.enum(['true', 'false', '1', '0'])
	.transform((value) => value === 'true' || value === '1');
const directorySchema = z.string().min(1);

/**
 * Configuration manager for centralized configuration access
 */
export class ConfigManager {
	private config: AppConfig;

	constructor(customConfig?: Partial<AppConfig>) {
		this.config = this.mergeConfig(DEFAULT_APP_CONFIG, customConfig);
	}

	getConfig(): AppConfig {
		return {
			dictionary: this.getDictionaryConfig(),
			logging: this.getLoggingConfig(),
			usage: this.getUsageConfig(),
		};
	}

	getDictionaryConfig(): DictionaryConfig {
		return { ...this.config.dictionary };
	}

	getLoggingConfig(): LoggingConfig {
		return { ...this.config.logging };
	}

	getUsageConfig(): UsageConfig {
		return { ...this.config.usage };
	}

	/**
	 * Create configuration from environment variables.
	 * Values that fail validation are ignored and the defaults kept.
	 */
	static fromEnvironment(env: Record<string, string | undefined> = {}): ConfigManager {
		const envConfig: Partial<AppConfig> = {};

		const level = logLevelSchema.safeParse(env.RTL_MEANING_LOG_LEVEL?.toUpperCase());
		if (level.success) {
			envConfig.logging = { ...DEFAULT_APP_CONFIG.logging, level: level.data };
		}

		const directory = directorySchema.safeParse(env.RTL_MEANING_DICT_DIR);
		if (directory.success) {
			envConfig.dictionary = { ...DEFAULT_APP_CONFIG.dictionary, defaultDirectory: directory.data };
		}

		const exclusive = booleanFlagSchema.safeParse(env.RTL_MEANING_EXCLUSIVE_SWITCHES?.toLowerCase());
		if (exclusive.success) {
			envConfig.usage = { ...DEFAULT_APP_CONFIG.usage, exclusiveSwitches: exclusive.data };
		}

		return new ConfigManager(envConfig);
	}

	/**
	 * Merge configurations section by section
	 */
	private mergeConfig(base: AppConfig, override?: Partial<AppConfig>): AppConfig {
		if (!override) {
			return { ...base };
		}

		return {
			dictionary: { ...base.dictionary, ...override.dictionary },
			logging: { ...base.logging, ...override.logging },
			usage: { ...base.usage, ...override.usage },
		};
	}
}
