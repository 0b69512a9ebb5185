import fs from 'fs/promises';
import path from 'path';
import yaml from 'js-yaml';
import { ConfigFile, DEFAULT_CONFIG, SentinelConfig, configFileSchema } from './schema';
import { fileExists } from '../utils/fileUtils';
import logger from '../utils/logger';

export const DEFAULT_CONFIG_FILE = '.coverage-sentinel.yml';

/**
 * A config file value failed validation
 */
export class ConfigValidationError extends Error {
    constructor(readonly source: string, readonly issues: string[]) {
        super(`Invalid configuration in ${source}:\n${issues.map(issue => `  - ${issue}`).join('\n')}`);
        this.name = 'ConfigValidationError';
    }
}

/**
 * Load, validate and merge configuration
 */
export class ConfigLoader {
    private configSource: string = 'defaults';

    constructor(
        private env: NodeJS.ProcessEnv = process.env,
        private cwd: string = process.cwd()
    ) {}

    /**
     * Load configuration from file or use defaults. Environment overrides apply last.
     */
    async load(configPath?: string): Promise<SentinelConfig> {
        let fileConfig: ConfigFile = {};
        this.configSource = 'defaults';

        const candidate = configPath
            ? path.resolve(this.cwd, configPath)
            : path.join(this.cwd, DEFAULT_CONFIG_FILE);

        if (configPath || (await fileExists(candidate))) {
            fileConfig = await this.loadFromFile(candidate);
        }

        const config = this.mergeWithDefaults(fileConfig);
        this.applyEnvironmentOverrides(config);

        logger.debug(`Configuration loaded from: ${this.configSource}`);
        return config;
    }

    getSource(): string {
        return this.configSource;
    }

    /**
     * Missing or unparsable files fall back to defaults; invalid values throw
     */
    private async loadFromFile(filePath: string): Promise<ConfigFile> {
        let raw: unknown;
        try {
            raw = yaml.load(await fs.readFile(filePath, 'utf-8'));
        } catch (error) {
            logger.warn(`Failed to load config from ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
            return {};
        }

        // An empty file parses to undefined
        if (raw === undefined || raw === null) {
            this.configSource = filePath;
            return {};
        }

        const parsed = configFileSchema.safeParse(raw);
        if (!parsed.success) {
            throw new ConfigValidationError(
                filePath,
                parsed.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
            );
        }

        this.configSource = filePath;
        logger.info(`Loaded config from: ${filePath}`);
        return parsed.data;
    }

    private mergeWithDefaults(config: ConfigFile): SentinelConfig {
        return {
            project_root: config.project_root ?? DEFAULT_CONFIG.project_root,
            source_dir: config.source_dir ?? DEFAULT_CONFIG.source_dir,
            test_dir: config.test_dir ?? DEFAULT_CONFIG.test_dir,
            coverage_file: config.coverage_file ?? DEFAULT_CONFIG.coverage_file,
            output_dir: config.output_dir ?? DEFAULT_CONFIG.output_dir,
            history_dir: config.history_dir ?? DEFAULT_CONFIG.history_dir,
            exclude_patterns: config.exclude_patterns ?? [...DEFAULT_CONFIG.exclude_patterns],
            quality_gates: (config.quality_gates ?? DEFAULT_CONFIG.quality_gates).map(gate => ({ ...gate })),
            regression: { ...DEFAULT_CONFIG.regression, ...config.regression },
            tracking: { ...DEFAULT_CONFIG.tracking, ...config.tracking },
            reports: { ...DEFAULT_CONFIG.reports, ...config.reports },
            suggestions: { ...DEFAULT_CONFIG.suggestions, ...config.suggestions },
            test_count: { ...DEFAULT_CONFIG.test_count, ...config.test_count },
        };
    }

    private applyEnvironmentOverrides(config: SentinelConfig): void {
        const env = this.env;

        if (env.COVERAGE_SOURCE_DIR) {
            config.source_dir = env.COVERAGE_SOURCE_DIR;
        }
        if (env.COVERAGE_TEST_DIR) {
            config.test_dir = env.COVERAGE_TEST_DIR;
        }
        if (env.COVERAGE_FILE) {
            config.coverage_file = env.COVERAGE_FILE;
        }
        if (env.COVERAGE_OUTPUT_DIR) {
            config.output_dir = env.COVERAGE_OUTPUT_DIR;
        }
        if (env.COVERAGE_FAIL_ON_REGRESSION === 'true' || env.COVERAGE_FAIL_ON_REGRESSION === 'false') {
            config.regression.fail_on_regression = env.COVERAGE_FAIL_ON_REGRESSION === 'true';
        }
        if (env.COVERAGE_REGRESSION_THRESHOLD) {
            const threshold = Number.parseFloat(env.COVERAGE_REGRESSION_THRESHOLD);
            if (Number.isFinite(threshold) && threshold >= 0) {
                config.regression.threshold_percent = threshold;
            } else {
                logger.warn(`Ignoring invalid COVERAGE_REGRESSION_THRESHOLD: ${env.COVERAGE_REGRESSION_THRESHOLD}`);
            }
        }
        if (env.COVERAGE_TEST_COUNT_COMMAND) {
            config.test_count.command = env.COVERAGE_TEST_COUNT_COMMAND;
        }
    }
}
