import { z } from 'zod';

export interface QualityGateConfig {
    name: string;
    metric: string;
    threshold: number;
    operator: 'gte' | 'lte' | 'eq';
    enabled: boolean;
    severity: 'error' | 'warning';
}

/**
 * Configuration schema for coverage-sentinel
 */
export interface SentinelConfig {
    project_root: string;
    source_dir: string;
    test_dir: string;
    /** Auto-detected when unset */
    coverage_file?: string;
    output_dir: string;
    /** Defaults to <output_dir>/history */
    history_dir?: string;
    exclude_patterns: string[];
    quality_gates: QualityGateConfig[];
    regression: {
        threshold_percent: number;
        fail_on_regression: boolean;
    };
    tracking: {
        enabled: boolean;
        max_entries: number;
    };
    reports: {
        enabled: boolean;
        charts: boolean;
        title: string;
    };
    suggestions: {
        max_count: number;
    };
    test_count: {
        command?: string;
        timeout_ms: number;
    };
}

export const DEFAULT_CONFIG: SentinelConfig = {
    project_root: '.',
    source_dir: 'src',
    test_dir: 'tests',
    output_dir: 'coverage_reports',
    exclude_patterns: [],
    quality_gates: [
        { name: 'MinimumLineCoverage', metric: 'line_coverage', threshold: 80, operator: 'gte', enabled: true, severity: 'error' },
        { name: 'MinimumBranchCoverage', metric: 'branch_coverage', threshold: 70, operator: 'gte', enabled: true, severity: 'warning' },
        { name: 'MaximumCriticalGaps', metric: 'critical_gaps', threshold: 5, operator: 'lte', enabled: true, severity: 'error' },
        { name: 'MinimumOverallScore', metric: 'overall_score', threshold: 75, operator: 'gte', enabled: true, severity: 'warning' },
    ],
    regression: {
        threshold_percent: 5,
        fail_on_regression: true,
    },
    tracking: {
        enabled: true,
        max_entries: 100,
    },
    reports: {
        enabled: true,
        charts: true,
        title: 'Coverage Analysis Report',
    },
    suggestions: {
        max_count: 25,
    },
    test_count: {
        timeout_ms: 30000,
    },
};

const qualityGateSchema = z.object({
    name: z.string().min(1),
    metric: z.string().min(1),
    threshold: z.number(),
    operator: z.enum(['gte', 'lte', 'eq']).default('gte'),
    enabled: z.boolean().default(true),
    severity: z.enum(['error', 'warning']).default('error'),
});

/**
 * Shape of a config file; every key is optional and merged over DEFAULT_CONFIG
 */
export const configFileSchema = z.object({
    project_root: z.string().optional(),
    source_dir: z.string().optional(),
    test_dir: z.string().optional(),
    coverage_file: z.string().optional(),
    output_dir: z.string().optional(),
    history_dir: z.string().optional(),
    exclude_patterns: z.array(z.string()).optional(),
    quality_gates: z.array(qualityGateSchema).optional(),
    regression: z.object({
        threshold_percent: z.number().nonnegative().optional(),
        fail_on_regression: z.boolean().optional(),
    }).optional(),
    tracking: z.object({
        enabled: z.boolean().optional(),
        max_entries: z.number().int().positive().optional(),
    }).optional(),
    reports: z.object({
        enabled: z.boolean().optional(),
        charts: z.boolean().optional(),
        title: z.string().optional(),
    }).optional(),
    suggestions: z.object({
        max_count: z.number().int().nonnegative().optional(),
    }).optional(),
    test_count: z.object({
        command: z.string().optional(),
        timeout_ms: z.number().int().positive().optional(),
    }).optional(),
}).strict();

export type ConfigFile = z.infer<typeof configFileSchema>;
