/**
 * Run Configuration
 *
 * Centralized configuration for rtl-forge. Values merge, lowest first:
 * defaults, JSON config file, environment, explicit overrides (CLI flags).
 * The merged config is validated and frozen; it never changes during a run.
 */

import * as fs from 'fs';
import * as path from 'path';
import { createLogger } from './logger';
import { ConfigError, errorMessage } from './structured_error';
import { SchemaValidator, JsonSchema, formatValidationErrors } from './schema_validator';

const log = createLogger('config');

export type Provider = 'ollama' | 'openrouter';

export interface RunConfig {
    provider: Provider;
    modelId: string;
    apiKey: string;
    ollamaHost: string;
    maxRetries: number;
    workDir: string;
    outputDir: string;
    ledgerPath: string;
    saveOnSuccess: boolean;
    showDiffs: boolean;
    keepWorkDirs: boolean;
    verifyTimeoutMs: number;
    compileTimeoutMs: number;
    runTimeoutMs: number;
    maxParallel: number;
    /** Model calls in flight at once, across all nodes */
    maxConcurrentCalls: number;
    compiler: string;
    simulator: string;
    /** Appended to the system prompt of every planning and generation call */
    extraInstructions: string;
}

export const DEFAULT_CONFIG_FILE = 'rtlforge.config.json';

export const DEFAULT_MODEL_ID = 'qwen2.5-coder:14b';

export const DEFAULTS: Readonly<Omit<RunConfig, 'ledgerPath'>> = {
    provider: 'ollama',
    modelId: DEFAULT_MODEL_ID,
    apiKey: '',
    ollamaHost: 'http://127.0.0.1:11434',
    maxRetries: 5,
    workDir: 'build',
    outputDir: 'designs',
    saveOnSuccess: true,
    showDiffs: true,
    keepWorkDirs: false,
    verifyTimeoutMs: 10_000,
    compileTimeoutMs: 30_000,
    runTimeoutMs: 30 * 60_000,
    maxParallel: 1,
    maxConcurrentCalls: 1,
    compiler: 'iverilog',
    simulator: 'vvp',
    extraInstructions: '',
};

// Timeouts (milliseconds)
export const TIMEOUTS = {
    MODEL_CALL_MS: 120_000,
};

// Bounds on text forwarded into repair prompts
export const DIAGNOSTIC_LIMITS = {
    CONTEXT_LINES: 2,
    MAX_EVIDENCE_CHARS: 2000,
    MAX_FAILING_VECTORS: 8,
};

// Max output tokens per model call
export const MAX_OUTPUT_TOKENS = {
    DECOMPOSE: parseInt(process.env.RTLFORGE_MAX_TOKENS_PLAN || '4096', 10),
    MODULE: parseInt(process.env.RTLFORGE_MAX_TOKENS_MODULE || '8192', 10),
};

const CONFIG_SCHEMA: JsonSchema = {
    type: 'object',
    required: [
        'provider', 'modelId', 'apiKey', 'ollamaHost', 'maxRetries', 'workDir', 'outputDir',
        'ledgerPath', 'saveOnSuccess', 'showDiffs', 'keepWorkDirs', 'verifyTimeoutMs',
        'compileTimeoutMs', 'runTimeoutMs', 'maxParallel', 'maxConcurrentCalls', 'compiler', 'simulator',
        'extraInstructions',
    ],
    properties: {
        provider: { type: 'string', enum: ['ollama', 'openrouter'] },
        modelId: { type: 'string', minLength: 1 },
        apiKey: { type: 'string' },
        ollamaHost: { type: 'string', pattern: '^https?://' },
        maxRetries: { type: 'integer', minimum: 1 },
        workDir: { type: 'string', minLength: 1 },
        outputDir: { type: 'string', minLength: 1 },
        ledgerPath: { type: 'string', minLength: 1 },
        saveOnSuccess: { type: 'boolean' },
        showDiffs: { type: 'boolean' },
        keepWorkDirs: { type: 'boolean' },
        verifyTimeoutMs: { type: 'integer', minimum: 1 },
        compileTimeoutMs: { type: 'integer', minimum: 1 },
        runTimeoutMs: { type: 'integer', minimum: 1 },
        maxParallel: { type: 'integer', minimum: 1 },
        maxConcurrentCalls: { type: 'integer', minimum: 1 },
        compiler: { type: 'string', minLength: 1 },
        simulator: { type: 'string', minLength: 1 },
        extraInstructions: { type: 'string' },
    },
};

const validator = new SchemaValidator();
validator.registerSchema('run_config', CONFIG_SCHEMA);

export interface LoadConfigOptions {
    /** Explicit config file; when given it must exist. */
    configPath?: string;
    overrides?: Partial<RunConfig>;
    env?: NodeJS.ProcessEnv;
    cwd?: string;
}

function readConfigFile(filePath: string, required: boolean): Record<string, unknown> {
    if (!fs.existsSync(filePath)) {
        if (required) throw new ConfigError(`Config file not found: ${filePath}`, { path: filePath });
        return {};
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (e) {
        throw new ConfigError(`Config file is not valid JSON: ${filePath}`, { path: filePath, error: errorMessage(e) });
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new ConfigError(`Config file must hold a JSON object: ${filePath}`, { path: filePath });
    }
    log.debug('Config file loaded', { path: filePath });
    return { ...parsed };
}

function parseIntEnv(name: string, raw: string | undefined): number | undefined {
    if (raw === undefined || raw.trim() === '') return undefined;
    const n = Number(raw);
    if (!Number.isInteger(n)) {
        throw new ConfigError(`${name} must be an integer, got "${raw}"`, { variable: name });
    }
    return n;
}

function parseBoolEnv(raw: string | undefined): boolean | undefined {
    if (raw === undefined || raw.trim() === '') return undefined;
    return raw === '1' || raw.toLowerCase() === 'true';
}

function fromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
    const out: Record<string, unknown> = {
        provider: env.RTLFORGE_PROVIDER,
        modelId: env.RTLFORGE_MODEL,
        apiKey: env.OPENROUTER_API_KEY,
        ollamaHost: env.OLLAMA_HOST,
        maxRetries: parseIntEnv('RTLFORGE_MAX_RETRIES', env.RTLFORGE_MAX_RETRIES),
        workDir: env.RTLFORGE_WORK_DIR,
        outputDir: env.RTLFORGE_OUTPUT_DIR,
        ledgerPath: env.RTLFORGE_LEDGER_PATH,
        saveOnSuccess: parseBoolEnv(env.RTLFORGE_SAVE_ON_SUCCESS),
        showDiffs: parseBoolEnv(env.RTLFORGE_SHOW_DIFFS),
        verifyTimeoutMs: parseIntEnv('RTLFORGE_VERIFY_TIMEOUT_MS', env.RTLFORGE_VERIFY_TIMEOUT_MS),
        compileTimeoutMs: parseIntEnv('RTLFORGE_COMPILE_TIMEOUT_MS', env.RTLFORGE_COMPILE_TIMEOUT_MS),
        runTimeoutMs: parseIntEnv('RTLFORGE_RUN_TIMEOUT_MS', env.RTLFORGE_RUN_TIMEOUT_MS),
        maxParallel: parseIntEnv('RTLFORGE_MAX_PARALLEL', env.RTLFORGE_MAX_PARALLEL),
        maxConcurrentCalls: parseIntEnv('RTLFORGE_MAX_CONCURRENT_CALLS', env.RTLFORGE_MAX_CONCURRENT_CALLS),
        extraInstructions: env.RTLFORGE_EXTRA_INSTRUCTIONS,
    };
    return dropUndefined(out);
}

function dropUndefined(input: Record<string, unknown>): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
        if (value !== undefined && value !== '') out[key] = value;
    }
    return out;
}

function isRunConfig(value: Record<string, unknown>): value is Record<string, unknown> & RunConfig {
    return validator.validate(value, 'run_config').valid;
}

/**
 * Load the run configuration. Read once at run start.
 */
export function loadRunConfig(options: LoadConfigOptions = {}): Readonly<RunConfig> {
    const cwd = options.cwd ?? process.cwd();
    const env = options.env ?? process.env;
    const filePath = path.resolve(cwd, options.configPath ?? DEFAULT_CONFIG_FILE);

    const merged: Record<string, unknown> = {
        ...DEFAULTS,
        ...readConfigFile(filePath, options.configPath !== undefined),
        ...fromEnv(env),
        ...dropUndefined({ ...options.overrides }),
    };
    if (typeof merged.ledgerPath !== 'string' || merged.ledgerPath === '') {
        merged.ledgerPath = path.join(String(merged.workDir), 'rtlforge.db');
    }

    const result = validator.validate(merged, 'run_config');
    if (!result.valid || !isRunConfig(merged)) {
        throw new ConfigError(`Invalid configuration: ${formatValidationErrors(result.errors)}`, {
            errors: result.errors,
        });
    }

    if (merged.provider === 'openrouter' && !merged.apiKey) {
        log.warn('No API key configured. Set OPENROUTER_API_KEY environment variable.');
    }

    const config: RunConfig = {
        provider: merged.provider,
        modelId: merged.modelId,
        apiKey: merged.apiKey,
        ollamaHost: merged.ollamaHost,
        maxRetries: merged.maxRetries,
        workDir: merged.workDir,
        outputDir: merged.outputDir,
        ledgerPath: merged.ledgerPath,
        saveOnSuccess: merged.saveOnSuccess,
        showDiffs: merged.showDiffs,
        keepWorkDirs: merged.keepWorkDirs,
        verifyTimeoutMs: merged.verifyTimeoutMs,
        compileTimeoutMs: merged.compileTimeoutMs,
        runTimeoutMs: merged.runTimeoutMs,
        maxParallel: merged.maxParallel,
        maxConcurrentCalls: merged.maxConcurrentCalls,
        compiler: merged.compiler,
        simulator: merged.simulator,
        extraInstructions: merged.extraInstructions,
    };
    return Object.freeze(config);
}
