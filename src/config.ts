/**
 * Configuration management for the turbine assistant
 */

import { readFile, writeFile } from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigError, describeError } from './errors.js';
import {
    envBool,
    envList,
    envNonNegativeInt,
    envPositiveInt,
    envPositiveNumber,
    envString,
    envUnitInterval,
} from './utils/env.js';

export type UiMode = 'minimal' | 'fancy' | 'plain';

/**
 * Centralized default values for the assistant configuration.
 * Use these instead of hardcoding defaults throughout the codebase.
 */
export const DEFAULTS = {
    region: 'us-east-1',
    searchIndex: 'turbine-documents',
    searchTimeoutMs: 25_000,
    searchTopK: 5,
    neighborWindow: 1,
    embeddingModel: 'amazon.titan-embed-text-v1',
    bedrockTimeoutMs: 60_000,
    telemetryTimeoutMs: 5_000,
    telemetryLookbackMinutes: 60,
    telemetryVariables: ['oil_pressure', 'oil_temperature', 'exhaust_gas_temperature', 'vibration', 'shaft_speed'],
    externalReasoningTimeoutMs: 30_000,
    guardrailVersion: 'DRAFT',
    minConfidence: 0.6,
    documentUrlTtlSeconds: 3600,
    sessionDirectory: '.turbine-sessions',
    sessionTtlDays: 30,
    uiMode: 'fancy' satisfies UiMode,
    renderMarkdown: true,
} as const;

export const CONFIDENCE_DEFAULTS = {
    noCitationBase: 0.4,
    base: 0.55,
    relevanceWeight: 0.35,
    telemetryBonus: 0.05,
    cap: 0.98,
} as const;

export interface SearchConfig {
    endpoint?: string;
    index: string;
    username?: string;
    password?: string;
    timeoutMs: number;
    topK: number;
    /** Chunks fetched on each side of a hit for context stitching */
    neighborWindow: number;
}

export interface TelemetryConfig {
    enabled: boolean;
    endpoint?: string;
    apiKey?: string;
    timeoutMs: number;
    lookbackMinutes: number;
    variables: string[];
}

export interface ConfidenceConfig {
    noCitationBase: number;
    base: number;
    relevanceWeight: number;
    telemetryBonus: number;
    cap: number;
    /** Answers scored below this get a warning appended */
    minimum: number;
}

export interface AppConfig {
    region: string;
    search: SearchConfig;
    embeddingModel: string;
    /** Per-call timeout for embedding, model invocation and guardrail calls */
    bedrockTimeoutMs: number;
    telemetry: TelemetryConfig;
    reasoning: {
        /** LLM_MODEL_KEY: overrides the registry default */
        modelKeyOverride?: string;
        externalTimeoutMs: number;
    };
    guardrail: {
        id?: string;
        version: string;
    };
    confidence: ConfidenceConfig;
    documents: {
        bucket?: string;
        urlTtlSeconds: number;
    };
    sessions: {
        directory: string;
        ttlDays: number;
    };
    modelConfigPath: string;
    turbineModelsPath: string;
    uiMode: UiMode;
    renderMarkdown: boolean;
}

const PACKAGE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

export const DEFAULT_MODEL_CONFIG_PATH = path.join(PACKAGE_ROOT, 'config', 'models.json');
export const DEFAULT_TURBINE_MODELS_PATH = path.join(PACKAGE_ROOT, 'config', 'turbine-models.json');

function envUiMode(value: string | undefined): UiMode {
    const normalized = value?.trim().toLowerCase();
    if (normalized === 'fancy') return 'fancy';
    if (normalized === 'plain') return 'plain';
    if (normalized === 'minimal') return 'minimal';
    return DEFAULTS.uiMode;
}

function resolvePath(value: string | undefined, fallback: string): string {
    const explicit = envString(value);
    if (!explicit) return fallback;
    return path.isAbsolute(explicit) ? explicit : path.join(process.cwd(), explicit);
}

export function loadConfig(): AppConfig {
    const env = process.env;

    return {
        region: envString(env.AWS_REGION) ?? DEFAULTS.region,
        search: {
            endpoint: envString(env.OPENSEARCH_ENDPOINT),
            index: envString(env.OPENSEARCH_INDEX) ?? DEFAULTS.searchIndex,
            username: envString(env.OPENSEARCH_USERNAME),
            password: envString(env.OPENSEARCH_PASSWORD),
            timeoutMs: envPositiveInt(env.SEARCH_TIMEOUT_MS, DEFAULTS.searchTimeoutMs),
            topK: envPositiveInt(env.RETRIEVAL_TOP_K, DEFAULTS.searchTopK),
            neighborWindow: envNonNegativeInt(env.NEIGHBOR_WINDOW, DEFAULTS.neighborWindow),
        },
        embeddingModel: envString(env.EMBEDDING_MODEL) ?? DEFAULTS.embeddingModel,
        bedrockTimeoutMs: envPositiveInt(env.BEDROCK_TIMEOUT_MS, DEFAULTS.bedrockTimeoutMs),
        telemetry: {
            enabled: envBool(env.TELEMETRY_ENABLED, false),
            endpoint: envString(env.TELEMETRY_ENDPOINT),
            apiKey: envString(env.TELEMETRY_API_KEY),
            timeoutMs: envPositiveInt(env.TELEMETRY_TIMEOUT_MS, DEFAULTS.telemetryTimeoutMs),
            lookbackMinutes: envPositiveInt(env.TELEMETRY_LOOKBACK_MINUTES, DEFAULTS.telemetryLookbackMinutes),
            variables: envList(env.TELEMETRY_VARIABLES, DEFAULTS.telemetryVariables),
        },
        reasoning: {
            modelKeyOverride: envString(env.LLM_MODEL_KEY),
            externalTimeoutMs: envPositiveInt(env.GROK_TIMEOUT_MS, DEFAULTS.externalReasoningTimeoutMs),
        },
        guardrail: {
            id: envString(env.GUARDRAIL_ID),
            version: envString(env.GUARDRAIL_VERSION) ?? DEFAULTS.guardrailVersion,
        },
        confidence: {
            noCitationBase: envUnitInterval(env.CONFIDENCE_NO_CITATION_BASE, CONFIDENCE_DEFAULTS.noCitationBase),
            base: envUnitInterval(env.CONFIDENCE_BASE, CONFIDENCE_DEFAULTS.base),
            relevanceWeight: envUnitInterval(env.CONFIDENCE_RELEVANCE_WEIGHT, CONFIDENCE_DEFAULTS.relevanceWeight),
            telemetryBonus: envUnitInterval(env.CONFIDENCE_TELEMETRY_BONUS, CONFIDENCE_DEFAULTS.telemetryBonus),
            cap: envUnitInterval(env.CONFIDENCE_CAP, CONFIDENCE_DEFAULTS.cap),
            minimum: envUnitInterval(env.MIN_CONFIDENCE, DEFAULTS.minConfidence),
        },
        documents: {
            bucket: envString(env.DOCUMENTS_BUCKET),
            urlTtlSeconds: envPositiveInt(env.DOCUMENT_URL_TTL_SECONDS, DEFAULTS.documentUrlTtlSeconds),
        },
        sessions: {
            directory: resolvePath(env.SESSION_STORE_DIR, path.join(process.cwd(), DEFAULTS.sessionDirectory)),
            ttlDays: envPositiveNumber(env.SESSION_TTL_DAYS, DEFAULTS.sessionTtlDays),
        },
        modelConfigPath: resolvePath(env.MODEL_CONFIG_PATH, DEFAULT_MODEL_CONFIG_PATH),
        turbineModelsPath: resolvePath(env.TURBINE_MODELS_PATH, DEFAULT_TURBINE_MODELS_PATH),
        uiMode: envUiMode(env.UI_MODE),
        renderMarkdown: envBool(env.RENDER_MARKDOWN, DEFAULTS.renderMarkdown),
    };
}

export interface ConfigRequirements {
    search?: boolean;
}

export function validateConfig(
    config: AppConfig,
    required: ConfigRequirements = { search: true }
): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (required.search !== false && !config.search.endpoint) {
        errors.push('OPENSEARCH_ENDPOINT is not set');
    }

    if (config.telemetry.enabled && !config.telemetry.endpoint) {
        errors.push('TELEMETRY_ENDPOINT is not set (telemetry is enabled)');
    }

    if (config.confidence.base + config.confidence.relevanceWeight > 1) {
        errors.push('CONFIDENCE_BASE + CONFIDENCE_RELEVANCE_WEIGHT must not exceed 1');
    }

    return {
        valid: errors.length === 0,
        errors,
    };
}

// ---------------------------------------------------------------------------
// Model registry (config/models.json)
// ---------------------------------------------------------------------------

const InferenceSchema = z.object({
    maxTokens: z.number().int().positive().default(2048),
    temperature: z.number().min(0).max(2).default(0.7),
    topP: z.number().min(0).max(1).optional(),
});

const BackendSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('managed-llm'),
        modelId: z.string().min(1),
    }),
    z.object({
        type: z.literal('external-http'),
        endpoint: z.string().url(),
        model: z.string().min(1),
        requiredEnv: z.array(z.string().min(1)).default([]),
    }),
]);

const ModelEntrySchema = z.object({
    key: z.string().min(1),
    displayName: z.string().min(1),
    backend: BackendSchema,
    inference: InferenceSchema.default({}),
});

const ModelRegistrySchema = z.object({
    default: z.string().optional(),
    fallback: z.string().optional(),
    models: z.array(ModelEntrySchema),
});

export type ModelBackend = z.infer<typeof BackendSchema>;
export type ModelEntry = z.infer<typeof ModelEntrySchema>;
export type ModelRegistryConfig = z.infer<typeof ModelRegistrySchema>;

function formatIssues(error: z.ZodError): string {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join(', ');
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readJsonFile(filePath: string, configKey: string): Promise<unknown> {
    let raw: string;
    try {
        raw = await readFile(filePath, 'utf8');
    } catch (error) {
        if (isNotFound(error)) {
            throw new ConfigError(`Configuration file not found: ${filePath}`, configKey);
        }
        throw error;
    }

    try {
        return JSON.parse(raw);
    } catch (error) {
        throw new ConfigError(`Invalid JSON in ${filePath}: ${describeError(error)}`, configKey);
    }
}

export function parseModelRegistry(raw: unknown): ModelRegistryConfig {
    const result = ModelRegistrySchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigError(`Invalid model registry: ${formatIssues(result.error)}`, 'MODEL_CONFIG_PATH');
    }

    const seen = new Set<string>();
    for (const entry of result.data.models) {
        if (seen.has(entry.key)) {
            throw new ConfigError(`Invalid model registry: duplicate key "${entry.key}"`, 'MODEL_CONFIG_PATH');
        }
        seen.add(entry.key);
    }

    return result.data;
}

export async function loadModelRegistry(filePath: string = DEFAULT_MODEL_CONFIG_PATH): Promise<ModelRegistryConfig> {
    return parseModelRegistry(await readJsonFile(filePath, 'MODEL_CONFIG_PATH'));
}

// ---------------------------------------------------------------------------
// Turbine alias table (config/turbine-models.json)
// ---------------------------------------------------------------------------

const TurbineModelTableSchema = z.object({
    matchStrategy: z.enum(['declaration-order', 'longest-alias']).default('declaration-order'),
    models: z.array(z.object({
        id: z.string().min(1),
        aliases: z.array(z.string().trim().min(1)).min(1),
    })),
});

export type TurbineModelTable = z.infer<typeof TurbineModelTableSchema>;
export type AliasMatchStrategy = TurbineModelTable['matchStrategy'];

export function parseTurbineModelTable(raw: unknown): TurbineModelTable {
    const result = TurbineModelTableSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigError(`Invalid turbine model table: ${formatIssues(result.error)}`, 'TURBINE_MODELS_PATH');
    }
    return result.data;
}

export async function loadTurbineModelTable(filePath: string = DEFAULT_TURBINE_MODELS_PATH): Promise<TurbineModelTable> {
    return parseTurbineModelTable(await readJsonFile(filePath, 'TURBINE_MODELS_PATH'));
}

// ---------------------------------------------------------------------------
// .env persistence and interactive setup
// ---------------------------------------------------------------------------

function escapeEnvValue(value: string): string {
    const trimmed = value.trim();
    if (trimmed === '') return '""';
    const needsQuotes = /[\s#"'\\]/.test(trimmed);
    if (!needsQuotes) return trimmed;
    const escaped = trimmed
        .replace(/\\/g, '\\\\')
        .replace(/\n/g, '\\n')
        .replace(/"/g, '\\"');
    return `"${escaped}"`;
}

async function updateEnvFile(envPath: string, updates: Record<string, string>): Promise<void> {
    let existing = '';
    try {
        existing = await readFile(envPath, 'utf8');
    } catch (error) {
        if (!isNotFound(error)) throw error;
    }

    const lines = existing === '' ? [] : existing.split(/\r?\n/);
    const touched = new Set<string>();

    const nextLines = lines.map((line) => {
        if (line.trim().startsWith('#')) return line;
        const match = line.match(/^\s*([A-Z0-9_]+)\s*=\s*(.*)\s*$/);
        if (!match) return line;

        const key = match[1];
        if (!(key in updates)) return line;

        touched.add(key);
        return `${key}=${escapeEnvValue(updates[key])}`;
    });

    if (nextLines.length > 0 && nextLines[nextLines.length - 1].trim() !== '') {
        nextLines.push('');
    }

    for (const [key, value] of Object.entries(updates)) {
        if (touched.has(key)) continue;
        nextLines.push(`${key}=${escapeEnvValue(value)}`);
    }

    const finalContents = nextLines.join('\n').replace(/\n*$/, '\n');
    const isNewFile = existing === '';
    const writeOptions: { encoding: BufferEncoding; mode?: number } = { encoding: 'utf8' };
    if (isNewFile) writeOptions.mode = 0o600;
    await writeFile(envPath, finalContents, writeOptions);
}

export function getDefaultEnvPath(): string {
    const explicit = process.env.TURBINE_ENV_PATH?.trim();
    if (explicit) return path.isAbsolute(explicit) ? explicit : path.join(process.cwd(), explicit);
    return path.join(process.cwd(), '.env');
}

export async function writeEnvVars(
    updates: Record<string, string>,
    options: { envPath?: string } = {}
): Promise<void> {
    const envPath = options.envPath ?? getDefaultEnvPath();
    await updateEnvFile(envPath, updates);
    for (const [key, value] of Object.entries(updates)) {
        process.env[key] = value;
    }
}

type SetupAnswers = {
    opensearchEndpoint?: string;
    opensearchIndex?: string;
    region?: string;
    telemetryEnabled?: boolean;
    telemetryEndpoint?: string;
    guardrailId?: string;
    minConfidence?: string;
};

export async function ensureConfig(
    required: ConfigRequirements = { search: true },
    options: { envPath?: string; force?: boolean } = {}
): Promise<AppConfig> {
    const envPath = options.envPath ?? getDefaultEnvPath();
    const current = loadConfig();
    const validation = validateConfig(current, required);

    if (!options.force && validation.valid) return current;

    const canPrompt = Boolean(process.stdin.isTTY && process.stdout.isTTY);
    if (!canPrompt) {
        throw new ConfigError(`Missing configuration:\n${validation.errors.map(e => `  • ${e}`).join('\n')}`);
    }

    const inquirer = (await import('inquirer')).default;

    const answers = await inquirer.prompt<SetupAnswers>([
        {
            type: 'input',
            name: 'opensearchEndpoint',
            message: 'OpenSearch endpoint (https://...)',
            default: current.search.endpoint,
            when: () => Boolean(options.force || !current.search.endpoint),
            validate: (input: string) => input.trim().length > 0 || 'An OpenSearch endpoint is required',
        },
        {
            type: 'input',
            name: 'opensearchIndex',
            message: 'Document index name',
            default: current.search.index,
            when: () => Boolean(options.force),
        },
        {
            type: 'input',
            name: 'region',
            message: 'AWS region for Bedrock',
            default: current.region,
            when: () => Boolean(options.force),
        },
        {
            type: 'confirm',
            name: 'telemetryEnabled',
            message: 'Fetch live telemetry for detected turbines?',
            default: current.telemetry.enabled,
            when: () => Boolean(options.force),
        },
        {
            type: 'input',
            name: 'telemetryEndpoint',
            message: 'Telemetry gateway endpoint',
            default: current.telemetry.endpoint,
            when: (partial: SetupAnswers) =>
                (partial.telemetryEnabled ?? current.telemetry.enabled) && (Boolean(options.force) || !current.telemetry.endpoint),
            validate: (input: string) => input.trim().length > 0 || 'A telemetry endpoint is required when telemetry is enabled',
        },
        {
            type: 'input',
            name: 'guardrailId',
            message: 'Bedrock guardrail id (blank = skip guardrail)',
            default: current.guardrail.id ?? '',
            when: () => Boolean(options.force),
        },
        {
            type: 'input',
            name: 'minConfidence',
            message: 'Minimum confidence before a warning is added (0-1)',
            default: String(current.confidence.minimum),
            when: () => Boolean(options.force),
            validate: (input: string) => {
                const n = Number(input.trim());
                return (Number.isFinite(n) && n >= 0 && n <= 1) || 'Enter a number between 0 and 1';
            },
        },
    ]);

    const updates: Record<string, string> = {};
    if (answers.opensearchEndpoint !== undefined) updates.OPENSEARCH_ENDPOINT = answers.opensearchEndpoint.trim();
    if (answers.opensearchIndex !== undefined) updates.OPENSEARCH_INDEX = answers.opensearchIndex.trim();
    if (answers.region !== undefined) updates.AWS_REGION = answers.region.trim();
    if (answers.telemetryEnabled !== undefined) updates.TELEMETRY_ENABLED = answers.telemetryEnabled ? '1' : '0';
    if (answers.telemetryEndpoint !== undefined) updates.TELEMETRY_ENDPOINT = answers.telemetryEndpoint.trim();
    if (answers.guardrailId !== undefined) updates.GUARDRAIL_ID = answers.guardrailId.trim();
    if (answers.minConfidence !== undefined) updates.MIN_CONFIDENCE = answers.minConfidence.trim();

    if (Object.keys(updates).length > 0) {
        await writeEnvVars(updates, { envPath });
    }

    return loadConfig();
}
