import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import {
    DEFAULT_CONFIG,
    SYNTHETIC_KINDS,
    type EtlConfig,
    type EtlConfigInput,
} from '../types/index.js';
import { ValidationError } from './errors.js';
import { getLogger } from './logger.js';

// ─── Schemas ──────────────────────────────────────────────

const RangeSchema = z.object({
    min: z.number().int().min(0),
    max: z.number().int().min(0),
});

const DownloadSchema = z.object({
    query: z.string().optional(),
    minCitations: z.number().int().min(0),
    year: z.string().min(1),
    limit: z.number().int().min(1),
    batchSize: z.number().int().min(1).nullable(),
    maxRetries: z.number().int().min(0),
    fieldsOfStudy: z.array(z.string().min(1)).optional(),
    affiliations: z.boolean(),
});

const SynthesizeSchema = z.object({
    kinds: z.array(z.enum(SYNTHETIC_KINDS)),
    seed: z.number().int(),
    countries: z.array(z.string().min(1)),
    reviewersPerPaper: RangeSchema,
    keywordsPerPaper: RangeSchema,
});

const LoadSchema = z.object({
    enabled: z.boolean(),
    uri: z.string().min(1),
    user: z.string().min(1),
    password: z.string().optional(),
    database: z.string().min(1),
    script: z.string().min(1),
});

const HttpSchema = z.object({
    requestsPerSecond: z.number().positive(),
    timeoutMs: z.number().int().positive(),
    initialBackoffMs: z.number().int().min(0),
    maxBackoffMs: z.number().int().min(0),
});

const topLevel = {
    rawDir: z.string().min(1),
    importDir: z.string().min(1),
    logsDir: z.string().min(1),
    tracker: z.enum(['file', 'sqlite']),
    trackerDb: z.string().min(1),
    prepareBatchSize: z.number().int().min(1),
    malformedRecords: z.enum(['skip', 'abort']),
    logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']),
    jsonLogs: z.boolean(),
};

/** Shape of `citeload.config.json`: every key optional, unknown keys rejected */
const FileConfigSchema: z.ZodType<EtlConfigInput, z.ZodTypeDef, unknown> = z
    .object({
        ...topLevel,
        download: DownloadSchema.partial(),
        synthesize: SynthesizeSchema.partial(),
        load: LoadSchema.partial(),
        http: HttpSchema.partial(),
    })
    .partial()
    .strict();

const EtlConfigSchema: z.ZodType<EtlConfig, z.ZodTypeDef, unknown> = z
    .object({
        ...topLevel,
        download: DownloadSchema,
        synthesize: SynthesizeSchema,
        load: LoadSchema,
        http: HttpSchema,
    })
    .superRefine((config, ctx) => {
        for (const key of ['reviewersPerPaper', 'keywordsPerPaper'] as const) {
            const range = config.synthesize[key];
            if (range.min > range.max) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['synthesize', key],
                    message: `min (${range.min}) must not exceed max (${range.max})`,
                });
            }
        }
    });

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

// ─── Sources ──────────────────────────────────────────────

/**
 * Load configuration from citeload.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 * @throws ValidationError when the file exists but is unreadable or invalid
 */
async function loadConfigFile(cwd?: string): Promise<EtlConfigInput | null> {
    const explorer = cosmiconfig('citeload', {
        searchPlaces: ['citeload.config.json'],
    });

    let result: Awaited<ReturnType<typeof explorer.search>>;
    try {
        result = await explorer.search(cwd);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ValidationError('Could not read config file', [reason]);
    }

    if (!result || result.isEmpty) return null;

    const parsed = FileConfigSchema.safeParse(result.config);
    if (!parsed.success) {
        throw new ValidationError(`Invalid config file ${result.filepath}`, formatIssues(parsed.error));
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Read the settings that can come from the environment.
 * The Semantic Scholar API key is read where it is used (see getApiKey).
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): EtlConfigInput {
    const issues: string[] = [];
    const text = (name: string): string | undefined => {
        const value = env[name]?.trim();
        return value ? value : undefined;
    };
    const integer = (name: string): number | undefined => {
        const value = text(name);
        if (value === undefined) return undefined;
        const parsed = Number(value);
        if (!Number.isInteger(parsed)) {
            issues.push(`${name} must be an integer (got "${value}")`);
            return undefined;
        }
        return parsed;
    };
    const list = (name: string): string[] | undefined => {
        const items = text(name)
            ?.split(',')
            .map((item) => item.trim())
            .filter((item) => item.length > 0);
        return items && items.length > 0 ? items : undefined;
    };

    const download: NonNullable<EtlConfigInput['download']> = {
        query: text('S2_QUERY'),
        minCitations: integer('S2_MIN_CITATIONS'),
        year: text('S2_PUBLICATION_YEAR'),
        limit: integer('S2_LIMIT'),
        maxRetries: integer('S2_MAX_RETRIES'),
        batchSize: integer('S2_BATCH_SIZE'),
        fieldsOfStudy: list('S2_FIELDS_OF_STUDY'),
    };
    const load: NonNullable<EtlConfigInput['load']> = {
        uri: text('NEO4J_URI'),
        user: text('NEO4J_USER'),
        password: text('NEO4J_PASSWORD'),
        database: text('NEO4J_DATABASE'),
    };

    if (issues.length > 0) {
        throw new ValidationError('Invalid environment', issues);
    }

    return { download: withoutUndefined(download), load: withoutUndefined(load) };
}

function withoutUndefined<T extends object>(value: T | undefined): Partial<T> {
    const result: Partial<T> = {};
    if (!value) return result;
    for (const key of Object.keys(value)) {
        if (isKeyOf(value, key) && value[key] !== undefined) {
            result[key] = value[key];
        }
    }
    return result;
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
    return key in value;
}

// ─── Merge ────────────────────────────────────────────────

/**
 * Merge partial configs, later layers winning. Nested sections merge per key.
 */
export function mergeConfig(base: EtlConfig, ...layers: Array<EtlConfigInput | null>): EtlConfig {
    let merged = base;
    for (const layer of layers) {
        if (!layer) continue;
        const { download, synthesize, load, http, ...rest } = layer;
        merged = {
            ...merged,
            ...withoutUndefined(rest),
            download: { ...merged.download, ...withoutUndefined(download) },
            synthesize: { ...merged.synthesize, ...withoutUndefined(synthesize) },
            load: { ...merged.load, ...withoutUndefined(load) },
            http: { ...merged.http, ...withoutUndefined(http) },
        };
    }
    return merged;
}

/**
 * Resolve the run configuration.
 * Precedence: CLI flags > environment variables > config file > defaults
 * @throws ValidationError listing every invalid setting
 */
export async function resolveConfig(
    cliFlags: EtlConfigInput,
    options: { cwd?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<EtlConfig> {
    const fileConfig = await loadConfigFile(options.cwd);
    const envConfig = loadEnvVars(options.env);

    const merged = mergeConfig(DEFAULT_CONFIG, fileConfig, envConfig, cliFlags);

    const parsed = EtlConfigSchema.safeParse(merged);
    if (!parsed.success) {
        throw new ValidationError('Invalid configuration', formatIssues(parsed.error));
    }
    return parsed.data;
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 * @returns The API key or undefined
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name];
}
