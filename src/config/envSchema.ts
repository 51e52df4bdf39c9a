import { ZodError, z } from 'zod';

const boolUnlessFalse = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return v.trim().toLowerCase() !== 'false';
    return v;
}, z.boolean());

/** Blank strings count as unset so the inner default applies. */
function upperOrUnset<T extends z.ZodTypeAny>(schema: T) {
    return z.preprocess((v) => {
        if (typeof v !== 'string') return v;
        const trimmed = v.trim();
        return trimmed === '' ? undefined : trimmed.toUpperCase();
    }, schema);
}

function numFromEnv(fallback: number, schema: z.ZodNumber = z.number()) {
    return z.preprocess((v) => {
        if (typeof v !== 'string') return v;
        return v.trim() === '' ? undefined : Number(v);
    }, schema.finite().default(fallback));
}

const intFromEnv = (min: number, fallback: number) => numFromEnv(fallback, z.number().int().min(min));

export const envSchema = z.object({
    /** Snapshot file; an empty value keeps pool state in memory only. */
    PROXY_STATE_PATH: z.string().default('storage/proxy_pool.json'),
    PROXY_POOL_SIZE: intFromEnv(1, 10),
    PROXY_TEST_TIMEOUT_MS: intFromEnv(100, 5000),
    PROXY_TEST_CONCURRENCY: intFromEnv(1, 20),
    PROXY_MAX_PER_SOURCE: intFromEnv(1, 200),
    PROXY_COUNTRY: upperOrUnset(
        z.string().regex(/^(ALL|[A-Z]{2})$/, 'Expected ALL or a two-letter country code').default('ALL')
    ),
    PROXY_MAX_FAILURES: intFromEnv(1, 3),
    PROXY_ALLOW_DIRECT: boolUnlessFalse.default(true),
    PROXY_STATE_MAX_AGE_HOURS: numFromEnv(24, z.number().positive()),

    MAX_TIMEOUT_RETRIES: intFromEnv(0, 3),
    ERROR_WINDOW_MS: intFromEnv(1000, 300_000),
    TARGET_URL_PATTERN: z.string().min(1).default('google.com/maps'),
    LISTINGS_PER_PROXY: intFromEnv(0, 0),

    LOG_LEVEL: upperOrUnset(z.enum(['DEBUG', 'INFO', 'WARNING', 'ERROR', 'OFF']).default('INFO')),
});

export type Env = z.infer<typeof envSchema>;

/** Validates `raw` and throws one readable Error listing every bad variable. */
export function parseEnv(raw: NodeJS.ProcessEnv): Env {
    try {
        return envSchema.parse(raw);
    } catch (err) {
        if (err instanceof ZodError) {
            const lines = err.issues.map((i) => {
                const key = i.path.join('.') || '(root)';
                return `- ${key}: ${i.message}`;
            });
            throw new Error('Invalid environment variables:\n' + lines.join('\n'));
        }
        throw err;
    }
}
