import { z } from 'zod';
import { ConfigurationError } from './errors';
import { LATEST_KEY_VERSION } from './dictionary/KeyDictionary';
import { LATEST_PATH_VERSION } from './dictionary/PathDictionary';

/** Inconclusive compact responses tolerated before a call falls back. */
export const DEFAULT_MAX_INCONCLUSIVE_RESPONSES = 2;

/** Largest encoded body the compact channel carries (the CoAP default message size). */
export const DEFAULT_MAX_MESSAGE_SIZE = 1024;

export const DEFAULT_REQUEST_TIMEOUT = 35_000;

export const LowBandwidthConfigSchema = z.object({
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    /** Path dictionary version; clamped to the latest known generation */
    protocolVersion: z.number().int().default(LATEST_PATH_VERSION),
    /** Key dictionary version; clamped to the latest known generation */
    codecVersion: z.number().int().default(LATEST_KEY_VERSION),
    accessToken: z.string().optional(),
    maxMessageSize: z.number().int().positive().default(DEFAULT_MAX_MESSAGE_SIZE),
    requestTimeout: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT),
    maxInconclusiveResponses: z.number().int().nonnegative().default(DEFAULT_MAX_INCONCLUSIVE_RESPONSES),
    debug: z.boolean().default(false),
});

/** What callers pass in; defaults filled by `parseConfig`. */
export type LowBandwidthConfig = z.input<typeof LowBandwidthConfigSchema>;

export type ResolvedConfig = z.output<typeof LowBandwidthConfigSchema>;

/**
 * @throws {ConfigurationError} listing every invalid field
 */
export function parseConfig(config: LowBandwidthConfig): ResolvedConfig {
    const result = LowBandwidthConfigSchema.safeParse(config);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join(', ');
        throw new ConfigurationError(`Invalid low-bandwidth config: ${issues}`);
    }
    return result.data;
}
