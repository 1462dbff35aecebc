import { cosmiconfig } from 'cosmiconfig';
import type pino from 'pino';
import { z } from 'zod';
import { DEFAULT_CONFIG, type AppConfig } from '../types/index.js';
import { COMPANY_TERMS } from '../filter/vocabulary.js';
import { getLogger } from './logger.js';

export const CONFIG_FILE = 'biocorp-papers.config.json';

export const configFileSchema = z
    .object({
        email: z.string().email().optional(),
        tool: z.string().min(1).optional(),
        maxResults: z.number().int().min(1).max(10000).optional(),
        timeoutMs: z.number().int().min(1).optional(),
        companyTerms: z.array(z.string().min(1)).min(1).optional(),
        logLevel: z.enum(['silent', 'error', 'warn', 'info', 'debug']).optional(),
        jsonLogs: z.boolean().optional(),
    })
    .strict();

/**
 * Load configuration from biocorp-papers.config.json using cosmiconfig.
 * Returns null if no config file is found or if the file does not validate.
 */
async function loadConfigFile(logger: pino.Logger, searchFrom?: string): Promise<Partial<AppConfig> | null> {
    const explorer = cosmiconfig('biocorp-papers', {
        searchPlaces: [CONFIG_FILE],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (!result || result.isEmpty) return null;

        const parsed = configFileSchema.safeParse(result.config);
        if (!parsed.success) {
            logger.warn(
                { path: result.filepath, issues: parsed.error.issues },
                'Invalid config file, using defaults'
            );
            return null;
        }

        logger.debug({ path: result.filepath }, 'Loaded config file');
        return parsed.data;
    } catch (error) {
        logger.warn({ err: error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(env: NodeJS.ProcessEnv): Partial<AppConfig> {
    const config: Partial<AppConfig> = {};

    const email = env['NCBI_EMAIL'];
    if (email) {
        config.email = email;
    }

    return config;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 *
 * CLI flags must only carry keys the user actually set. Problems with the
 * config file are reported through `options.logger`, else the shared logger.
 */
export async function resolveConfig(
    cliFlags: Partial<AppConfig>,
    options: { env?: NodeJS.ProcessEnv; searchFrom?: string; logger?: pino.Logger } = {}
): Promise<AppConfig> {
    const fileConfig = await loadConfigFile(options.logger ?? getLogger(), options.searchFrom);
    const envConfig = loadEnvVars(options.env ?? process.env);

    return {
        ...DEFAULT_CONFIG,
        companyTerms: [...COMPANY_TERMS],
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
    };
}
