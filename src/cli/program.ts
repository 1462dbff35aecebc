import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger } from '../utils/logger.js';
import { createHttpClient } from '../utils/http-client.js';
import { PubMedAdapter } from '../sources/pubmed.js';
import { runPipeline } from '../pipeline/pipeline.js';
import { OutputWriteError } from '../exporters/csv.js';
import { DEFAULT_CONFIG, LOG_LEVELS, type AppConfig, type LiteratureSource, type LogLevel } from '../types/index.js';

export const VERSION = '1.0.0';

type CliOptions = {
    debug: boolean;
    file?: string;
    maxResults?: number;
    email?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
};

export interface CliDependencies {
    /** Source factory; PubMed over E-utilities by default */
    createSource?: (config: AppConfig) => LiteratureSource;
    env?: NodeJS.ProcessEnv;
    /** Directory the config file search starts from */
    searchFrom?: string;
    /** Logger factory; `initLogger` (the shared pino logger) by default */
    createLogger?: typeof initLogger;
}

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
}

function parseLogLevel(value: string): LogLevel {
    const level = LOG_LEVELS.find((candidate) => candidate === value);
    if (!level) {
        throw new InvalidArgumentError(`Valid: ${LOG_LEVELS.join(', ')}`);
    }
    return level;
}

function createPubMedSource(config: AppConfig): LiteratureSource {
    const httpClient = createHttpClient({ timeout: config.timeoutMs, version: VERSION, tool: config.tool, email: config.email });
    return new PubMedAdapter({ email: config.email, tool: config.tool, httpClient });
}

/**
 * Collect only the flags the user set, so config file and env values survive.
 */
function toConfigFlags(opts: CliOptions): Partial<AppConfig> {
    const flags: Partial<AppConfig> = { debug: opts.debug };
    if (opts.maxResults !== undefined) flags.maxResults = opts.maxResults;
    if (opts.email !== undefined) flags.email = opts.email;
    if (opts.jsonLogs !== undefined) flags.jsonLogs = opts.jsonLogs;
    if (opts.logLevel !== undefined) {
        flags.logLevel = opts.logLevel;
    } else if (opts.debug) {
        flags.logLevel = 'debug';
    }
    return flags;
}

export function createProgram(deps: CliDependencies = {}): Command {
    const { createSource = createPubMedSource, env, searchFrom, createLogger = initLogger } = deps;
    const program = new Command();

    program
        .name('biocorp-papers')
        .description('Find PubMed papers with at least one author affiliated with a pharmaceutical or biotech company.')
        .version(VERSION)
        .argument('<query>', 'PubMed search query')
        .option('-d, --debug', 'Print debug information during execution', false)
        .option('-f, --file <path>', 'Filename to save results (prints to console if omitted)')
        .option('-m, --max-results <n>', 'Maximum number of papers to fetch (default: 10)', parsePositiveInt)
        .option('--email <address>', 'Contact email sent to NCBI with each request')
        .option('--log-level <level>', 'Log level: silent | error | warn | info | debug', parseLogLevel)
        .option('--json-logs', 'Output JSON logs')
        .action(async (query: string) => {
            const opts = program.opts<CliOptions>();
            const flags = toConfigFlags(opts);

            // Command-line log settings apply while the config file is read.
            const early = {
                level: flags.logLevel ?? DEFAULT_CONFIG.logLevel,
                jsonLogs: flags.jsonLogs ?? DEFAULT_CONFIG.jsonLogs,
            };
            let logger = createLogger(early);

            const config = await resolveConfig(flags, { env, searchFrom, logger });
            if (config.logLevel !== early.level || config.jsonLogs !== early.jsonLogs) {
                logger = createLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
            }

            if (config.debug) {
                logger.info(
                    { query, file: opts.file ?? null, maxResults: config.maxResults, email: config.email, companyTerms: config.companyTerms },
                    'Debug mode enabled'
                );
            }

            try {
                await runPipeline(
                    { query, maxResults: config.maxResults, output: opts.file, companyTerms: config.companyTerms },
                    createSource(config)
                );
            } catch (error) {
                if (error instanceof OutputWriteError) {
                    logger.error({ path: error.path, err: error.cause }, 'Could not save results');
                } else {
                    logger.error({ err: error }, 'Run failed');
                }
                process.exitCode = 1;
            }
        });

    return program;
}
