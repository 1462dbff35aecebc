/**
 * Log level options.
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface AppConfig {
    // Source
    email: string;
    tool: string;
    maxResults: number;
    timeoutMs: number;

    // Classification
    companyTerms: string[];

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
    debug: boolean;
}

/**
 * Default configuration values. `companyTerms` is filled from the vocabulary.
 */
export const DEFAULT_CONFIG: Omit<AppConfig, 'companyTerms'> = {
    email: 'biocorp-papers@example.com',
    tool: 'biocorp-papers',
    maxResults: 10,
    timeoutMs: 30000,
    logLevel: 'info',
    jsonLogs: false,
    debug: false,
};
