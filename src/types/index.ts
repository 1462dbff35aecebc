/**
 * Barrel export for all shared types.
 */
export type { RawAuthor, RawPaperRecord, OutputRecord, OutputField } from './paper.js';
export { NOT_AVAILABLE, FIELD_LABELS } from './paper.js';
export { DEFAULT_CONFIG, LOG_LEVELS } from './config.js';
export type { AppConfig, LogLevel } from './config.js';
export type {
    LiteratureSource,
    SearchResult,
    SourceAdapterOptions,
    FetchResult,
} from './source-adapter.js';
