import { writeFileSync } from 'node:fs';
import { FIELD_LABELS, type OutputField, type OutputRecord } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * Separator for list-valued cells. Affiliations contain commas, so lists use semicolons.
 */
export const LIST_SEPARATOR = '; ';

/**
 * Saving records to disk failed.
 */
export class OutputWriteError extends Error {
    constructor(public readonly path: string, cause: unknown) {
        super(`Failed to write ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
        this.name = 'OutputWriteError';
    }
}

function isOutputField(key: string): key is OutputField {
    return Object.prototype.hasOwnProperty.call(FIELD_LABELS, key);
}

/**
 * Column order taken from the first record's keys.
 */
function columnsOf(record: OutputRecord): OutputField[] {
    return Object.keys(record).filter(isOutputField);
}

function cellValue(value: string | string[]): string {
    return Array.isArray(value) ? value.join(LIST_SEPARATOR) : value;
}

function escapeCsv(value: string): string {
    return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Serialize records to CSV text with a header row.
 */
export function toCsv(records: readonly OutputRecord[]): string {
    const [first] = records;
    if (!first) return '';

    const columns = columnsOf(first);
    let csv = columns.map((column) => escapeCsv(FIELD_LABELS[column])).join(',') + '\n';
    for (const record of records) {
        csv += columns.map((column) => escapeCsv(cellValue(record[column]))).join(',') + '\n';
    }

    return csv;
}

/**
 * Human-readable block for one record: one "Label: value" line per field.
 */
export function formatRecord(record: OutputRecord): string {
    return columnsOf(record)
        .map((column) => `${FIELD_LABELS[column]}: ${cellValue(record[column])}`)
        .join('\n');
}

/**
 * Save records to a CSV file, or print them when no destination is given.
 * Nothing is written when there are no records.
 */
export function writeCsv(records: readonly OutputRecord[], destination?: string): void {
    if (records.length === 0) {
        console.log('No data to save.');
        return;
    }

    if (destination === undefined) {
        for (const record of records) {
            console.log(formatRecord(record) + '\n');
        }
        return;
    }

    try {
        writeFileSync(destination, toCsv(records), 'utf-8');
    } catch (error) {
        throw new OutputWriteError(destination, error);
    }

    getLogger().info({ outputPath: destination, records: records.length }, 'CSV exported');
    console.log(`Results saved to ${destination}`);
}
