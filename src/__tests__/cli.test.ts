import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Command } from 'commander';
import pino from 'pino';
import { createProgram } from '../cli/program.js';
import type { AppConfig, LogLevel } from '../types/index.js';
import { FakeSource, ACME_PAPER, MIT_PAPER } from './fake-source.js';

describe('CLI', () => {
    let dir: string;
    let source: FakeSource;
    let seenConfig: AppConfig | undefined;
    let loggerSettings: Array<{ level?: LogLevel; jsonLogs?: boolean }>;
    let logLines: string[];

    /** JSON logger writing into `logLines`, recording the settings it was created with */
    function captureLogger(options: { level?: LogLevel; jsonLogs?: boolean }): pino.Logger {
        loggerSettings.push(options);
        return pino({ level: options.level ?? 'info' }, { write: (line: string) => { logLines.push(line); } });
    }

    function logged(): Array<{ level: number; msg: string; [key: string]: unknown }> {
        return logLines.map((line) => JSON.parse(line));
    }

    function program(env: NodeJS.ProcessEnv = {}, capture = false): Command {
        return createProgram({
            createSource: (config) => {
                seenConfig = config;
                return source;
            },
            env,
            searchFrom: dir,
            createLogger: capture ? captureLogger : undefined,
        })
            .exitOverride()
            .configureOutput({ writeOut: () => undefined, writeErr: () => undefined });
    }

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'biocorp-cli-'));
        source = new FakeSource({ records: [ACME_PAPER, MIT_PAPER] });
        seenConfig = undefined;
        loggerSettings = [];
        logLines = [];
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        process.exitCode = undefined;
        vi.restoreAllMocks();
        rmSync(dir, { recursive: true, force: true });
    });

    it('should save results to the file given with -f', async () => {
        const output = join(dir, 'results.csv');

        await program().parseAsync(['kinase inhibitors', '-f', output, '--log-level', 'silent'], { from: 'user' });

        const lines = readFileSync(output, 'utf-8').trimEnd().split('\n');
        expect(lines).toHaveLength(2);
        expect(lines[1]).toBe('1,Kinase inhibitors in practice,2023,Smith,"Acme Biotech Inc., Boston",N/A');
        expect(source.searchCalls).toEqual([['kinase inhibitors', 10]]);
    });

    it('should print to the console without -f', async () => {
        await program().parseAsync(['kinase', '--log-level', 'silent'], { from: 'user' });

        expect(console.log).toHaveBeenCalledTimes(1);
        expect(console.log).toHaveBeenCalledWith(
            [
                'PubmedID: 1',
                'Title: Kinase inhibitors in practice',
                'Publication Year: 2023',
                'Non-academic Author(s): Smith',
                'Company Affiliation(s): Acme Biotech Inc., Boston',
                'Corresponding Author Email: N/A',
                '',
            ].join('\n')
        );
    });

    it('should pass --max-results to the search', async () => {
        await program().parseAsync(['kinase', '-m', '3', '--log-level', 'silent'], { from: 'user' });
        expect(source.searchCalls).toEqual([['kinase', 3]]);
    });

    it('should raise the log level to debug with -d unless one is given', async () => {
        await program().parseAsync(['kinase', '-d', '--log-level', 'silent'], { from: 'user' });
        expect(seenConfig?.debug).toBe(true);
        expect(seenConfig?.logLevel).toBe('silent');
    });

    it('should raise the level to debug and log the resolved settings with -d alone', async () => {
        await program({}, true).parseAsync(['kinase', '-d'], { from: 'user' });

        expect(seenConfig?.logLevel).toBe('debug');
        expect(loggerSettings).toEqual([{ level: 'debug', jsonLogs: false }]);
        expect(logged()).toContainEqual(
            expect.objectContaining({ level: 30, msg: 'Debug mode enabled', query: 'kinase', maxResults: 10, file: null })
        );
    });

    it('should show the debug diagnostic at the default log level', async () => {
        await program({}, true).parseAsync(['kinase', '-d', '--log-level', 'info'], { from: 'user' });

        expect(logged().map((entry) => entry.msg)).toContain('Debug mode enabled');
    });

    it('should not log the diagnostic without -d', async () => {
        await program({}, true).parseAsync(['kinase', '--log-level', 'info'], { from: 'user' });

        expect(logged().map((entry) => entry.msg)).not.toContain('Debug mode enabled');
    });

    it('should apply --log-level to config file warnings', async () => {
        writeFileSync(join(dir, 'biocorp-papers.config.json'), JSON.stringify({ maxResults: 'many' }));

        await program({}, true).parseAsync(['kinase', '--log-level', 'error'], { from: 'user' });
        expect(logged().map((entry) => entry.msg)).not.toContain('Invalid config file, using defaults');

        await program({}, true).parseAsync(['kinase', '--log-level', 'warn'], { from: 'user' });
        expect(logged()).toContainEqual(
            expect.objectContaining({ level: 40, msg: 'Invalid config file, using defaults' })
        );
    });

    it('should switch to the config file log settings once it is read', async () => {
        writeFileSync(join(dir, 'biocorp-papers.config.json'), JSON.stringify({ logLevel: 'warn', jsonLogs: true }));

        await program({}, true).parseAsync(['kinase'], { from: 'user' });

        expect(loggerSettings).toEqual([
            { level: 'info', jsonLogs: false },
            { level: 'warn', jsonLogs: true },
        ]);
    });

    it('should set exit code 1 when the results cannot be saved', async () => {
        const output = join(dir, 'missing', 'results.csv');

        await program({}, true).parseAsync(['kinase', '-f', output, '--log-level', 'error'], { from: 'user' });

        expect(process.exitCode).toBe(1);
        expect(existsSync(output)).toBe(false);
        expect(logged()).toContainEqual(
            expect.objectContaining({ level: 50, msg: 'Could not save results', path: output })
        );
        expect(console.log).not.toHaveBeenCalledWith(`Results saved to ${output}`);
    });

    it('should take the contact email from the environment and the flag', async () => {
        await program({ NCBI_EMAIL: 'env@example.com' }).parseAsync(['kinase', '--log-level', 'silent'], { from: 'user' });
        expect(seenConfig?.email).toBe('env@example.com');

        await program({ NCBI_EMAIL: 'env@example.com' }).parseAsync(
            ['kinase', '--email', 'flag@example.com', '--log-level', 'silent'],
            { from: 'user' }
        );
        expect(seenConfig?.email).toBe('flag@example.com');
    });

    it('should complete normally when the fetch fails', async () => {
        source = new FakeSource({ searchError: new Error('network down') });

        await program().parseAsync(['kinase', '--log-level', 'silent'], { from: 'user' });

        expect(console.log).toHaveBeenCalledWith('No data to save.');
        expect(process.exitCode ?? 0).toBe(0);
    });

    it('should fail when the query is missing', async () => {
        await expect(program().parseAsync([], { from: 'user' })).rejects.toMatchObject({
            code: 'commander.missingArgument',
            exitCode: 1,
        });
        expect(source.searchCalls).toEqual([]);
    });

    it('should reject a non-numeric result bound', async () => {
        await expect(program().parseAsync(['kinase', '-m', 'ten'], { from: 'user' })).rejects.toMatchObject({
            code: 'commander.invalidArgument',
        });
    });

    it('should reject an unknown log level', async () => {
        await expect(program().parseAsync(['kinase', '--log-level', 'loud'], { from: 'user' })).rejects.toMatchObject({
            code: 'commander.invalidArgument',
        });
    });
});
