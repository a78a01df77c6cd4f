import * as path from 'path';
import { ConfigError } from './errors';
import { BufferSettings, DisplayBuffer, ResultMatch, ViewState } from './types';

export const DEFAULT_SYNTAX = 'plaintext';

export const DEFAULT_BUFFER_SETTINGS: BufferSettings = {
    fileRegex: '',
    lineRegex: '',
    baseDir: '',
    gutter: true,
    syntax: DEFAULT_SYNTAX
};

function compile(source: string, setting: string): RegExp | null {
    if (!source) return null;
    try {
        return new RegExp(source);
    } catch (e) {
        throw new ConfigError(`Invalid ${setting} '${source}': ${e instanceof Error ? e.message : String(e)}`);
    }
}

function toInt(value: string | undefined): number {
    const parsed = Number.parseInt(value ?? '', 10);
    return Number.isNaN(parsed) ? 0 : parsed;
}

/**
 * Finds error references in build output.
 *
 * `fileRegex` captures (file, line, column, message); `lineRegex` captures
 * (line, column, message) for lines that belong to the last file matched above them.
 * Relative file names resolve against `baseDir` when one is set.
 */
export class ResultMatcher {
    private readonly fileRe: RegExp | null;
    private readonly lineRe: RegExp | null;

    constructor(fileRegex: string, lineRegex: string, private readonly baseDir: string) {
        this.fileRe = compile(fileRegex, 'file_regex');
        this.lineRe = compile(lineRegex, 'line_regex');
    }

    findAll(text: string): ResultMatch[] {
        if (!this.fileRe) return [];

        const results: ResultMatch[] = [];
        let currentFile: string | undefined;
        for (const line of text.split('\n')) {
            const fileMatch = this.fileRe.exec(line);
            if (fileMatch) {
                currentFile = this.resolve(fileMatch[1] ?? '');
                if (fileMatch[2] !== undefined) {
                    results.push({
                        file: currentFile,
                        line: toInt(fileMatch[2]),
                        column: toInt(fileMatch[3]),
                        message: fileMatch[4] ?? ''
                    });
                }
                continue;
            }
            if (!this.lineRe || currentFile === undefined) continue;
            const lineMatch = this.lineRe.exec(line);
            if (lineMatch) {
                results.push({
                    file: currentFile,
                    line: toInt(lineMatch[1]),
                    column: toInt(lineMatch[2]),
                    message: lineMatch[3] ?? ''
                });
            }
        }
        return results;
    }

    private resolve(file: string): string {
        if (!this.baseDir || !file || path.isAbsolute(file)) return file;
        return path.resolve(this.baseDir, file);
    }
}

/**
 * In-memory output text with result extraction.
 * Editor-backed panels extend it to mirror the text and to own scroll state.
 */
export class ResultBuffer implements DisplayBuffer {
    protected content = '';
    protected settings: BufferSettings = DEFAULT_BUFFER_SETTINGS;
    private matcher = new ResultMatcher('', '', '');

    configure(settings: BufferSettings): void {
        this.matcher = new ResultMatcher(settings.fileRegex, settings.lineRegex, settings.baseDir);
        this.settings = settings;
    }

    get currentSettings(): BufferSettings {
        return this.settings;
    }

    clear(): void {
        this.content = '';
    }

    append(text: string): void {
        this.content += text;
    }

    text(): string {
        return this.content;
    }

    findAllResults(): ResultMatch[] {
        return this.matcher.findAll(this.content);
    }

    saveViewState(): ViewState | null {
        return null;
    }

    restoreViewState(_state: ViewState): void {
        // No view to scroll
    }

    resetHorizontalScroll(): void {
        // No view to scroll
    }
}
