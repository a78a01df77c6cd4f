import { ResultMatch } from './types';

export interface ErrorEntry {
    line: number;
    column: number;
    message: string;
}

/** Build errors grouped by file, in the order they appeared in the output. */
export class ErrorIndex {
    private byFile = new Map<string, ErrorEntry[]>();

    /** Replaces the whole index with the given matches. */
    rebuild(matches: Iterable<ResultMatch>): void {
        const next = new Map<string, ErrorEntry[]>();
        for (const { file, line, column, message } of matches) {
            if (!Number.isInteger(line) || line < 1) continue;
            const entries = next.get(file) ?? [];
            entries.push({ line, column: Math.max(1, column), message });
            next.set(file, entries);
        }
        this.byFile = next;
    }

    clear(): void {
        this.byFile = new Map();
    }

    get(file: string): readonly ErrorEntry[] {
        return this.byFile.get(file) ?? [];
    }

    files(): string[] {
        return Array.from(this.byFile.keys());
    }

    entries(): IterableIterator<[string, ErrorEntry[]]> {
        return this.byFile.entries();
    }

    /** Total number of findings across all files. */
    get size(): number {
        let total = 0;
        for (const entries of this.byFile.values()) {
            total += entries.length;
        }
        return total;
    }

    toJSON(): Record<string, ErrorEntry[]> {
        return Object.fromEntries(this.byFile);
    }
}
