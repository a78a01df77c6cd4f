import { Scheduler, timerScheduler } from './types';

export const OUTPUT_BLOCK_SIZE = 16384;
const DRAIN_DELAY_MS = 1;

export interface QueueOwner {
    terminate(): void;
}

/**
 * Coalescing FIFO between process readers and the single display consumer.
 *
 * Every chunk is tagged with the process that produced it. Output from a process
 * that is no longer the current owner is dropped and that process is terminated,
 * so a superseded build never interleaves with the new one.
 *
 * The consumer gets one chunk per scheduler tick; a process flooding output
 * costs the UI at most one append per tick.
 */
export class OutputQueue<TOwner extends QueueOwner = QueueOwner> {
    private readonly chunks: string[] = [];
    private owner: TOwner | null = null;

    constructor(
        private readonly consumer: (text: string) => void,
        private readonly scheduler: Scheduler = timerScheduler,
        private readonly blockSize: number = OUTPUT_BLOCK_SIZE
    ) { }

    get currentOwner(): TOwner | null {
        return this.owner;
    }

    get length(): number {
        return this.chunks.length;
    }

    setOwner(owner: TOwner | null): void {
        this.owner = owner;
    }

    /** Drops pending chunks and forgets the owner. A tick already scheduled finds nothing to do. */
    clear(): void {
        this.chunks.length = 0;
        this.owner = null;
    }

    /** `owner` is null for text the controller writes itself. */
    enqueue(owner: TOwner | null, text: string): void {
        if (owner !== null && owner !== this.owner) {
            owner.terminate();
            return;
        }
        if (text.length === 0) return;

        const wasEmpty = this.chunks.length === 0;
        const last = this.chunks.length - 1;
        if (!wasEmpty && text.length < this.blockSize - this.chunks[last].length) {
            this.chunks[last] += text;
        } else {
            this.chunks.push(text);
        }

        if (wasEmpty) {
            this.scheduler.schedule(() => this.drainOne(), 0);
        }
    }

    drainOne(): void {
        const text = this.chunks.shift();
        if (text === undefined) return;

        if (this.chunks.length > 0) {
            this.scheduler.schedule(() => this.drainOne(), DRAIN_DELAY_MS);
        }
        this.consumer(text);
    }
}
