import { Readable } from 'stream';
import { IncrementalDecoder } from './IncrementalDecoder';
import { LogFn } from './types';

export const READ_BLOCK_SIZE = 16384;

export interface StreamSink {
    onText(text: string): void;
    onEnd(): void;
}

/**
 * Reads one child output stream, decodes it and forwards text to a sink.
 * Only the completion stream (stdout) reports end-of-stream.
 */
export class StreamReader {
    private readonly decoder: IncrementalDecoder;
    private ended = false;

    constructor(
        private readonly stream: Readable,
        private readonly name: 'stdout' | 'stderr',
        encoding: string,
        private readonly sink: StreamSink,
        private readonly signalsCompletion: boolean,
        private readonly log?: LogFn
    ) {
        this.decoder = new IncrementalDecoder(encoding);
    }

    start(): void {
        this.stream.on('data', (data: Buffer | string) => this.onChunk(data));
        this.stream.once('end', () => this.finish());
        this.stream.once('error', (err: Error) => {
            this.log?.(`[StreamReader] ${this.name} failed: ${err.message}`);
            this.finish();
        });
    }

    private onChunk(data: Buffer | string): void {
        if (typeof data === 'string') {
            this.forward(data);
            return;
        }
        for (let offset = 0; offset < data.length; offset += READ_BLOCK_SIZE) {
            this.forward(this.decoder.decode(data.subarray(offset, offset + READ_BLOCK_SIZE)));
        }
    }

    private forward(text: string): void {
        if (text.length > 0) {
            this.sink.onText(text);
        }
    }

    private finish(): void {
        if (this.ended) return;
        this.ended = true;

        this.forward(this.decoder.flush());
        try {
            this.stream.destroy();
        } catch (e) {
            this.log?.(`[StreamReader] Could not close ${this.name}: ${e}`);
        }
        if (this.signalsCompletion) {
            this.sink.onEnd();
        }
    }
}
