import { ConfigError } from './errors';
import { TextDecoder } from 'util';

/**
 * Stateful bytes-to-text decoder for one stream.
 * A multi-byte character split across two reads is held back until its
 * second half arrives; malformed input decodes to U+FFFD instead of throwing.
 */
export class IncrementalDecoder {
    private readonly decoder: TextDecoder;

    constructor(encoding: string = 'utf-8') {
        try {
            this.decoder = new TextDecoder(encoding, { fatal: false });
        } catch {
            throw new ConfigError(`Unknown encoding: '${encoding}'`);
        }
    }

    get encoding(): string {
        return this.decoder.encoding;
    }

    decode(chunk: Uint8Array): string {
        return this.decoder.decode(chunk, { stream: true });
    }

    /** Emits whatever is still pending (a truncated sequence becomes U+FFFD) and resets. */
    flush(): string {
        return this.decoder.decode();
    }

    static assertSupported(encoding: string): void {
        new IncrementalDecoder(encoding);
    }
}
