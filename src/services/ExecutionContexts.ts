import { ViewState } from './types';

export interface ExecutionContext {
    readonly id: string;
    /**
     * Output view position captured before the last build cleared it.
     * null means restoring is disabled for this context.
     */
    savedViewState: ViewState | null;
    progressRunning: boolean;
}

/** Per-window state, created on first use and dropped when the window goes away. */
export class ExecutionContexts {
    private readonly contexts = new Map<string, ExecutionContext>();

    get(id: string): ExecutionContext {
        let context = this.contexts.get(id);
        if (!context) {
            context = { id, savedViewState: null, progressRunning: false };
            this.contexts.set(id, context);
        }
        return context;
    }

    has(id: string): boolean {
        return this.contexts.has(id);
    }

    dispose(id: string): void {
        this.contexts.delete(id);
    }
}
