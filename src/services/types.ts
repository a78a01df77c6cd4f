/**
 * Host-facing contracts for the build runner core.
 * Nothing in here depends on the editor API so the core can run under plain Node.
 */

export type LogFn = (msg: string) => void;

/** A command given either as an argument vector or as one shell string. */
export interface CommandSpec {
    cmd?: string[] | string;
    shellCmd?: string;
}

/** Parameters accepted by RunController.invoke(). */
export interface ExecOptions extends CommandSpec {
    fileRegex?: string;
    lineRegex?: string;
    workingDir?: string;
    encoding?: string;
    env?: Record<string, string>;
    quiet?: boolean;
    kill?: boolean;
    /** Search path used while the child is spawned, e.g. "$PATH:/opt/tools/bin". */
    path?: string;
    shell?: boolean;
    gutter?: boolean;
    syntax?: string;
}

/** One match extracted from the display buffer by the result matcher. */
export interface ResultMatch {
    file: string;
    line: number;
    column: number;
    message: string;
}

export interface BufferSettings {
    fileRegex: string;
    lineRegex: string;
    baseDir: string;
    gutter: boolean;
    syntax: string;
}

/** Scroll position and selections of the output view, captured before a build wipes it. */
export interface ViewState {
    firstVisibleLine: number;
    selections: ReadonlyArray<{ start: number; end: number }>;
}

export interface DisplayBuffer {
    configure(settings: BufferSettings): void;
    clear(): void;
    append(text: string): void;
    text(): string;
    findAllResults(): ResultMatch[];
    saveViewState(): ViewState | null;
    restoreViewState(state: ViewState): void;
    resetHorizontalScroll(): void;
}

export interface DisplayPanel {
    /** Returns the context's output buffer, creating it on first use. */
    buffer(): DisplayBuffer;
    show(): void;
    isFocused(): boolean;
}

export interface StatusReporter {
    showStatus(message: string): void;
    startProgress(message: string, successMessage: string): void;
    stopProgress(): void;
}

export interface RunSettings {
    showPanelOnBuild: boolean;
    showErrorsInline: boolean;
    restoreOutputViewScroll: boolean;
    buildEnv: Record<string, string>;
    gutter: boolean;
}

/** Inline marker anchored to a [start, end) offset range of a source view. */
export interface Marker {
    start: number;
    end: number;
    message: string;
    /** HTML-escaped message, ready for hosts that render markup. */
    html: string;
    onDismiss: () => void;
}

export interface MarkerSet {
    update(markers: Marker[]): void;
}

export interface AnnotatedView {
    /** Stable identifier of the underlying buffer. */
    readonly bufferId: string;
    textPoint(line: number, column: number): number;
    lineEnd(offset: number): number;
    createMarkerSet(key: string): MarkerSet;
    eraseMarkers(key: string): void;
}

export interface AnnotationHost {
    findOpenFile(file: string): AnnotatedView | undefined;
}

export interface Scheduler {
    schedule(task: () => void, delayMs: number): void;
}

export const timerScheduler: Scheduler = {
    schedule(task, delayMs) {
        setTimeout(task, delayMs);
    }
};

export type RunState = 'idle' | 'starting' | 'running' | 'finishing' | 'cancelling';
