import * as path from 'path';
import { AnnotationRenderer } from './AnnotationRenderer';
import { errorMessage } from './errors';
import { ErrorIndex } from './ErrorIndex';
import { ExecutionContext, ExecutionContexts } from './ExecutionContexts';
import { OutputQueue } from './OutputQueue';
import { ProcessHandle, ProcessSink } from './ProcessHandle';
import { DEFAULT_SYNTAX } from './ResultBuffer';
import {
    AnnotationHost,
    DisplayPanel,
    ExecOptions,
    LogFn,
    RunSettings,
    RunState,
    Scheduler,
    StatusReporter,
    timerScheduler
} from './types';

export const CANCELLED_MARKER = '[Cancelled]';
const PROGRESS_MESSAGE = 'Building...';
const PROGRESS_SUCCESS_MESSAGE = 'Build finished';

export interface RunControllerDeps {
    contextId: string;
    contexts: ExecutionContexts;
    panel: DisplayPanel;
    status: StatusReporter;
    annotations: AnnotationHost;
    settings: () => RunSettings;
    activeFile?: () => string | undefined;
    scheduler?: Scheduler;
    platform?: NodeJS.Platform;
    log?: LogFn;
    onStateChange?: (state: RunState) => void;
}

export function normalizeNewlines(text: string): string {
    return text.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

function describeCommand(options: ExecOptions): string {
    if (options.shellCmd) return options.shellCmd;
    return Array.isArray(options.cmd) ? options.cmd.join(' ') : options.cmd ?? '';
}

/**
 * Runs one build at a time for an execution context and streams its output
 * into the context's display buffer.
 *
 * idle -> starting -> running -> finishing -> idle, with cancelling reachable from running.
 * A new invoke() while a build runs supersedes it; the old process is killed as soon
 * as it produces more output.
 */
export class RunController {
    private _state: RunState = 'idle';
    private _handle: ProcessHandle | null = null;
    private _finishing: ProcessHandle | null = null;
    private _startNonce = 0;
    private _quiet = false;
    private _debugText = '';

    private readonly _queue: OutputQueue<ProcessHandle>;
    private readonly _index = new ErrorIndex();
    private readonly _renderer: AnnotationRenderer;
    private readonly _scheduler: Scheduler;
    private readonly _sink: ProcessSink = {
        onData: (handle, text) => this._queue.enqueue(handle, normalizeNewlines(text)),
        onEnd: (handle) => this._scheduler.schedule(() => this._finish(handle), 0)
    };

    constructor(private readonly deps: RunControllerDeps) {
        this._scheduler = deps.scheduler ?? timerScheduler;
        this._queue = new OutputQueue<ProcessHandle>((text) => this._applyText(text), this._scheduler);
        this._renderer = new AnnotationRenderer(deps.annotations, this._index, deps.log);
    }

    get state(): RunState {
        return this._state;
    }

    get errorIndex(): ErrorIndex {
        return this._index;
    }

    get currentHandle(): ProcessHandle | null {
        return this._handle;
    }

    get debugText(): string {
        return this._debugText;
    }

    isRunning(): boolean {
        return this._handle !== null && this._handle.poll();
    }

    /** The cancel action is only offered while a process is alive. */
    canCancel(): boolean {
        return this.isRunning();
    }

    async invoke(options: ExecOptions = {}): Promise<void> {
        this._queue.clear();
        this._finishing = null;

        if (options.kill) {
            this.cancel();
            return;
        }

        const nonce = ++this._startNonce;
        const context = this._context();
        const settings = this.deps.settings();
        const panel = this.deps.panel;
        const buffer = panel.buffer();

        this._handle = null;
        this._setState('starting');

        context.savedViewState = settings.restoreOutputViewScroll ? buffer.saveViewState() : null;

        const activeFile = this.deps.activeFile?.();
        const workingDir = options.workingDir || (activeFile ? path.dirname(activeFile) : '');
        const encoding = options.encoding || 'utf-8';
        this._quiet = options.quiet ?? false;

        const env = { ...(options.env ?? {}), ...settings.buildEnv };
        this._debugText = this._buildDebugText(options, workingDir, env);

        if (!this._quiet) {
            this.deps.log?.(`[RunController] Running ${describeCommand(options)}`);
            this._startProgress(context);
        }

        this._renderer.hideAll();
        this._renderer.enable(settings.showErrorsInline);

        try {
            buffer.clear();
            buffer.configure({
                fileRegex: options.fileRegex ?? '',
                lineRegex: options.lineRegex ?? '',
                baseDir: workingDir,
                gutter: options.gutter ?? settings.gutter,
                syntax: options.syntax ?? DEFAULT_SYNTAX
            });

            if (settings.showPanelOnBuild) {
                panel.show();
            }

            const handle = await ProcessHandle.spawn(
                { cmd: options.cmd, shellCmd: options.shellCmd },
                env,
                this._sink,
                {
                    cwd: workingDir,
                    encoding,
                    searchPath: options.path,
                    shell: options.shell,
                    platform: this.deps.platform,
                    log: this.deps.log
                }
            );

            if (nonce !== this._startNonce) {
                // Superseded or cancelled while the OS was starting it
                this.deps.log?.(`[RunController] Discarding pid ${handle.pid} from a superseded start`);
                handle.terminate();
                return;
            }

            this._handle = handle;
            this._queue.setOwner(handle);
            this._setState('running');
            this.deps.log?.(`[RunController] Started pid ${handle.pid}`);
        } catch (e) {
            if (nonce !== this._startNonce) return;
            this._failStart(context, e);
        }
    }

    /** Kills the running build. Returns false when there was nothing to cancel. */
    cancel(): boolean {
        this._queue.clear();
        this._finishing = null;

        const wasStarting = this._state === 'starting';
        if (!this._handle && !wasStarting) {
            return false;
        }

        this._setState('cancelling');
        if (wasStarting) {
            this._startNonce++;
        }
        this._handle?.terminate();
        this._handle = null;

        this._stopProgress(this._context());
        this._queue.enqueue(null, CANCELLED_MARKER);
        this.deps.log?.('[RunController] Build cancelled');
        this._setState('idle');
        return true;
    }

    /** Re-renders markers, e.g. after a file with known errors was opened. */
    updateAnnotations(): void {
        if (this._renderer.enabled) {
            this._renderer.render();
        }
    }

    hideAnnotations(): void {
        this._renderer.hideAll();
    }

    dispose(): void {
        this._startNonce++;
        this._handle?.terminate();
        this._handle = null;
        this._finishing = null;
        this._queue.clear();
        this.deps.contexts.dispose(this.deps.contextId);
    }

    private _context(): ExecutionContext {
        return this.deps.contexts.get(this.deps.contextId);
    }

    private _setState(state: RunState): void {
        if (this._state === state) return;
        this._state = state;
        this.deps.onStateChange?.(state);
    }

    private _buildDebugText(options: ExecOptions, workingDir: string, env: Record<string, string>): string {
        let text = options.shellCmd
            ? `[shell_cmd: ${options.shellCmd}]\n`
            : `[cmd: ${JSON.stringify(options.cmd ?? null)}]\n`;
        text += `[dir: ${workingDir || process.cwd()}]\n`;
        text += `[path: ${env.PATH ?? process.env.PATH ?? ''}]`;
        return text;
    }

    private _startProgress(context: ExecutionContext): void {
        if (context.progressRunning) {
            this.deps.log?.('[RunController] Progress indicator already running, not starting another');
            return;
        }
        context.progressRunning = true;
        this.deps.status.startProgress(PROGRESS_MESSAGE, PROGRESS_SUCCESS_MESSAGE);
    }

    private _stopProgress(context: ExecutionContext): void {
        if (!context.progressRunning) return;
        context.progressRunning = false;
        this.deps.status.stopProgress();
    }

    private _failStart(context: ExecutionContext, e: unknown): void {
        this.deps.log?.(`[RunController] Could not start build: ${errorMessage(e)}`);
        this._stopProgress(context);
        this._queue.enqueue(null, `${errorMessage(e)}\n`);
        this._queue.enqueue(null, `${this._debugText}\n`);
        if (!this._quiet) {
            this._queue.enqueue(null, '[Finished]');
        }
        this._setState('idle');
    }

    private _applyText(text: string): void {
        try {
            const buffer = this.deps.panel.buffer();
            buffer.append(text);

            if (this._renderer.enabled && text.includes('\n')) {
                this._index.rebuild(buffer.findAllResults());
                this._renderer.render();
            }
        } catch (e) {
            this.deps.log?.(`[RunController] Failed to apply output: ${errorMessage(e)}`);
        }

        if (this._finishing && this._queue.length === 0) {
            this._completeFinish();
        }
    }

    private _finish(handle: ProcessHandle): void {
        if (!this._quiet) {
            const elapsed = ((Date.now() - handle.startTime) / 1000).toFixed(1);
            const exitCode = handle.exitCode();
            if (exitCode === 0 || exitCode === null) {
                this._queue.enqueue(handle, `[Finished in ${elapsed}s]`);
            } else {
                this._queue.enqueue(handle, `[Finished in ${elapsed}s with exit code ${exitCode}]\n`);
                this._queue.enqueue(handle, this._debugText);
            }
        }

        if (handle !== this._handle) return;

        this._setState('finishing');
        this._finishing = handle;
        // Status and scroll restore wait until the summary has reached the buffer
        if (this._queue.length === 0) {
            this._completeFinish();
        }
    }

    /** Matches that point at a real line, the same set the ErrorIndex keeps. */
    private _errorCount(): number {
        return this.deps.panel.buffer().findAllResults().filter(match => match.line >= 1).length;
    }

    private _completeFinish(): void {
        const handle = this._finishing;
        this._finishing = null;
        if (!handle || handle !== this._handle) return;

        const context = this._context();
        this._stopProgress(context);

        const buffer = this.deps.panel.buffer();
        const errorCount = this._errorCount();
        this.deps.status.showStatus(errorCount === 0 ? 'Build finished' : `Build finished with ${errorCount} errors`);

        // Skipped when another build has started before the tick runs
        const nonce = this._startNonce;
        const saved = context.savedViewState;
        this._scheduler.schedule(() => {
            if (nonce !== this._startNonce) return;
            if (saved) {
                buffer.restoreViewState(saved);
            } else {
                buffer.resetHorizontalScroll();
            }
        }, 0);

        this._handle = null;
        this._setState('idle');
        this.deps.log?.(`[RunController] Build finished (exit code ${handle.exitCode() ?? 'none'}, ${errorCount} errors)`);
    }
}
