import * as cp from 'child_process';
import { ConfigError, errnoCode, errorMessage, SpawnError } from './errors';
import { expandVars, mergeEnvironment } from './envUtils';
import { IncrementalDecoder } from './IncrementalDecoder';
import { StreamReader } from './StreamReader';
import { LogFn } from './types';

export interface ProcessSink {
    onData(handle: ProcessHandle, text: string): void;
    onEnd(handle: ProcessHandle): void;
}

export interface ProcessSpawnOptions {
    cwd?: string;
    encoding?: string;
    /** Replaces PATH while the executable is looked up; may reference $PATH. */
    searchPath?: string;
    /** Run an argument vector through the shell. */
    shell?: boolean;
    platform?: NodeJS.Platform;
    log?: LogFn;
}

/** Command fields as they arrive from settings or command arguments, before validation. */
export interface UncheckedCommand {
    cmd?: unknown;
    shellCmd?: unknown;
}

interface SpawnPlan {
    file: string;
    args: string[];
    shell: boolean;
}

/**
 * Decides how a command is started on a given platform.
 * Shell commands go through cmd.exe on Windows, a login bash on macOS and a plain bash elsewhere,
 * so the user's expected environment is in place.
 */
export function resolveSpawnPlan(command: UncheckedCommand, platform: NodeJS.Platform, shell: boolean = false): SpawnPlan {
    const { cmd, shellCmd } = command;
    const hasCmd = Array.isArray(cmd) ? cmd.length > 0 : typeof cmd === 'string' && cmd.length > 0;
    const hasShellCmd = shellCmd !== undefined && shellCmd !== null && shellCmd !== '';

    if (hasCmd === hasShellCmd) {
        throw new ConfigError(hasCmd ? 'Only one of shell_cmd or cmd may be given' : 'shell_cmd or cmd is required');
    }

    if (hasShellCmd) {
        if (typeof shellCmd !== 'string') {
            throw new ConfigError('shell_cmd must be a string');
        }
        if (platform === 'win32') {
            return { file: shellCmd, args: [], shell: true };
        }
        if (platform === 'darwin') {
            return { file: '/usr/bin/env', args: ['bash', '-l', '-c', shellCmd], shell: false };
        }
        return { file: '/usr/bin/env', args: ['bash', '-c', shellCmd], shell: false };
    }

    if (typeof cmd === 'string') {
        return { file: cmd, args: [], shell: true };
    }
    if (!isStringArray(cmd)) {
        throw new ConfigError('cmd must be a list of strings');
    }
    const [file, ...args] = cmd;
    return { file, args, shell };
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(part => typeof part === 'string');
}

function waitForSpawn(child: cp.ChildProcess): Promise<void> {
    return new Promise((resolve, reject) => {
        const onSpawn = () => {
            child.off('error', onError);
            resolve();
        };
        const onError = (err: Error) => {
            child.off('spawn', onSpawn);
            reject(new SpawnError(err.message, errnoCode(err)));
        };
        child.once('spawn', onSpawn);
        child.once('error', onError);
    });
}

/**
 * One external process started in its own process group, with its stdout and
 * stderr forwarded to a sink until terminate() severs it.
 */
export class ProcessHandle {
    readonly startTime = Date.now();
    private _killed = false;
    private sink: ProcessSink | null;

    private constructor(
        private readonly child: cp.ChildProcess,
        sink: ProcessSink,
        private readonly platform: NodeJS.Platform,
        private readonly log?: LogFn
    ) {
        this.sink = sink;
        child.on('error', (err) => {
            this.log?.(`[ProcessHandle] pid ${child.pid}: ${err.message}`);
        });
    }

    static async spawn(
        command: UncheckedCommand,
        env: Record<string, string>,
        sink: ProcessSink,
        options: ProcessSpawnOptions = {}
    ): Promise<ProcessHandle> {
        const platform = options.platform ?? process.platform;
        const encoding = options.encoding ?? 'utf-8';
        const plan = resolveSpawnPlan(command, platform, options.shell);
        IncrementalDecoder.assertSupported(encoding);

        const oldPath = process.env.PATH;
        let child: cp.ChildProcess;
        try {
            if (options.searchPath) {
                process.env.PATH = expandVars(options.searchPath, process.env, platform);
            }
            child = cp.spawn(plan.file, plan.args, {
                cwd: options.cwd || undefined,
                env: mergeEnvironment(process.env, env, platform),
                shell: plan.shell,
                detached: platform !== 'win32',
                windowsHide: true,
                stdio: ['pipe', 'pipe', 'pipe']
            });
        } catch (e) {
            throw new SpawnError(errorMessage(e), errnoCode(e));
        } finally {
            if (options.searchPath) {
                if (oldPath === undefined) {
                    delete process.env.PATH;
                } else {
                    process.env.PATH = oldPath;
                }
            }
        }

        await waitForSpawn(child);
        const handle = new ProcessHandle(child, sink, platform, options.log);
        handle.startReaders(encoding);
        return handle;
    }

    get pid(): number | undefined {
        return this.child.pid;
    }

    get killed(): boolean {
        return this._killed;
    }

    /** True while the process is still running. */
    poll(): boolean {
        return this.child.exitCode === null && this.child.signalCode === null;
    }

    exitCode(): number | null {
        return this.child.exitCode;
    }

    /** Kills the whole process group. Safe to call more than once. */
    terminate(): void {
        if (this._killed) return;
        this._killed = true;
        this.sink = null;

        const pid = this.child.pid;
        if (pid === undefined) return;

        if (this.platform === 'win32') {
            // Killing cmd.exe alone would leave the command it started running
            cp.execFile('taskkill', ['/PID', String(pid), '/T', '/F'], { windowsHide: true }, (error) => {
                if (error) {
                    this.log?.(`[ProcessHandle] taskkill failed for pid ${pid}: ${error.message}`);
                }
            });
            return;
        }

        try {
            process.kill(-pid, 'SIGTERM');
        } catch (e) {
            this.log?.(`[ProcessHandle] Could not signal process group ${pid}: ${e}`);
        }
        this.child.kill('SIGTERM');
    }

    private startReaders(encoding: string): void {
        const { stdout, stderr } = this.child;
        if (stdout) {
            new StreamReader(stdout, 'stdout', encoding, {
                onText: (text) => this.sink?.onData(this, text),
                onEnd: () => this.whenExited(() => this.sink?.onEnd(this))
            }, true, this.log).start();
        }
        if (stderr) {
            new StreamReader(stderr, 'stderr', encoding, {
                onText: (text) => this.sink?.onData(this, text),
                onEnd: () => undefined
            }, false, this.log).start();
        }
    }

    private whenExited(callback: () => void): void {
        if (!this.poll()) {
            callback();
            return;
        }
        this.child.once('exit', () => callback());
    }
}
