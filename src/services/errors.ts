export class BuildPanelError extends Error {
    readonly code: string;

    constructor(code: string, message: string) {
        super(message);
        this.name = 'BuildPanelError';
        this.code = code;
    }
}

/** Invalid invocation parameters, raised before anything is spawned. */
export class ConfigError extends BuildPanelError {
    constructor(message: string) {
        super('CONFIG', message);
        this.name = 'ConfigError';
    }
}

/** The OS refused to start the process (ENOENT, EACCES, ...). */
export class SpawnError extends BuildPanelError {
    readonly errno?: string;

    constructor(message: string, errno?: string) {
        super('SPAWN', message);
        this.name = 'SpawnError';
        this.errno = errno;
    }
}

export function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

export function errnoCode(e: unknown): string | undefined {
    if (typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string') {
        return e.code;
    }
    return undefined;
}
