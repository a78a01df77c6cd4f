import { ConfigError, errorMessage } from './errors';
import { ExecOptions, RunSettings } from './types';

/** The part of vscode.WorkspaceConfiguration the settings readers need. */
export interface ConfigurationReader {
    get(key: string): unknown;
}

export const DEFAULT_RUN_SETTINGS: RunSettings = {
    showPanelOnBuild: true,
    showErrorsInline: true,
    restoreOutputViewScroll: false,
    buildEnv: {},
    gutter: true
};

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toStringMap(value: unknown, key: string): Record<string, string> {
    if (!isRecord(value)) {
        throw new ConfigError(`${key} must be an object of strings`);
    }
    const result: Record<string, string> = {};
    for (const [name, entry] of Object.entries(value)) {
        if (typeof entry !== 'string') {
            throw new ConfigError(`${key}.${name} must be a string`);
        }
        result[name] = entry;
    }
    return result;
}

function readBoolean(config: ConfigurationReader, key: keyof RunSettings, fallback: boolean): boolean {
    const value = config.get(key);
    return typeof value === 'boolean' ? value : fallback;
}

export function readRunSettings(config: ConfigurationReader): RunSettings {
    let buildEnv: Record<string, string> = {};
    try {
        buildEnv = toStringMap(config.get('buildEnv') ?? {}, 'buildEnv');
    } catch (e) {
        console.warn(`[Settings] Ignoring buildEnv: ${errorMessage(e)}`);
    }

    return {
        showPanelOnBuild: readBoolean(config, 'showPanelOnBuild', DEFAULT_RUN_SETTINGS.showPanelOnBuild),
        showErrorsInline: readBoolean(config, 'showErrorsInline', DEFAULT_RUN_SETTINGS.showErrorsInline),
        restoreOutputViewScroll: readBoolean(config, 'restoreOutputViewScroll', DEFAULT_RUN_SETTINGS.restoreOutputViewScroll),
        buildEnv,
        gutter: readBoolean(config, 'gutter', DEFAULT_RUN_SETTINGS.gutter)
    };
}

const STRING_KEYS = ['fileRegex', 'lineRegex', 'workingDir', 'encoding', 'path', 'syntax'] as const;
const BOOLEAN_KEYS = ['quiet', 'kill', 'shell', 'gutter'] as const;

/**
 * Validates a build definition coming from settings or command arguments.
 * Whether exactly one of cmd/shellCmd is present is checked when the process is spawned.
 */
export function parseExecOptions(raw: unknown): ExecOptions {
    if (raw === undefined || raw === null) return {};
    if (!isRecord(raw)) {
        throw new ConfigError('Build options must be an object');
    }

    const options: ExecOptions = {};

    if (raw.cmd !== undefined) {
        const cmd = raw.cmd;
        if (typeof cmd === 'string') {
            options.cmd = cmd;
        } else if (Array.isArray(cmd) && cmd.every((part): part is string => typeof part === 'string')) {
            options.cmd = cmd;
        } else {
            throw new ConfigError('cmd must be a string or a list of strings');
        }
    }

    if (raw.shellCmd !== undefined) {
        if (typeof raw.shellCmd !== 'string') {
            throw new ConfigError('shell_cmd must be a string');
        }
        options.shellCmd = raw.shellCmd;
    }

    for (const key of STRING_KEYS) {
        const value = raw[key];
        if (value === undefined) continue;
        if (typeof value !== 'string') {
            throw new ConfigError(`${key} must be a string`);
        }
        options[key] = value;
    }

    for (const key of BOOLEAN_KEYS) {
        const value = raw[key];
        if (value === undefined) continue;
        if (typeof value !== 'boolean') {
            throw new ConfigError(`${key} must be true or false`);
        }
        options[key] = value;
    }

    if (raw.env !== undefined) {
        options.env = toStringMap(raw.env, 'env');
    }

    return options;
}
