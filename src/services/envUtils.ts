export type Env = Record<string, string | undefined>;

const POSIX_VAR_RE = /\$(\w+|\{[^}]*\})/g;
const WINDOWS_VAR_RE = /%([^%]+)%|\$(\w+|\{[^}]*\})/g;

function lookup(env: Env, name: string, caseInsensitive: boolean): string | undefined {
    if (!caseInsensitive) return env[name];
    const upper = name.toUpperCase();
    const key = Object.keys(env).find(k => k.toUpperCase() === upper);
    return key === undefined ? undefined : env[key];
}

/**
 * Expands $VAR and ${VAR} (plus %VAR% on Windows) from `env`.
 * Unknown variables are left exactly as written.
 */
export function expandVars(value: string, env: Env, platform: NodeJS.Platform = process.platform): string {
    const isWindows = platform === 'win32';
    const resolve = (match: string, rawName: string): string => {
        const name = rawName.startsWith('{') && rawName.endsWith('}') ? rawName.slice(1, -1) : rawName;
        const resolved = lookup(env, name, isWindows);
        return resolved === undefined ? match : resolved;
    };
    if (isWindows) {
        return value.replace(WINDOWS_VAR_RE, (match: string, percentName: string | undefined, dollarName: string | undefined) =>
            resolve(match, percentName ?? dollarName ?? ''));
    }
    return value.replace(POSIX_VAR_RE, (match: string, name: string) => resolve(match, name));
}

/** Copies `base`, applies `overrides` on top and expands every value against `base`. */
export function mergeEnvironment(base: Env, overrides: Record<string, string>, platform: NodeJS.Platform = process.platform): Record<string, string> {
    const merged: Record<string, string> = {};
    for (const [key, value] of Object.entries(base)) {
        if (value !== undefined) merged[key] = value;
    }
    Object.assign(merged, overrides);
    for (const key of Object.keys(merged)) {
        merged[key] = expandVars(merged[key], base, platform);
    }
    return merged;
}
