import * as assert from 'assert';
import { expandVars, mergeEnvironment } from '../services/envUtils';
import { ConfigError } from '../services/errors';
import { resolveSpawnPlan } from '../services/ProcessHandle';
import { ConfigurationReader, DEFAULT_RUN_SETTINGS, parseExecOptions, readRunSettings } from '../services/settings';

function configOf(values: Record<string, unknown>): ConfigurationReader {
    return { get: (key) => values[key] };
}

function configError(message: string) {
    return (e: unknown) => e instanceof ConfigError && e.message === message;
}

suite('envUtils', () => {
    test('expands $VAR and ${VAR} and leaves unknown names alone', () => {
        const env = { HOME: '/home/builder', EXTRA: '/opt/extra' };
        assert.strictEqual(expandVars('$HOME/bin:${EXTRA}:$MISSING', env, 'linux'), '/home/builder/bin:/opt/extra:$MISSING');
    });

    test('expands %VAR% case-insensitively on Windows', () => {
        const env = { PATH: 'C:\\bin' };
        assert.strictEqual(expandVars('%Path%;C:\\tools;%NOPE%', env, 'win32'), 'C:\\bin;C:\\tools;%NOPE%');
    });

    test('leaves %VAR% untouched on POSIX', () => {
        assert.strictEqual(expandVars('%PATH%', { PATH: '/usr/bin' }, 'linux'), '%PATH%');
    });

    test('merges overrides and expands them against the base environment', () => {
        const merged = mergeEnvironment(
            { PATH: '/usr/bin', HOME: '/home/builder', UNSET: undefined },
            { PATH: '/opt/bin:$PATH', FLAVOR: 'debug' },
            'linux'
        );
        assert.deepStrictEqual(merged, { PATH: '/opt/bin:/usr/bin', HOME: '/home/builder', FLAVOR: 'debug' });
    });
});

suite('readRunSettings', () => {
    test('falls back to defaults for missing or mistyped values', () => {
        assert.deepStrictEqual(readRunSettings(configOf({})), DEFAULT_RUN_SETTINGS);
        assert.deepStrictEqual(readRunSettings(configOf({ showPanelOnBuild: 'no', gutter: false })), {
            ...DEFAULT_RUN_SETTINGS,
            gutter: false
        });
    });

    test('reads buildEnv and drops an invalid one', () => {
        assert.deepStrictEqual(readRunSettings(configOf({ buildEnv: { FLAVOR: 'release' } })).buildEnv, { FLAVOR: 'release' });

        const originalWarn = console.warn;
        const warnings: unknown[] = [];
        console.warn = (...args: unknown[]) => { warnings.push(...args); };
        try {
            assert.deepStrictEqual(readRunSettings(configOf({ buildEnv: { FLAVOR: 1 } })).buildEnv, {});
        } finally {
            console.warn = originalWarn;
        }
        assert.deepStrictEqual(warnings, ['[Settings] Ignoring buildEnv: buildEnv.FLAVOR must be a string']);
    });
});

suite('parseExecOptions', () => {
    test('treats a missing definition as empty', () => {
        assert.deepStrictEqual(parseExecOptions(undefined), {});
        assert.deepStrictEqual(parseExecOptions(null), {});
    });

    test('keeps every recognised field', () => {
        const raw = {
            cmd: ['make', 'all'],
            fileRegex: '^(.+):(\\d+)',
            workingDir: '/src',
            encoding: 'latin1',
            env: { FLAVOR: 'debug' },
            quiet: true,
            shell: false,
            syntax: 'log',
            unknownKey: 'ignored'
        };
        assert.deepStrictEqual(parseExecOptions(raw), {
            cmd: ['make', 'all'],
            fileRegex: '^(.+):(\\d+)',
            workingDir: '/src',
            encoding: 'latin1',
            env: { FLAVOR: 'debug' },
            quiet: true,
            shell: false,
            syntax: 'log'
        });
    });

    test('rejects mistyped fields', () => {
        assert.throws(() => parseExecOptions('make'), configError('Build options must be an object'));
        assert.throws(() => parseExecOptions({ cmd: 5 }), configError('cmd must be a string or a list of strings'));
        assert.throws(() => parseExecOptions({ shellCmd: ['make'] }), configError('shell_cmd must be a string'));
        assert.throws(() => parseExecOptions({ workingDir: 1 }), configError('workingDir must be a string'));
        assert.throws(() => parseExecOptions({ quiet: 'yes' }), configError('quiet must be true or false'));
        assert.throws(() => parseExecOptions({ env: { A: 1 } }), configError('env.A must be a string'));
    });
});

suite('resolveSpawnPlan', () => {
    test('runs shell commands through the platform shell', () => {
        assert.deepStrictEqual(resolveSpawnPlan({ shellCmd: 'make -j4' }, 'linux'),
            { file: '/usr/bin/env', args: ['bash', '-c', 'make -j4'], shell: false });
        assert.deepStrictEqual(resolveSpawnPlan({ shellCmd: 'make -j4' }, 'darwin'),
            { file: '/usr/bin/env', args: ['bash', '-l', '-c', 'make -j4'], shell: false });
        assert.deepStrictEqual(resolveSpawnPlan({ shellCmd: 'make -j4' }, 'win32'),
            { file: 'make -j4', args: [], shell: true });
    });

    test('runs argument vectors directly unless shell is set', () => {
        assert.deepStrictEqual(resolveSpawnPlan({ cmd: ['gcc', '-c', 'a.c'] }, 'linux'),
            { file: 'gcc', args: ['-c', 'a.c'], shell: false });
        assert.deepStrictEqual(resolveSpawnPlan({ cmd: ['gcc', '-c', 'a.c'] }, 'linux', true),
            { file: 'gcc', args: ['-c', 'a.c'], shell: true });
        assert.deepStrictEqual(resolveSpawnPlan({ cmd: 'make' }, 'linux'),
            { file: 'make', args: [], shell: true });
    });

    test('requires exactly one well-formed command', () => {
        assert.throws(() => resolveSpawnPlan({}, 'linux'), configError('shell_cmd or cmd is required'));
        assert.throws(() => resolveSpawnPlan({ cmd: [] }, 'linux'), configError('shell_cmd or cmd is required'));
        assert.throws(() => resolveSpawnPlan({ cmd: ['make'], shellCmd: 'make' }, 'linux'),
            configError('Only one of shell_cmd or cmd may be given'));
        assert.throws(() => resolveSpawnPlan({ shellCmd: 5 }, 'linux'), configError('shell_cmd must be a string'));
        assert.throws(() => resolveSpawnPlan({ cmd: ['make', 1] }, 'linux'), configError('cmd must be a list of strings'));
    });
});
