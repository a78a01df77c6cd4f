import * as vscode from 'vscode';
import { DecorationAnnotations } from './host/DecorationAnnotations';
import { OutputPanel } from './host/OutputPanel';
import { StatusBarProgress } from './host/StatusBarProgress';
import { errorMessage } from './services/errors';
import { ExecutionContexts } from './services/ExecutionContexts';
import { RunController } from './services/RunController';
import { parseExecOptions, readRunSettings } from './services/settings';

const CONFIG_SECTION = 'buildPanel';
const CAN_CANCEL_CONTEXT_KEY = 'buildPanel.canCancel';

const COMMANDS = {
    run: 'buildPanel.run',
    cancel: 'buildPanel.cancel',
    focusOrCancel: 'buildPanel.focusOrCancel',
    hideAnnotations: 'buildPanel.hideAnnotations',
    updateAnnotations: 'buildPanel.updateAnnotations'
} as const;

let controller: RunController | null = null;
let logChannel: vscode.OutputChannel | null = null;

function log(msg: string): void {
    logChannel?.appendLine(`${new Date().toISOString()} ${msg}`);
}

function activeFileName(): string | undefined {
    const document = vscode.window.activeTextEditor?.document;
    if (!document || document.uri.scheme !== 'file') return undefined;
    return document.uri.fsPath;
}

async function runBuild(args: unknown): Promise<void> {
    if (!controller) return;
    const raw = args ?? vscode.workspace.getConfiguration(CONFIG_SECTION).get<unknown>('build');
    try {
        const options = parseExecOptions(raw);
        await controller.invoke(options);
    } catch (e) {
        const msg = errorMessage(e);
        log(`[Extension] Build command failed: ${msg}`);
        vscode.window.showErrorMessage(`Build Panel: ${msg}`);
    }
}

export function activate(context: vscode.ExtensionContext) {
    logChannel = vscode.window.createOutputChannel('Build Panel Log');
    context.subscriptions.push(logChannel);

    const panel = new OutputPanel();
    const status = new StatusBarProgress(COMMANDS.cancel);
    const annotations = new DecorationAnnotations(COMMANDS.hideAnnotations);
    context.subscriptions.push(panel, status, annotations);

    const runController = new RunController({
        contextId: vscode.env.sessionId,
        contexts: new ExecutionContexts(),
        panel,
        status,
        annotations,
        settings: () => readRunSettings(vscode.workspace.getConfiguration(CONFIG_SECTION)),
        activeFile: activeFileName,
        log,
        onStateChange: (state) => {
            log(`[Extension] Build state: ${state}`);
            vscode.commands.executeCommand('setContext', CAN_CANCEL_CONTEXT_KEY, runController.canCancel())
                .then(undefined, (e) => log(`[Extension] setContext failed: ${e}`));
        }
    });
    controller = runController;
    context.subscriptions.push({ dispose: () => runController.dispose() });

    const runDisposable = vscode.commands.registerCommand(COMMANDS.run, (args?: unknown) => runBuild(args));
    context.subscriptions.push(runDisposable);

    const cancelDisposable = vscode.commands.registerCommand(COMMANDS.cancel, () => runBuild({ kill: true }));
    context.subscriptions.push(cancelDisposable);

    // Focus the panel first; a second press while it has focus cancels the build
    const focusOrCancelDisposable = vscode.commands.registerCommand(COMMANDS.focusOrCancel, async () => {
        if (panel.isFocused() && runController.canCancel()) {
            log('[Extension] Cancelling the build from the focused panel');
            vscode.window.setStatusBarMessage('Cancelling the build...', 3000);
            await runBuild({ kill: true });
            return;
        }
        panel.show();
    });
    context.subscriptions.push(focusOrCancelDisposable);

    const hideAnnotationsDisposable = vscode.commands.registerCommand(COMMANDS.hideAnnotations, () => {
        if (!annotations.dismiss()) {
            runController.hideAnnotations();
        }
    });
    context.subscriptions.push(hideAnnotationsDisposable);

    const updateAnnotationsDisposable = vscode.commands.registerCommand(COMMANDS.updateAnnotations, () => {
        runController.updateAnnotations();
    });
    context.subscriptions.push(updateAnnotationsDisposable);

    // Files opened after the build still get their markers
    context.subscriptions.push(vscode.window.onDidChangeVisibleTextEditors(() => {
        runController.updateAnnotations();
    }));

    log('[Extension] Build Panel activated');
}

export function deactivate() {
    controller?.dispose();
    controller = null;
    logChannel = null;
}
