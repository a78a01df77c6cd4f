import * as vscode from 'vscode';
import { StatusReporter } from '../services/types';

const STATUS_MESSAGE_MS = 5000;
const SUCCESS_MESSAGE_MS = 10000;

export class StatusBarProgress implements StatusReporter, vscode.Disposable {
    private readonly item: vscode.StatusBarItem;
    private successMessage = '';
    private hideTimer: NodeJS.Timeout | undefined;

    constructor(cancelCommand: string) {
        this.item = vscode.window.createStatusBarItem(vscode.StatusBarAlignment.Left, 50);
        this.item.command = cancelCommand;
    }

    showStatus(message: string): void {
        vscode.window.setStatusBarMessage(message, STATUS_MESSAGE_MS);
    }

    startProgress(message: string, successMessage: string): void {
        this.clearHideTimer();
        this.successMessage = successMessage;
        this.item.text = `$(sync~spin) ${message}`;
        this.item.tooltip = 'Click to cancel the build';
        this.item.show();
    }

    stopProgress(): void {
        this.clearHideTimer();
        this.item.text = `$(check) ${this.successMessage}`;
        this.item.tooltip = undefined;
        this.hideTimer = setTimeout(() => this.item.hide(), SUCCESS_MESSAGE_MS);
    }

    dispose(): void {
        this.clearHideTimer();
        this.item.dispose();
    }

    private clearHideTimer(): void {
        if (this.hideTimer) {
            clearTimeout(this.hideTimer);
            this.hideTimer = undefined;
        }
    }
}
