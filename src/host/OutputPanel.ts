import * as vscode from 'vscode';
import { ResultBuffer } from '../services/ResultBuffer';
import { BufferSettings, DisplayBuffer, DisplayPanel, ViewState } from '../services/types';

export const OUTPUT_CHANNEL_NAME = 'Build Output';

function isOutputEditor(editor: vscode.TextEditor | undefined): editor is vscode.TextEditor {
    return !!editor
        && editor.document.uri.scheme === 'output'
        && editor.document.uri.path.includes(OUTPUT_CHANNEL_NAME);
}

/**
 * Display buffer backed by an output channel. The text and result matching
 * live in ResultBuffer; the channel mirrors every append.
 */
class OutputChannelBuffer extends ResultBuffer {
    private channel: vscode.OutputChannel | undefined;
    private languageId = '';

    channelFor(syntax: string): vscode.OutputChannel {
        if (!this.channel || this.languageId !== syntax) {
            this.channel?.dispose();
            this.channel = vscode.window.createOutputChannel(OUTPUT_CHANNEL_NAME, syntax);
            this.languageId = syntax;
        }
        return this.channel;
    }

    configure(settings: BufferSettings): void {
        super.configure(settings);
        this.channelFor(settings.syntax);
        const editor = vscode.window.visibleTextEditors.find(isOutputEditor);
        if (editor) {
            editor.options = {
                lineNumbers: settings.gutter ? vscode.TextEditorLineNumbersStyle.On : vscode.TextEditorLineNumbersStyle.Off
            };
        }
    }

    clear(): void {
        super.clear();
        this.channel?.clear();
    }

    append(text: string): void {
        super.append(text);
        this.channelFor(this.settings.syntax).append(text);
    }

    show(preserveFocus: boolean): void {
        this.channelFor(this.settings.syntax).show(preserveFocus);
    }

    saveViewState(): ViewState | null {
        const editor = vscode.window.visibleTextEditors.find(isOutputEditor);
        if (!editor) return null;
        const document = editor.document;
        return {
            firstVisibleLine: editor.visibleRanges[0]?.start.line ?? 0,
            selections: editor.selections.map(selection => ({
                start: document.offsetAt(selection.start),
                end: document.offsetAt(selection.end)
            }))
        };
    }

    restoreViewState(state: ViewState): void {
        const editor = vscode.window.visibleTextEditors.find(isOutputEditor);
        if (!editor) return;
        const document = editor.document;
        const top = new vscode.Position(state.firstVisibleLine, 0);
        editor.revealRange(new vscode.Range(top, top), vscode.TextEditorRevealType.AtTop);
        if (state.selections.length > 0) {
            editor.selections = state.selections.map(({ start, end }) =>
                new vscode.Selection(document.positionAt(start), document.positionAt(end)));
        }
    }

    /** Long error lines leave the panel scrolled to the right; bring column 0 back into view. */
    resetHorizontalScroll(): void {
        const editor = vscode.window.visibleTextEditors.find(isOutputEditor);
        if (!editor) return;
        const line = editor.visibleRanges[0]?.start.line ?? 0;
        const start = new vscode.Position(line, 0);
        editor.revealRange(new vscode.Range(start, start), vscode.TextEditorRevealType.AtTop);
    }

    dispose(): void {
        this.channel?.dispose();
        this.channel = undefined;
    }
}

export class OutputPanel implements DisplayPanel, vscode.Disposable {
    private readonly _buffer = new OutputChannelBuffer();

    buffer(): DisplayBuffer {
        return this._buffer;
    }

    show(): void {
        this._buffer.show(true);
    }

    isFocused(): boolean {
        return isOutputEditor(vscode.window.activeTextEditor);
    }

    dispose(): void {
        this._buffer.dispose();
    }
}
