import * as path from 'path';
import * as vscode from 'vscode';
import { hoverMarkdown } from '../services/AnnotationRenderer';
import { AnnotatedView, AnnotationHost, Marker, MarkerSet } from '../services/types';

/**
 * Renders build errors as end-of-line decorations. The hover carries the
 * message and a link that dismisses every marker.
 */
export class DecorationAnnotations implements AnnotationHost, vscode.Disposable {
    private readonly decorationTypes = new Map<string, vscode.TextEditorDecorationType>();
    private dismissHandler: (() => void) | undefined;

    constructor(private readonly dismissCommand: string) { }

    findOpenFile(file: string): AnnotatedView | undefined {
        const target = this.resolve(file);
        const editor = vscode.window.visibleTextEditors.find(e =>
            e.document.uri.scheme === 'file' && path.normalize(e.document.uri.fsPath) === target);
        return editor ? this.viewFor(editor.document) : undefined;
    }

    /** Invoked by the dismiss command; runs the handler of the markers shown last. */
    dismiss(): boolean {
        const handler = this.dismissHandler;
        this.dismissHandler = undefined;
        handler?.();
        return handler !== undefined;
    }

    dispose(): void {
        for (const type of this.decorationTypes.values()) {
            type.dispose();
        }
        this.decorationTypes.clear();
    }

    private resolve(file: string): string {
        if (path.isAbsolute(file)) return path.normalize(file);
        const folder = vscode.workspace.workspaceFolders?.[0];
        return path.normalize(folder ? path.join(folder.uri.fsPath, file) : path.resolve(file));
    }

    private decorationType(key: string): vscode.TextEditorDecorationType {
        let type = this.decorationTypes.get(key);
        if (!type) {
            type = vscode.window.createTextEditorDecorationType({
                backgroundColor: new vscode.ThemeColor('inputValidation.errorBackground'),
                after: {
                    margin: '0 0 0 1.5em',
                    color: new vscode.ThemeColor('editorError.foreground')
                }
            });
            this.decorationTypes.set(key, type);
        }
        return type;
    }

    private editorsFor(document: vscode.TextDocument): vscode.TextEditor[] {
        const uri = document.uri.toString();
        return vscode.window.visibleTextEditors.filter(e => e.document.uri.toString() === uri);
    }

    private toDecoration(document: vscode.TextDocument, marker: Marker): vscode.DecorationOptions {
        const hover = new vscode.MarkdownString(hoverMarkdown(marker, this.dismissCommand));
        // Only the dismiss link may run a command; build output stays inert text
        hover.isTrusted = { enabledCommands: [this.dismissCommand] };
        return {
            range: new vscode.Range(document.positionAt(marker.start), document.positionAt(marker.end)),
            hoverMessage: hover,
            renderOptions: { after: { contentText: marker.message } }
        };
    }

    private viewFor(document: vscode.TextDocument): AnnotatedView {
        return {
            bufferId: document.uri.toString(),
            textPoint: (line, column) => document.offsetAt(document.validatePosition(new vscode.Position(line, column))),
            lineEnd: (offset) => document.offsetAt(document.lineAt(document.positionAt(offset).line).range.end),
            createMarkerSet: (key): MarkerSet => ({
                update: (markers) => {
                    const type = this.decorationType(key);
                    const decorations = markers.map(marker => this.toDecoration(document, marker));
                    for (const editor of this.editorsFor(document)) {
                        editor.setDecorations(type, decorations);
                    }
                    if (markers.length > 0) {
                        this.dismissHandler = markers[0].onDismiss;
                    }
                }
            }),
            eraseMarkers: (key) => {
                const type = this.decorationTypes.get(key);
                if (!type) return;
                for (const editor of this.editorsFor(document)) {
                    editor.setDecorations(type, []);
                }
            }
        };
    }
}
