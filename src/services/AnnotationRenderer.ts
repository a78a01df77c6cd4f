import { ErrorIndex } from './ErrorIndex';
import { AnnotatedView, AnnotationHost, LogFn, Marker, MarkerSet } from './types';

const MARKER_KEY = 'build-panel';

export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;');
}

const MARKDOWN_SYNTAX_RE = /[\\`*_{}[\]()#+\-.!|~]/g;

/** Backslash-escapes Markdown syntax. `&`, `<` and `>` are left to escapeHtml. */
export function escapeMarkdown(text: string): string {
    return text.replace(MARKDOWN_SYNTAX_RE, '\\$&');
}

/** Hover body for a marker: the message as literal text, then a link running `dismissCommand`. */
export function hoverMarkdown(marker: Pick<Marker, 'html'>, dismissCommand: string): string {
    return `${escapeMarkdown(marker.html)} [×](command:${dismissCommand})`;
}

/**
 * Projects the ErrorIndex onto open source views as dismissible inline markers.
 * Files that are not open are skipped; render() runs again when they open.
 */
export class AnnotationRenderer {
    private readonly markerSets = new Map<string, { view: AnnotatedView; set: MarkerSet }>();
    private _enabled = true;

    constructor(
        private readonly host: AnnotationHost,
        private readonly index: ErrorIndex,
        private readonly log?: LogFn
    ) { }

    get enabled(): boolean {
        return this._enabled;
    }

    enable(enabled: boolean = true): void {
        this._enabled = enabled;
    }

    render(): void {
        if (!this._enabled) return;

        for (const [file, entries] of this.index.entries()) {
            const view = this.host.findOpenFile(file);
            if (!view) continue;

            let tracked = this.markerSets.get(view.bufferId);
            if (!tracked) {
                tracked = { view, set: view.createMarkerSet(MARKER_KEY) };
                this.markerSets.set(view.bufferId, tracked);
            }

            const markers: Marker[] = entries.map(({ line, column, message }) => {
                const start = view.textPoint(line - 1, column - 1);
                return {
                    start,
                    end: view.lineEnd(start),
                    message,
                    html: escapeHtml(message),
                    onDismiss: () => this.hideAll()
                };
            });
            tracked.set.update(markers);
        }
    }

    /** Removes every marker, empties the index and stops rendering until re-enabled. */
    hideAll(): void {
        const erased = new Set<string>();
        for (const file of this.index.files()) {
            const view = this.host.findOpenFile(file);
            if (view) {
                view.eraseMarkers(MARKER_KEY);
                erased.add(view.bufferId);
            }
        }
        for (const [bufferId, { view }] of this.markerSets) {
            if (!erased.has(bufferId)) {
                view.eraseMarkers(MARKER_KEY);
            }
        }
        if (this.markerSets.size > 0) {
            this.log?.(`[AnnotationRenderer] Cleared markers in ${this.markerSets.size} view(s)`);
        }

        this.index.clear();
        this.markerSets.clear();
        this._enabled = false;
    }
}
