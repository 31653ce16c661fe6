import { Logger, logger as rootLogger, preview } from '../utils/Logger';
import { textUpdate } from '../codec';
import type { DocumentEditor, EditorViewState, Message } from '../types';
import type { SessionState } from './SessionState';

export interface DocumentSyncDeps {
    state: SessionState;
    editor: DocumentEditor;
    send: (message: Message) => boolean;
    logger?: Logger;
}

/**
 * Whole-document replacement policy.
 *
 * Outbound: the full text goes out on every local change while this side
 * holds control, unless the change came from applying a remote update.
 * Inbound: remote text replaces the document only while this side is a
 * viewer.
 */
export class DocumentSync {
    private readonly state: SessionState;
    private readonly editor: DocumentEditor;
    private readonly send: (message: Message) => boolean;
    private readonly logger: Logger;

    private applyingRemote = false;
    /** Last text sent or applied; identical local notifications are not re-sent. */
    private lastSynced: string | null = null;

    constructor(deps: DocumentSyncDeps) {
        this.state = deps.state;
        this.editor = deps.editor;
        this.send = deps.send;
        this.logger = deps.logger ?? rootLogger.child('sync');
    }

    public get isApplyingRemote(): boolean {
        return this.applyingRemote;
    }

    /**
     * Local edit notification. Returns whether a TEXT_UPDATE was sent.
     */
    public onLocalChange(): boolean {
        if (this.applyingRemote) return false;
        if (!this.state.isConnected || !this.state.hasControl) return false;

        const text = this.editor.getText();
        if (text === this.lastSynced) {
            this.logger.debug('Document unchanged since last sync; not sending');
            return false;
        }

        if (!this.send(textUpdate(text))) return false;
        this.lastSynced = text;
        return true;
    }

    /**
     * Sends the current document regardless of what was sent before. The
     * host calls this when a peer connects.
     */
    public pushDocument(): boolean {
        this.lastSynced = null;
        return this.onLocalChange();
    }

    /**
     * Applies a remote TEXT_UPDATE. Returns whether the document was replaced.
     */
    public applyInbound(text: string): boolean {
        if (!this.state.isConnected) {
            this.logger.warn('Ignoring TEXT_UPDATE outside a connected session');
            return false;
        }
        if (this.state.hasControl) {
            this.logger.warn('Ignoring TEXT_UPDATE while holding control', preview(text));
            return false;
        }

        this.applyingRemote = true;
        try {
            const view = this.editor.getViewState();
            this.editor.setText(text);
            this.editor.setViewState(clampViewState(view, text));
            this.lastSynced = text;
        } finally {
            this.applyingRemote = false;
        }
        return true;
    }

    public reset(): void {
        this.lastSynced = null;
    }
}

/**
 * Keeps caret and selection anchor inside `text`, and off the middle of a
 * surrogate pair.
 */
export function clampViewState(view: EditorViewState, text: string): EditorViewState {
    const clamp = (offset: number) => {
        const clamped = Math.max(0, Math.min(offset, text.length));
        return splitsSurrogatePair(text, clamped) ? clamped - 1 : clamped;
    };
    const clamped: EditorViewState = {
        anchor: clamp(view.anchor),
        position: clamp(view.position),
    };
    if (view.scrollTop !== undefined) {
        clamped.scrollTop = view.scrollTop;
    }
    return clamped;
}

function splitsSurrogatePair(text: string, offset: number): boolean {
    if (offset <= 0 || offset >= text.length) return false;
    const before = text.charCodeAt(offset - 1);
    const after = text.charCodeAt(offset);
    return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}
