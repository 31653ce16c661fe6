import { EventEmitter } from '../utils/EventEmitter';
import type { DocumentEditor, EditorViewState, LocalEditSink } from '../types';

export type DocumentEvents = {
    /** Fired on every content change, local or programmatic. */
    change: [text: string];
    /** A user edit was refused because the document is read-only. */
    readOnlyEditAttempt: [];
};

/**
 * In-memory editor model: text, caret, selection anchor, scroll offset and
 * a read-only flag. Behaves like a text widget: `setText` fires `change`
 * just as user edits do.
 */
export class MemoryDocument extends EventEmitter<DocumentEvents> implements DocumentEditor {
    private text: string;
    private view: EditorViewState = { anchor: 0, position: 0, scrollTop: 0 };
    private readOnly = false;

    constructor(initialText: string = '') {
        super();
        this.text = initialText;
    }

    public getText(): string {
        return this.text;
    }

    public setText(text: string): void {
        this.text = text;
        this.view = { ...this.view, anchor: 0, position: 0 };
        this.emit('change', text);
    }

    /**
     * A user edit replacing the whole content. Refused while read-only.
     * @returns whether the edit was applied
     */
    public type(text: string): boolean {
        if (this.readOnly) {
            this.emit('readOnlyEditAttempt');
            return false;
        }
        this.text = text;
        this.view = { ...this.view, anchor: text.length, position: text.length };
        this.emit('change', text);
        return true;
    }

    public select(anchor: number, position: number): void {
        this.view = { ...this.view, anchor, position };
    }

    public scrollTo(scrollTop: number): void {
        this.view = { ...this.view, scrollTop };
    }

    public getViewState(): EditorViewState {
        return { ...this.view };
    }

    public setViewState(state: EditorViewState): void {
        this.view = {
            anchor: state.anchor,
            position: state.position,
            scrollTop: state.scrollTop ?? this.view.scrollTop,
        };
    }

    public setReadOnly(readOnly: boolean): void {
        this.readOnly = readOnly;
    }

    public isReadOnly(): boolean {
        return this.readOnly;
    }
}

/**
 * Forwards an editor's notifications to the session.
 * @returns a function that removes the forwarding
 */
export function bindDocument(sink: LocalEditSink, doc: EventEmitter<DocumentEvents>): () => void {
    const offChange = doc.on('change', () => sink.onLocalDocumentChanged());
    const offAttempt = doc.on('readOnlyEditAttempt', () => sink.onUserRequestedReclaim());
    return () => {
        offChange();
        offAttempt();
    };
}
