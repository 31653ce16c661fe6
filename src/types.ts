/**
 * Shared types for the session core and its collaborators.
 */

/**
 * Wire names of the five message kinds.
 */
export enum MessageKind {
    TextUpdate = 'TEXT_UPDATE',
    RequestControl = 'REQ_CONTROL',
    GrantControl = 'GRANT_CONTROL',
    RevokeControl = 'REVOKE_CONTROL',
    DeclineControl = 'DECLINE_CONTROL',
}

/**
 * One frame's worth of data. `content` carries the full document for
 * `TEXT_UPDATE` and is empty for the control kinds.
 */
export interface Message {
    type: MessageKind;
    content: string;
}

export type ControlMessageKind = Exclude<MessageKind, MessageKind.TextUpdate>;

export type SessionRole = 'none' | 'host' | 'client';
export type LinkState = 'idle' | 'listening' | 'connected';

/**
 * Flat view of the session, as seen from outside the core.
 */
export interface SessionSnapshot {
    role: SessionRole;
    linkState: LinkState;
    hasControl: boolean;
}

/**
 * Why a peer link went away.
 * - `remote`: the peer closed the connection
 * - `local`: this side closed it
 * - `stopped`: the session was stopped
 * - `preempted`: a newer client replaced this one on the host
 * - `error`: socket or write failure
 * - `framing`: the stream could not be re-synchronised
 */
export type CloseReason = 'remote' | 'local' | 'stopped' | 'preempted' | 'error' | 'framing';

/**
 * Caret, selection anchor and scroll offset of an editor view.
 */
export interface EditorViewState {
    anchor: number;
    position: number;
    scrollTop?: number;
}

/**
 * The editor the core drives. It owns the document; the core only reads it
 * when sending and replaces it when a remote update is applied.
 */
export interface DocumentEditor {
    getText(): string;
    /** Replace the whole content. May fire the editor's own change notification. */
    setText(text: string): void;
    getViewState(): EditorViewState;
    setViewState(state: EditorViewState): void;
    setReadOnly(readOnly: boolean): void;
}

/**
 * Editor-to-core notifications.
 */
export interface LocalEditSink {
    onLocalDocumentChanged(): void;
    onUserRequestedReclaim(): void;
}

/**
 * Decides on a control request arriving at the host.
 */
export interface ControlApprover {
    approveControlRequest(): boolean | Promise<boolean>;
}
