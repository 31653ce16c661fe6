import fs from 'fs';
import { EventEmitter } from '../utils/EventEmitter';
import { Logger, logger as rootLogger } from '../utils/Logger';
import type { DocumentEditor, EditorViewState } from '../types';
import type { DocumentEvents } from './MemoryDocument';

/**
 * A text file on disk used as the shared document. Saves made by any
 * editor become local changes; remote updates are written back to the
 * file. While read-only, a save is reverted and reported as an edit attempt.
 * A file has no caret, so view state is not tracked.
 */
export class FileDocument extends EventEmitter<DocumentEvents> implements DocumentEditor {
    private text: string;
    private readOnly = false;
    private watcher: fs.FSWatcher | null = null;
    private readonly logger: Logger;

    constructor(public readonly path: string, logger?: Logger) {
        super();
        this.logger = logger ?? rootLogger.child('file');
        this.text = fs.existsSync(path) ? fs.readFileSync(path, 'utf8') : '';
    }

    /**
     * Starts watching the file for saves.
     */
    public watch(): void {
        if (this.watcher) return;
        if (!fs.existsSync(this.path)) {
            fs.writeFileSync(this.path, this.text);
        }
        this.watcher = fs.watch(this.path, () => this.refresh());
        this.watcher.on('error', (err) => this.logger.error(`Watching ${this.path} failed: ${err.message}`));
    }

    /**
     * Re-reads the file and reacts to a content change. Called by the
     * watcher; editors can call it directly after a save.
     */
    public refresh(): void {
        let onDisk: string;
        try {
            onDisk = fs.readFileSync(this.path, 'utf8');
        } catch (err) {
            this.logger.warn(`Could not read ${this.path}`, err);
            return;
        }
        if (onDisk === this.text) return;

        if (this.readOnly) {
            this.logger.info(`${this.path} is read-only while the peer holds control; reverting`);
            fs.writeFileSync(this.path, this.text);
            this.emit('readOnlyEditAttempt');
            return;
        }

        this.text = onDisk;
        this.emit('change', onDisk);
    }

    public getText(): string {
        return this.text;
    }

    public setText(text: string): void {
        this.text = text;
        fs.writeFileSync(this.path, text);
        this.emit('change', text);
    }

    public getViewState(): EditorViewState {
        return { anchor: 0, position: 0 };
    }

    public setViewState(_state: EditorViewState): void {
        // files have no view
    }

    public setReadOnly(readOnly: boolean): void {
        this.readOnly = readOnly;
    }

    public isReadOnly(): boolean {
        return this.readOnly;
    }

    public dispose(): void {
        this.watcher?.close();
        this.watcher = null;
        this.removeAllListeners();
    }
}
