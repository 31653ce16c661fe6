import { describe, it, expect, vi } from 'vitest';
import { MemoryDocument, bindDocument } from './MemoryDocument';

describe('MemoryDocument', () => {
    it('moves the caret to the end of a typed edit', () => {
        const doc = new MemoryDocument();
        expect(doc.type('hello')).toBe(true);
        expect(doc.getText()).toBe('hello');
        expect(doc.getViewState()).toEqual({ anchor: 5, position: 5, scrollTop: 0 });
    });

    it('refuses edits while read-only', () => {
        const doc = new MemoryDocument('locked');
        const onAttempt = vi.fn();
        const onChange = vi.fn();
        doc.on('readOnlyEditAttempt', onAttempt);
        doc.on('change', onChange);
        doc.setReadOnly(true);

        expect(doc.type('changed')).toBe(false);
        expect(doc.getText()).toBe('locked');
        expect(onAttempt).toHaveBeenCalledTimes(1);
        expect(onChange).not.toHaveBeenCalled();
    });

    it('fires change on programmatic replacement, even while read-only', () => {
        const doc = new MemoryDocument();
        const onChange = vi.fn();
        doc.on('change', onChange);
        doc.setReadOnly(true);

        doc.setText('from peer');
        expect(onChange).toHaveBeenCalledWith('from peer');
    });

    it('keeps the scroll offset when a view state omits it', () => {
        const doc = new MemoryDocument('abc');
        doc.scrollTo(12);
        doc.setViewState({ anchor: 1, position: 2 });
        expect(doc.getViewState()).toEqual({ anchor: 1, position: 2, scrollTop: 12 });
    });

    it('returns a copy of the view state', () => {
        const doc = new MemoryDocument('abc');
        const view = doc.getViewState();
        view.anchor = 3;
        expect(doc.getViewState().anchor).toBe(0);
    });
});

describe('bindDocument', () => {
    it('forwards edits and read-only attempts until unbound', () => {
        const doc = new MemoryDocument();
        const sink = { onLocalDocumentChanged: vi.fn(), onUserRequestedReclaim: vi.fn() };
        const unbind = bindDocument(sink, doc);

        doc.type('a');
        doc.setReadOnly(true);
        doc.type('b');
        expect(sink.onLocalDocumentChanged).toHaveBeenCalledTimes(1);
        expect(sink.onUserRequestedReclaim).toHaveBeenCalledTimes(1);

        unbind();
        doc.type('c');
        expect(sink.onUserRequestedReclaim).toHaveBeenCalledTimes(1);
    });
});
