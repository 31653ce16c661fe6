import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PeerLink } from './PeerLink';
import { encodeMessage, controlMessage, textUpdate } from '../codec';
import { ConnectionLostError, FramingError, WriteError } from '../errors';
import { MessageKind } from '../types';
import { MockSocket, rawFrame, silentLogger, flush } from '../../tests/test-utils';

describe('PeerLink', () => {
    let socket: MockSocket;
    let link: PeerLink;

    beforeEach(() => {
        socket = new MockSocket();
        link = new PeerLink(socket, { logger: silentLogger(), maxFrameBytes: 64 });
    });

    it('names the peer by address and port', () => {
        expect(link.peer).toBe('10.0.0.2:40000');
    });

    describe('send', () => {
        it('writes one encoded frame per message', () => {
            expect(link.send(textUpdate('hi'))).toBe(true);
            expect(link.send(controlMessage(MessageKind.GrantControl))).toBe(true);

            expect(socket.written).toEqual([
                encodeMessage(textUpdate('hi')),
                encodeMessage(controlMessage(MessageKind.GrantControl)),
            ]);
        });

        it('refuses a message over the frame limit and stays open', () => {
            const onError = vi.fn();
            const onClosed = vi.fn();
            link.on('error', onError);
            link.on('closed', onClosed);

            // body is 35 bytes of envelope plus 100 of content
            expect(link.send(textUpdate('x'.repeat(100)))).toBe(false);

            expect(socket.write).not.toHaveBeenCalled();
            expect(onError).toHaveBeenCalledTimes(1);
            expect(onError.mock.calls[0][0]).toBeInstanceOf(WriteError);
            expect(onError.mock.calls[0][0].message).toBe(
                'Cannot send TEXT_UPDATE: frame length 135 exceeds limit of 64 bytes'
            );
            expect(onClosed).not.toHaveBeenCalled();
            expect(link.isClosed).toBe(false);

            expect(link.send(textUpdate('small'))).toBe(true);
        });

        it('drops messages once the link is closed', () => {
            link.close();
            expect(link.send(textUpdate('late'))).toBe(false);
            expect(socket.write).not.toHaveBeenCalled();
        });

        it('fails the link when the socket is already gone', () => {
            const onError = vi.fn();
            const onClosed = vi.fn();
            link.on('error', onError);
            link.on('closed', onClosed);
            socket.destroyed = true;

            expect(link.send(textUpdate('x'))).toBe(false);
            expect(onError).toHaveBeenCalledWith(expect.any(WriteError));
            expect(onClosed).toHaveBeenCalledWith('error');
        });

        it('fails the link when a write completes with an error', async () => {
            const onError = vi.fn();
            const onClosed = vi.fn();
            link.on('error', onError);
            link.on('closed', onClosed);
            socket.writeError = new Error('EPIPE');

            expect(link.send(textUpdate('x'))).toBe(true);
            await flush();

            expect(onError).toHaveBeenCalledTimes(1);
            expect(onError.mock.calls[0][0]).toBeInstanceOf(WriteError);
            expect(onError.mock.calls[0][0].message).toBe('Write to 10.0.0.2:40000 failed: EPIPE');
            expect(onClosed).toHaveBeenCalledWith('error');
        });
    });

    describe('receive', () => {
        it('reassembles a frame delivered one byte at a time', () => {
            const onMessage = vi.fn();
            link.on('message', onMessage);
            const frame = encodeMessage(textUpdate('abc'));

            for (let i = 0; i < frame.length - 1; i++) {
                socket.simulateData(frame.subarray(i, i + 1));
            }
            expect(onMessage).not.toHaveBeenCalled();
            expect(link.pendingBytes).toBe(frame.length - 1);

            socket.simulateData(frame.subarray(frame.length - 1));
            expect(onMessage).toHaveBeenCalledWith({ type: MessageKind.TextUpdate, content: 'abc' });
            expect(link.pendingBytes).toBe(0);
        });

        it('dispatches coalesced frames in order', () => {
            const received: string[] = [];
            link.on('message', (message) => received.push(message.type));
            const a = encodeMessage(controlMessage(MessageKind.RequestControl));
            const b = encodeMessage(textUpdate('z'));
            const both = new Uint8Array(a.length + b.length);
            both.set(a, 0);
            both.set(b, a.length);

            socket.simulateData(both);
            expect(received).toEqual(['REQ_CONTROL', 'TEXT_UPDATE']);
        });

        it('skips an undecodable frame and keeps reading', () => {
            const onMessage = vi.fn();
            const onFrameError = vi.fn();
            link.on('message', onMessage);
            link.on('frameError', onFrameError);

            const bad = rawFrame('{nope');
            const good = encodeMessage(textUpdate('ok'));
            const both = new Uint8Array(bad.length + good.length);
            both.set(bad, 0);
            both.set(good, bad.length);
            socket.simulateData(both);

            expect(onFrameError).toHaveBeenCalledWith(expect.any(FramingError));
            expect(onMessage).toHaveBeenCalledWith({ type: MessageKind.TextUpdate, content: 'ok' });
            expect(link.isClosed).toBe(false);
        });

        it('closes the link on a frame over the size limit', () => {
            const onFrameError = vi.fn();
            const onClosed = vi.fn();
            link.on('frameError', onFrameError);
            link.on('closed', onClosed);

            socket.simulateData(rawFrame('', 1000));

            expect(onFrameError).toHaveBeenCalledTimes(1);
            expect(onClosed).toHaveBeenCalledWith('framing');
            expect(socket.destroy).toHaveBeenCalledTimes(1);
        });
    });

    describe('close', () => {
        it('reports a remote close', () => {
            const onClosed = vi.fn();
            link.on('closed', onClosed);

            socket.simulateRemoteClose();
            expect(onClosed).toHaveBeenCalledWith('remote');
        });

        it('reports a socket error as a lost connection, once', async () => {
            const onError = vi.fn();
            const onClosed = vi.fn();
            link.on('error', onError);
            link.on('closed', onClosed);

            socket.emit('error', new Error('ECONNRESET'));
            await flush();

            expect(onError).toHaveBeenCalledWith(expect.any(ConnectionLostError));
            expect(onClosed).toHaveBeenCalledTimes(1);
            expect(onClosed).toHaveBeenCalledWith('error');
        });

        it('is idempotent', async () => {
            const onClosed = vi.fn();
            link.on('closed', onClosed);

            link.close('stopped');
            link.close('local');
            await flush();

            expect(onClosed).toHaveBeenCalledTimes(1);
            expect(onClosed).toHaveBeenCalledWith('stopped');
            expect(socket.destroy).toHaveBeenCalledTimes(1);
            expect(link.isClosed).toBe(true);
        });
    });
});
