/**
 * @file codec.ts
 * @brief Frame encoding/decoding for the pairpen wire protocol.
 *
 * Each frame is a 4-byte big-endian unsigned length `N` followed by `N`
 * bytes of UTF-8 JSON: `{"type": "<MessageKind>", "content": "<string>"}`.
 *
 * @example
 * ```typescript
 * const bytes = encodeMessage({ type: MessageKind.TextUpdate, content: 'print(1)' });
 * const { message, bytesConsumed } = decodeFrame(bytes);
 * ```
 */

import { FramingError } from './errors';
import { MessageKind, type Message } from './types';
import { validateWireMessage } from './validation';

export const FRAME_HEADER_BYTES = 4;

/** Largest length the 4-byte header can express. */
export const MAX_FRAME_LIMIT = 0xffffffff;

export const DEFAULT_MAX_FRAME_BYTES = 16 * 1024 * 1024;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

export interface DecodeResult {
    message: Message | null;
    bytesConsumed: number;
}

/**
 * Encodes a message into a length-prefixed frame.
 */
export function encodeMessage(message: Message): Uint8Array {
    const content = message.type === MessageKind.TextUpdate ? message.content : '';
    const body = textEncoder.encode(JSON.stringify({ type: message.type, content }));

    const frame = new Uint8Array(FRAME_HEADER_BYTES + body.length);
    const view = new DataView(frame.buffer);
    view.setUint32(0, body.length, false);
    frame.set(body, FRAME_HEADER_BYTES);
    return frame;
}

/**
 * Builds a control frame (no content).
 */
export function controlMessage(type: Exclude<MessageKind, MessageKind.TextUpdate>): Message {
    return { type, content: '' };
}

export function textUpdate(content: string): Message {
    return { type: MessageKind.TextUpdate, content };
}

/**
 * Attempts to extract one complete frame from the front of `buffer`.
 *
 * Returns `{ message: null, bytesConsumed: 0 }` while the frame is
 * incomplete. Throws {@link FramingError} when the frame is complete but its
 * body is not a valid message (`recoverable`, with the frame's length so
 * the caller can skip it), or when the declared length exceeds
 * `maxFrameBytes` (not recoverable).
 */
export function decodeFrame(buffer: Uint8Array, maxFrameBytes: number = DEFAULT_MAX_FRAME_BYTES): DecodeResult {
    if (buffer.length < FRAME_HEADER_BYTES) {
        return { message: null, bytesConsumed: 0 };
    }

    const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    const bodyLength = view.getUint32(0, false);

    if (bodyLength > maxFrameBytes) {
        throw new FramingError(
            `Frame length ${bodyLength} exceeds limit of ${maxFrameBytes} bytes`,
            buffer.length,
            false
        );
    }

    const frameLength = FRAME_HEADER_BYTES + bodyLength;
    if (buffer.length < frameLength) {
        return { message: null, bytesConsumed: 0 };
    }

    const body = buffer.subarray(FRAME_HEADER_BYTES, frameLength);

    let raw: string;
    try {
        raw = textDecoder.decode(body);
    } catch {
        throw new FramingError('Frame body is not valid UTF-8', frameLength);
    }

    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new FramingError(
            `Failed to parse frame as JSON: ${error instanceof Error ? error.message : 'Unknown error'}`,
            frameLength
        );
    }

    const result = validateWireMessage(json);
    if (!result.ok) {
        throw new FramingError(`Invalid message: ${result.reason}`, frameLength);
    }

    return { message: result.message, bytesConsumed: frameLength };
}
