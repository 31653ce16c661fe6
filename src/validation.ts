import { z } from 'zod';
import { MessageKind, type Message } from './types';

/**
 * Zod schema for the JSON envelope inside a frame.
 * Control messages may omit `content`; whatever they carry is dropped.
 */
const TextUpdateSchema = z.object({
    type: z.literal(MessageKind.TextUpdate),
    content: z.string(),
});

const ControlSchema = z.object({
    type: z.enum([
        MessageKind.RequestControl,
        MessageKind.GrantControl,
        MessageKind.RevokeControl,
        MessageKind.DeclineControl,
    ]),
    content: z.string().optional(),
});

const WireMessageSchema = z.discriminatedUnion('type', [TextUpdateSchema, ControlSchema]);

export type ValidationResult =
    | { ok: true; message: Message }
    | { ok: false; reason: string };

/**
 * Validates an already-parsed JSON value as a wire message.
 */
export function validateWireMessage(json: unknown): ValidationResult {
    const result = WireMessageSchema.safeParse(json);

    if (!result.success) {
        const reason = result.error.issues
            .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
            .join('; ');
        return { ok: false, reason };
    }

    const data = result.data;
    if (data.type === MessageKind.TextUpdate) {
        return { ok: true, message: { type: data.type, content: data.content } };
    }
    return { ok: true, message: { type: data.type, content: '' } };
}
