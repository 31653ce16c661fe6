import { describe, it, expect, vi } from 'vitest';
import { ControlArbiter } from './ControlArbiter';
import { SessionState } from './SessionState';
import { Logger, LogLevel } from '../utils/Logger';
import { MessageKind, type ControlApprover, type Message } from '../types';
import { ProtocolAnomalyError } from '../errors';

const quiet = new Logger('test');
quiet.setLogLevel(LogLevel.NONE);

const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

function connected(role: 'host' | 'client'): SessionState {
    const state = new SessionState();
    if (role === 'host') state.toListening('127.0.0.1', 54321);
    state.toConnected(role, 'peer');
    return state;
}

function setup(role: 'host' | 'client', approver: ControlApprover = { approveControlRequest: () => true }) {
    const state = connected(role);
    const sent: MessageKind[] = [];
    const onDeclined = vi.fn();
    const onAnomaly = vi.fn();
    const arbiter = new ControlArbiter({
        state,
        send: (message) => {
            sent.push(message.type);
            return true;
        },
        approver,
        logger: quiet,
        onDeclined,
        onAnomaly,
    });
    return { state, sent, arbiter, onDeclined, onAnomaly };
}

describe('ControlArbiter', () => {
    describe('client', () => {
        it('sends one request and suppresses duplicates while it is pending', () => {
            const { arbiter, sent } = setup('client');

            expect(arbiter.requestControl()).toBe(true);
            expect(arbiter.requestControl()).toBe(false);
            expect(sent).toEqual([MessageKind.RequestControl]);
            expect(arbiter.isRequestPending).toBe(true);
        });

        it('takes control on grant and gives it up on revoke', () => {
            const { arbiter, state } = setup('client');
            arbiter.requestControl();

            arbiter.handle(MessageKind.GrantControl);
            expect(state.hasControl).toBe(true);
            expect(arbiter.isRequestPending).toBe(false);

            arbiter.handle(MessageKind.RevokeControl);
            expect(state.hasControl).toBe(false);
        });

        it('does not request while holding control', () => {
            const { arbiter, state, sent } = setup('client');
            state.setControl(true);
            expect(arbiter.requestControl()).toBe(false);
            expect(sent).toEqual([]);
        });

        it('reports a decline and allows a new request', () => {
            const { arbiter, state, sent, onDeclined } = setup('client');
            arbiter.requestControl();

            arbiter.handle(MessageKind.DeclineControl);
            expect(onDeclined).toHaveBeenCalledTimes(1);
            expect(state.hasControl).toBe(false);

            expect(arbiter.requestControl()).toBe(true);
            expect(sent).toEqual([MessageKind.RequestControl, MessageKind.RequestControl]);
        });

        it('drops to viewer when it receives a request', () => {
            const { arbiter, state, onAnomaly } = setup('client');
            state.setControl(true);

            arbiter.handle(MessageKind.RequestControl);
            expect(state.hasControl).toBe(false);
            expect(onAnomaly).toHaveBeenCalledWith(expect.any(ProtocolAnomalyError));
        });

        it('cannot reclaim', () => {
            const { arbiter, sent } = setup('client');
            expect(arbiter.reclaim()).toBe(false);
            expect(sent).toEqual([]);
        });
    });

    describe('host', () => {
        it('grants an approved request and gives up control', () => {
            const { arbiter, state, sent } = setup('host');

            arbiter.handle(MessageKind.RequestControl);
            expect(state.hasControl).toBe(false);
            expect(sent).toEqual([MessageKind.GrantControl]);
        });

        it('declines a refused request and keeps control', () => {
            const { arbiter, state, sent } = setup('host', { approveControlRequest: () => false });

            arbiter.handle(MessageKind.RequestControl);
            expect(state.hasControl).toBe(true);
            expect(sent).toEqual([MessageKind.DeclineControl]);
        });

        it('declines when the approver throws or rejects', async () => {
            const throwing = setup('host', {
                approveControlRequest: () => {
                    throw new Error('no prompt available');
                },
            });
            throwing.arbiter.handle(MessageKind.RequestControl);
            expect(throwing.sent).toEqual([MessageKind.DeclineControl]);

            const rejecting = setup('host', {
                approveControlRequest: () => Promise.reject(new Error('prompt closed')),
            });
            rejecting.arbiter.handle(MessageKind.RequestControl);
            await flush();
            expect(rejecting.sent).toEqual([MessageKind.DeclineControl]);
            expect(rejecting.state.hasControl).toBe(true);
        });

        it('waits for an asynchronous decision and ignores duplicates meanwhile', async () => {
            let decide: (approved: boolean) => void = () => undefined;
            const approver = {
                approveControlRequest: vi.fn(() => new Promise<boolean>((resolve) => {
                    decide = resolve;
                })),
            };
            const { arbiter, state, sent } = setup('host', approver);

            arbiter.handle(MessageKind.RequestControl);
            arbiter.handle(MessageKind.RequestControl);
            expect(arbiter.isDecisionPending).toBe(true);
            expect(approver.approveControlRequest).toHaveBeenCalledTimes(1);
            expect(sent).toEqual([]);

            decide(true);
            await flush();
            expect(arbiter.isDecisionPending).toBe(false);
            expect(state.hasControl).toBe(false);
            expect(sent).toEqual([MessageKind.GrantControl]);
        });

        it('keeps control when the peer is replaced before the decision', async () => {
            let decide: (approved: boolean) => void = () => undefined;
            const { arbiter, state, sent } = setup('host', {
                approveControlRequest: () => new Promise<boolean>((resolve) => {
                    decide = resolve;
                }),
            });

            arbiter.handle(MessageKind.RequestControl);
            state.toConnected('host', 'newer-peer');
            decide(true);
            await flush();

            expect(state.hasControl).toBe(true);
            expect(sent).toEqual([]);
        });

        it('re-sends the grant when the client already holds control', () => {
            const { arbiter, state, sent } = setup('host');
            arbiter.handle(MessageKind.RequestControl);

            arbiter.handle(MessageKind.RequestControl);
            expect(state.hasControl).toBe(false);
            expect(sent).toEqual([MessageKind.GrantControl, MessageKind.GrantControl]);
        });

        it('reclaims control after granting it', () => {
            const { arbiter, state, sent } = setup('host');
            expect(arbiter.reclaim()).toBe(false);

            arbiter.handle(MessageKind.RequestControl);
            expect(arbiter.reclaim()).toBe(true);
            expect(state.hasControl).toBe(true);
            expect(sent).toEqual([MessageKind.GrantControl, MessageKind.RevokeControl]);
        });

        it('corrects the client when it receives a client-only message', () => {
            const { arbiter, state, sent, onAnomaly } = setup('host');

            arbiter.handle(MessageKind.GrantControl);
            expect(onAnomaly).toHaveBeenCalledTimes(1);
            expect(sent).toEqual([]);

            arbiter.handle(MessageKind.RequestControl);
            arbiter.handle(MessageKind.DeclineControl);
            expect(onAnomaly).toHaveBeenCalledTimes(2);
            expect(state.hasControl).toBe(true);
            expect(sent).toEqual([MessageKind.GrantControl, MessageKind.RevokeControl]);
        });
    });

    it('ignores control messages outside a connected session', () => {
        const state = new SessionState();
        const send = vi.fn(() => true);
        const arbiter = new ControlArbiter({
            state,
            send,
            approver: { approveControlRequest: () => true },
            logger: quiet,
        });

        arbiter.handle(MessageKind.RequestControl);
        expect(arbiter.requestControl()).toBe(false);
        expect(send).not.toHaveBeenCalled();
    });

    it('never lets both sides hold control at once', () => {
        const hostState = connected('host');
        const clientState = connected('client');
        let host: ControlArbiter | null = null;
        let client: ControlArbiter | null = null;
        const deliver = (target: () => ControlArbiter | null) => (message: Message) => {
            if (message.type !== MessageKind.TextUpdate) target()?.handle(message.type);
            return true;
        };
        const approvals = [true, false, true];

        host = new ControlArbiter({
            state: hostState,
            send: deliver(() => client),
            approver: { approveControlRequest: () => approvals.shift() ?? false },
            logger: quiet,
        });
        client = new ControlArbiter({
            state: clientState,
            send: deliver(() => host),
            approver: { approveControlRequest: () => false },
            logger: quiet,
        });

        const neverBoth = () => expect(hostState.hasControl && clientState.hasControl).toBe(false);

        client.requestControl();
        neverBoth();
        expect(clientState.hasControl).toBe(true);

        host.reclaim();
        neverBoth();
        expect(hostState.hasControl).toBe(true);

        client.requestControl();
        neverBoth();
        expect(hostState.hasControl).toBe(true);

        client.requestControl();
        neverBoth();
        expect(clientState.hasControl).toBe(true);
        expect(hostState.hasControl).toBe(false);
    });
});
