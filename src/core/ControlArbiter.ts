/**
 * @file ControlArbiter.ts
 * @brief Request/grant/revoke/decline exchange deciding who holds the pen.
 *
 * The host is authoritative: it grants, revokes and declines, and when a
 * message contradicts its view it takes control back and tells the client.
 * A client that sees something impossible for its role drops to viewer.
 */

import { Logger, logger as rootLogger } from '../utils/Logger';
import { ProtocolAnomalyError } from '../errors';
import { controlMessage } from '../codec';
import { MessageKind, type ControlApprover, type ControlMessageKind, type Message } from '../types';
import type { SessionState } from './SessionState';

export interface ControlArbiterDeps {
    state: SessionState;
    send: (message: Message) => boolean;
    approver: ControlApprover;
    logger?: Logger;
    onDeclined?: () => void;
    onAnomaly?: (error: ProtocolAnomalyError) => void;
}

export class ControlArbiter {
    private readonly state: SessionState;
    private readonly send: (message: Message) => boolean;
    private readonly approver: ControlApprover;
    private readonly logger: Logger;
    private readonly onDeclined: () => void;
    private readonly onAnomaly: (error: ProtocolAnomalyError) => void;

    /** Client: a request is out and unanswered. */
    private requestPending = false;
    /** Host: the approver is still deciding on a request. */
    private decisionPending = false;

    constructor(deps: ControlArbiterDeps) {
        this.state = deps.state;
        this.send = deps.send;
        this.approver = deps.approver;
        this.logger = deps.logger ?? rootLogger.child('control');
        this.onDeclined = deps.onDeclined ?? (() => undefined);
        this.onAnomaly = deps.onAnomaly ?? (() => undefined);
    }

    public get isRequestPending(): boolean {
        return this.requestPending;
    }

    public get isDecisionPending(): boolean {
        return this.decisionPending;
    }

    /**
     * Client asks the host for control. Valid only for a connected client
     * that does not hold control and has no request outstanding.
     */
    public requestControl(): boolean {
        const { state } = this;
        if (!state.isConnected || state.role !== 'client') {
            this.logger.warn('Only a connected client can request control');
            return false;
        }
        if (state.hasControl) {
            this.logger.warn('Control requested while already holding it');
            return false;
        }
        if (this.requestPending) {
            this.logger.info('Control request already pending');
            return false;
        }
        // set first: the answer may arrive before send() returns
        this.requestPending = true;
        if (!this.send(controlMessage(MessageKind.RequestControl))) {
            this.requestPending = false;
            return false;
        }
        this.logger.info('Requested control from host');
        return true;
    }

    /**
     * Host takes control back without asking. Valid only for a connected
     * host that has handed control away.
     */
    public reclaim(): boolean {
        const { state } = this;
        if (!state.isConnected || state.role !== 'host') {
            this.logger.debug('Reclaim ignored: not a connected host');
            return false;
        }
        if (state.hasControl) {
            this.logger.debug('Reclaim ignored: host already holds control');
            return false;
        }
        state.setControl(true);
        this.send(controlMessage(MessageKind.RevokeControl));
        this.logger.info('Host reclaimed control');
        return true;
    }

    /**
     * Routes one of the four control messages.
     */
    public handle(kind: ControlMessageKind): void {
        const { state } = this;
        if (!state.isConnected) {
            this.logger.warn(`Ignoring ${kind} outside a connected session`);
            return;
        }

        if (state.role === 'host') {
            if (kind === MessageKind.RequestControl) {
                this.handleRequest();
            } else {
                this.anomaly(`Host received ${kind}`);
                this.forceHostControl();
            }
            return;
        }

        switch (kind) {
            case MessageKind.GrantControl:
                this.requestPending = false;
                state.setControl(true);
                this.logger.info('Control granted by host');
                break;
            case MessageKind.RevokeControl:
                this.requestPending = false;
                state.setControl(false);
                this.logger.info('Control revoked by host');
                break;
            case MessageKind.DeclineControl:
                this.requestPending = false;
                this.logger.info('Control request declined by host');
                this.onDeclined();
                break;
            case MessageKind.RequestControl:
                this.anomaly('Client received REQ_CONTROL');
                state.setControl(false);
                break;
        }
    }

    /**
     * Forgets pending request/decision bookkeeping. Called on every
     * connect and disconnect.
     */
    public reset(): void {
        this.requestPending = false;
        this.decisionPending = false;
    }

    private handleRequest(): void {
        const { state } = this;

        // The client already holds control as far as the host knows; repeat
        // the grant so the client corrects itself.
        if (!state.hasControl) {
            this.logger.warn('Control requested by a client that already holds it; re-sending grant');
            this.send(controlMessage(MessageKind.GrantControl));
            return;
        }
        if (this.decisionPending) {
            this.logger.info('Control request already awaiting a decision');
            return;
        }

        const epoch = state.epoch;
        let decision: boolean | Promise<boolean>;
        try {
            decision = this.approver.approveControlRequest();
        } catch (err) {
            this.logger.error('Control approver failed; declining', err);
            this.resolveRequest(false, epoch);
            return;
        }

        if (typeof decision === 'boolean') {
            this.resolveRequest(decision, epoch);
            return;
        }

        this.decisionPending = true;
        void decision.then(
            (approved) => {
                this.decisionPending = false;
                this.resolveRequest(approved, epoch);
            },
            (err: unknown) => {
                this.decisionPending = false;
                this.logger.error('Control approver failed; declining', err);
                this.resolveRequest(false, epoch);
            }
        );
    }

    private resolveRequest(approved: boolean, epoch: number): void {
        const { state } = this;

        if (!state.isConnected || state.epoch !== epoch) {
            if (approved) {
                this.logger.warn('Peer disconnected before control could be granted; host keeps control');
            }
            return;
        }
        if (!state.hasControl) {
            this.logger.warn('Host no longer holds control; ignoring decision');
            return;
        }

        if (approved) {
            state.setControl(false);
            this.send(controlMessage(MessageKind.GrantControl));
            this.logger.info('Granted control to client');
        } else {
            this.send(controlMessage(MessageKind.DeclineControl));
            this.logger.info('Declined control request');
        }
    }

    private forceHostControl(): void {
        if (this.state.setControl(true)) {
            this.send(controlMessage(MessageKind.RevokeControl));
        }
    }

    private anomaly(description: string): void {
        const error = new ProtocolAnomalyError(`${description}; correcting local control state`);
        this.logger.warn(error.message);
        this.onAnomaly(error);
    }
}
