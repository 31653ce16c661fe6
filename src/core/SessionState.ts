/**
 * @file SessionState.ts
 * @brief The session state machine as a single tagged union.
 *
 * One instance is shared by reference between the session manager, the
 * control arbiter and the document sync policy, so all three read the same
 * role, link state and control flag.
 */

import { EventEmitter } from '../utils/EventEmitter';
import type { SessionRole, SessionSnapshot } from '../types';

export type SessionPhase =
    | { status: 'idle' }
    | { status: 'listening'; address: string; port: number }
    | { status: 'connected'; role: 'host' | 'client'; hasControl: boolean; peer: string; epoch: number };

export type SessionStateEvents = {
    change: [snapshot: SessionSnapshot];
    control: [hasControl: boolean];
};

const IDLE: SessionPhase = { status: 'idle' };

export class SessionState extends EventEmitter<SessionStateEvents> {
    private current: SessionPhase = IDLE;
    private epochCounter = 0;

    public get phase(): SessionPhase {
        return this.current;
    }

    public get role(): SessionRole {
        switch (this.current.status) {
            case 'idle': return 'none';
            case 'listening': return 'host';
            case 'connected': return this.current.role;
        }
    }

    public get isIdle(): boolean {
        return this.current.status === 'idle';
    }

    public get isConnected(): boolean {
        return this.current.status === 'connected';
    }

    public get isHost(): boolean {
        return this.role === 'host';
    }

    /**
     * A host that is listening without a peer counts as holding control;
     * everywhere else outside `connected` the flag is false.
     */
    public get hasControl(): boolean {
        switch (this.current.status) {
            case 'idle': return false;
            case 'listening': return true;
            case 'connected': return this.current.hasControl;
        }
    }

    /**
     * Increments on every transition into `connected`, so work started for
     * one peer can tell when that peer has been replaced.
     */
    public get epoch(): number {
        return this.current.status === 'connected' ? this.current.epoch : -1;
    }

    public snapshot(): SessionSnapshot {
        return {
            role: this.role,
            linkState: this.current.status,
            hasControl: this.hasControl,
        };
    }

    public toIdle(): void {
        this.transition(IDLE);
    }

    public toListening(address: string, port: number): void {
        if (this.current.status !== 'idle') {
            throw new Error(`Cannot start listening from ${this.current.status}`);
        }
        this.transition({ status: 'listening', address, port });
    }

    /**
     * Host goes from listening (or from a preempted peer) to connected with
     * control; a client goes from idle to connected without it.
     */
    public toConnected(role: 'host' | 'client', peer: string): void {
        const from = this.current.status;
        const allowed = role === 'host' ? from === 'listening' || (from === 'connected' && this.isHost) : from === 'idle';
        if (!allowed) {
            throw new Error(`Cannot connect as ${role} from ${from}`);
        }
        this.epochCounter += 1;
        this.transition({ status: 'connected', role, hasControl: role === 'host', peer, epoch: this.epochCounter });
    }

    /**
     * Updates the control flag. Returns whether anything changed; outside
     * `connected` the flag has no meaning and the call is ignored.
     */
    public setControl(hasControl: boolean): boolean {
        if (this.current.status !== 'connected' || this.current.hasControl === hasControl) {
            return false;
        }
        this.transition({ ...this.current, hasControl });
        return true;
    }

    private transition(next: SessionPhase): void {
        const before = this.snapshot();
        this.current = next;
        const after = this.snapshot();
        if (before.role !== after.role || before.linkState !== after.linkState || before.hasControl !== after.hasControl) {
            this.emit('change', after);
        }
        if (before.hasControl !== after.hasControl) {
            this.emit('control', after.hasControl);
        }
    }
}
