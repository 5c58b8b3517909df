// Protocol phase tracking
//
// Infers the connection phase from packet ids alone. Valid only because
// recordings store packets in wire order; payloads are never inspected.

import type { ConnectionPhase } from '../types/packets.js';

/**
 * Phase every recording starts in (the container begins after the handshake).
 */
export const INITIAL_RECORDING_PHASE: ConnectionPhase = 'login';

/**
 * Login-phase id that moves the connection into configuration.
 */
export const LOGIN_FINISHED_PACKET_ID = 0x02;

/**
 * Configuration-phase id that moves the connection into play.
 */
export const CONFIGURATION_FINISHED_PACKET_ID = 0x03;

const TRANSITIONS: Partial<Record<ConnectionPhase, { id: number; next: ConnectionPhase }>> = {
  login: { id: LOGIN_FINISHED_PACKET_ID, next: 'configuration' },
  configuration: { id: CONFIGURATION_FINISHED_PACKET_ID, next: 'play' },
};

/**
 * Forward-only phase state machine.
 *
 * `observe` returns the phase the packet was read in; the transition it
 * triggers applies to the packets after it.
 */
export class PhaseTracker {
  private current: ConnectionPhase;

  constructor(initial: ConnectionPhase = INITIAL_RECORDING_PHASE) {
    this.current = initial;
  }

  get phase(): ConnectionPhase {
    return this.current;
  }

  observe(packetId: number): ConnectionPhase {
    const tag = this.current;
    const transition = TRANSITIONS[tag];
    if (transition && transition.id === packetId) {
      this.current = transition.next;
    }
    return tag;
  }
}
