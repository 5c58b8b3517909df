// Tests for protocol phase tracking

import { describe, it, expect } from 'vitest';
import { PhaseTracker, INITIAL_RECORDING_PHASE } from './tracker.js';

describe('PhaseTracker', () => {
  it('starts recordings in login', () => {
    expect(INITIAL_RECORDING_PHASE).toBe('login');
    expect(new PhaseTracker().phase).toBe('login');
  });

  it('tags the transition packet with the phase it was read in', () => {
    const tracker = new PhaseTracker();
    const tags = [0x01, 0x04, 0x02, 0x07, 0x03, 0x2b, 0x02, 0x03, 0x00].map((id) =>
      tracker.observe(id)
    );

    expect(tags).toEqual([
      'login',
      'login',
      'login',
      'configuration',
      'configuration',
      'play',
      'play',
      'play',
      'play',
    ]);
  });

  it('ignores the play trigger while still in login', () => {
    const tracker = new PhaseTracker();

    expect(tracker.observe(0x03)).toBe('login');
    expect(tracker.phase).toBe('login');
  });

  it('never leaves play', () => {
    const tracker = new PhaseTracker('play');

    for (const id of [0x00, 0x02, 0x03, 0x7f, -1]) {
      expect(tracker.observe(id)).toBe('play');
    }
    expect(tracker.phase).toBe('play');
  });

  it('has no transitions out of handshaking or status', () => {
    const handshaking = new PhaseTracker('handshaking');
    const status = new PhaseTracker('status');

    for (const id of [0x00, 0x01, 0x02, 0x03]) {
      handshaking.observe(id);
      status.observe(id);
    }

    expect(handshaking.phase).toBe('handshaking');
    expect(status.phase).toBe('status');
  });
});
