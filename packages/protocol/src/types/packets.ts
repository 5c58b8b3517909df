// Packet record types

/**
 * One timestamped, identified, opaque-payload record of a recording stream.
 */
export type Packet = {
  /**
   * Offset from the start of the source stream (u32).
   * Not guaranteed to be strictly increasing.
   */
  readonly time: number;

  /**
   * Protocol packet id, decoded from the payload's leading varint (i32).
   */
  readonly id: number;

  /**
   * Payload bytes after the id.
   */
  readonly data: Uint8Array;
};

/**
 * Protocol sub-state a packet was recorded in.
 */
export type ConnectionPhase =
  | 'handshaking'
  | 'status'
  | 'login'
  | 'configuration'
  | 'play';

/**
 * A packet together with the phase it was read in.
 */
export type TaggedPacket = {
  phase: ConnectionPhase;
  packet: Packet;
};

/**
 * Create a packet value.
 */
export function createPacket(time: number, id: number, data: Uint8Array = new Uint8Array(0)): Packet {
  return { time, id, data };
}

/**
 * Return a copy of the packet shifted by `offset`.
 */
export function retimePacket(packet: Packet, offset: number): Packet {
  return { ...packet, time: packet.time + offset };
}
