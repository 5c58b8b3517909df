// Per-packet-id statistics collected through the merge visitor.

import type { Packet } from '@reelcut/protocol';
import type { PacketVisitor } from './engine.js';

export type PacketStatisticsRow = {
  id: number;
  count: number;
  /** Sum of payload sizes, excluding the id */
  totalSize: number;
  averageSize: number;
};

export type PacketStatistics = {
  visit: PacketVisitor;
  record(packet: Packet): void;
  /** Rows ordered by count, then id, both descending */
  rows(): PacketStatisticsRow[];
};

export function createPacketStatistics(): PacketStatistics {
  const totals = new Map<number, { count: number; totalSize: number }>();

  const record = (packet: Packet) => {
    const entry = totals.get(packet.id);
    if (entry) {
      entry.count++;
      entry.totalSize += packet.data.length;
    } else {
      totals.set(packet.id, { count: 1, totalSize: packet.data.length });
    }
  };

  return {
    record,
    visit: (packet) => {
      record(packet);
    },
    rows() {
      return [...totals.entries()]
        .map(([id, { count, totalSize }]) => ({
          id,
          count,
          totalSize,
          averageSize: totalSize / count,
        }))
        .sort((a, b) => b.count - a.count || b.id - a.id);
    },
  };
}

/**
 * Lower-case hex form of a packet id, e.g. `0x2b`.
 * Negative ids print as their 32-bit two's complement.
 */
export function formatPacketId(id: number): string {
  return `0x${(id >>> 0).toString(16)}`;
}
