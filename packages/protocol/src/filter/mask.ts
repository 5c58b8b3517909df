// Packet filter masks
//
// A fixed admit/reject table for ids 0..255 plus one policy for every id
// outside the table. Masks are immutable; build them with PacketFilterMaskBuilder.

import { InvalidPacketIdError } from '../errors.js';

/** Number of ids covered by the admit table. */
export const FILTER_TABLE_SIZE = 256;

/**
 * Immutable admission policy for packet ids.
 */
export class PacketFilterMask {
  private readonly table: readonly boolean[];
  readonly admitUnknown: boolean;

  constructor(table: readonly boolean[], admitUnknown: boolean) {
    if (table.length !== FILTER_TABLE_SIZE) {
      throw new RangeError(`Filter table must have ${FILTER_TABLE_SIZE} entries, got ${table.length}`);
    }
    this.table = Object.freeze([...table]);
    this.admitUnknown = admitUnknown;
  }

  /**
   * Mask that admits every id, in or out of the table.
   */
  static admitAll(): PacketFilterMask {
    return new PacketFilterMaskBuilder({ admitByDefault: true, admitUnknown: true }).build();
  }

  /**
   * Whether a packet with this id passes the filter.
   * Ids outside 0..255 follow the unknown-packet policy.
   */
  admits(id: number): boolean {
    if (Number.isInteger(id) && id >= 0 && id < FILTER_TABLE_SIZE) {
      return this.table[id] ?? this.admitUnknown;
    }
    return this.admitUnknown;
  }

  /**
   * Ids in the table that are admitted, ascending.
   */
  admittedIds(): number[] {
    const ids: number[] = [];
    this.table.forEach((admitted, id) => {
      if (admitted) ids.push(id);
    });
    return ids;
  }
}

/**
 * Options for a new mask builder.
 */
export type PacketFilterMaskOptions = {
  /**
   * Initial state of every table entry (default: true)
   */
  admitByDefault?: boolean;

  /**
   * Policy for ids outside 0..255 (default: true)
   */
  admitUnknown?: boolean;
};

/**
 * Builds a PacketFilterMask. Operations apply in call order, so the last
 * include or exclude of an id decides its entry.
 */
export class PacketFilterMaskBuilder {
  private readonly table: boolean[];
  private admitUnknown: boolean;

  constructor(options: PacketFilterMaskOptions = {}) {
    this.table = new Array<boolean>(FILTER_TABLE_SIZE).fill(options.admitByDefault ?? true);
    this.admitUnknown = options.admitUnknown ?? true;
  }

  include(ids: Iterable<number>): this {
    for (const id of ids) {
      this.table[checkTableId(id)] = true;
    }
    return this;
  }

  exclude(ids: Iterable<number>): this {
    for (const id of ids) {
      this.table[checkTableId(id)] = false;
    }
    return this;
  }

  unknownPackets(admit: boolean): this {
    this.admitUnknown = admit;
    return this;
  }

  build(): PacketFilterMask {
    return new PacketFilterMask(this.table, this.admitUnknown);
  }
}

/**
 * Lists-based construction: excludes are applied before includes, so an id
 * named in both lists is admitted.
 */
export function createPacketFilterMask(options: {
  include?: Iterable<number>;
  exclude?: Iterable<number>;
  admitByDefault?: boolean;
  admitUnknown?: boolean;
}): PacketFilterMask {
  return new PacketFilterMaskBuilder({
    admitByDefault: options.admitByDefault,
    admitUnknown: options.admitUnknown,
  })
    .exclude(options.exclude ?? [])
    .include(options.include ?? [])
    .build();
}

/**
 * Parse a packet id written as hex ("0x2B", "2b") or given as a number.
 */
export function parsePacketId(value: string | number): number {
  if (typeof value === 'number') {
    return checkTableId(value);
  }

  const digits = value.trim().replace(/^0x/i, '');
  if (!/^[0-9a-f]{1,2}$/i.test(digits)) {
    throw new InvalidPacketIdError(value, 'expected one hexadecimal byte such as 0x2B');
  }
  return Number.parseInt(digits, 16);
}

function checkTableId(id: number): number {
  if (!Number.isInteger(id) || id < 0 || id >= FILTER_TABLE_SIZE) {
    throw new InvalidPacketIdError(id, `must be an integer in 0..${FILTER_TABLE_SIZE - 1}`);
  }
  return id;
}
