// Tests for packet filter masks

import { describe, it, expect } from 'vitest';
import {
  PacketFilterMask,
  PacketFilterMaskBuilder,
  createPacketFilterMask,
  parsePacketId,
  FILTER_TABLE_SIZE,
} from './mask.js';
import { InvalidPacketIdError } from '../errors.js';

describe('PacketFilterMaskBuilder', () => {
  it('lets the last operation win for an id', () => {
    const mask = new PacketFilterMaskBuilder({ admitByDefault: true })
      .exclude([0x2b])
      .include([0x2b])
      .build();

    expect(mask.admits(0x2b)).toBe(true);
  });

  it('keeps an id excluded when the exclude comes last', () => {
    const mask = new PacketFilterMaskBuilder({ admitByDefault: true })
      .include([0x2b])
      .exclude([0x2b])
      .build();

    expect(mask.admits(0x2b)).toBe(false);
    expect(mask.admits(0x2c)).toBe(true);
  });

  it('starts from a reject-all table when asked', () => {
    const mask = new PacketFilterMaskBuilder({ admitByDefault: false }).include([0x01, 0x26]).build();

    expect(mask.admittedIds()).toEqual([0x01, 0x26]);
    expect(mask.admits(0x00)).toBe(false);
  });

  it('keeps the unknown policy independent of the table default', () => {
    const mask = new PacketFilterMaskBuilder({ admitByDefault: false, admitUnknown: true }).build();

    expect(mask.admits(0x10)).toBe(false);
    expect(mask.admits(256)).toBe(true);
    expect(mask.admits(-1)).toBe(true);

    const strict = new PacketFilterMaskBuilder({ admitByDefault: true })
      .unknownPackets(false)
      .build();
    expect(strict.admits(0xff)).toBe(true);
    expect(strict.admits(0x100)).toBe(false);
    expect(strict.admits(-5)).toBe(false);
  });

  it('rejects ids outside the table', () => {
    const builder = new PacketFilterMaskBuilder();

    expect(() => builder.include([256])).toThrow(InvalidPacketIdError);
    expect(() => builder.exclude([-1])).toThrow(InvalidPacketIdError);
    expect(() => builder.exclude([1.5])).toThrow(InvalidPacketIdError);
  });

  it('is not affected by later builder changes', () => {
    const builder = new PacketFilterMaskBuilder();
    const mask = builder.build();

    builder.exclude([0x05]);

    expect(mask.admits(0x05)).toBe(true);
    expect(builder.build().admits(0x05)).toBe(false);
  });
});

describe('PacketFilterMask', () => {
  it('admits everything by default', () => {
    const mask = PacketFilterMask.admitAll();

    expect(mask.admittedIds()).toHaveLength(FILTER_TABLE_SIZE);
    expect(mask.admits(1000)).toBe(true);
  });

  it('requires a full table', () => {
    expect(() => new PacketFilterMask([true], true)).toThrow(RangeError);
  });
});

describe('createPacketFilterMask', () => {
  it('lets an explicit include win over an exclude of the same id', () => {
    const mask = createPacketFilterMask({ include: [0x2b], exclude: [0x2b, 0x2c] });

    expect(mask.admits(0x2b)).toBe(true);
    expect(mask.admits(0x2c)).toBe(false);
  });

  it('defaults to admitting all ids', () => {
    const mask = createPacketFilterMask({});

    expect(mask.admits(0)).toBe(true);
    expect(mask.admits(255)).toBe(true);
    expect(mask.admitUnknown).toBe(true);
  });
});

describe('parsePacketId', () => {
  it('parses hex strings with or without a prefix', () => {
    expect(parsePacketId('0x2B')).toBe(0x2b);
    expect(parsePacketId('0X2b')).toBe(0x2b);
    expect(parsePacketId('ff')).toBe(255);
    expect(parsePacketId(' 0x01 ')).toBe(1);
  });

  it('accepts numbers in range', () => {
    expect(parsePacketId(71)).toBe(71);
  });

  it('rejects malformed or out-of-range ids', () => {
    expect(() => parsePacketId('0x100')).toThrow(InvalidPacketIdError);
    expect(() => parsePacketId('zz')).toThrow(InvalidPacketIdError);
    expect(() => parsePacketId('')).toThrow(InvalidPacketIdError);
    expect(() => parsePacketId(300)).toThrow(InvalidPacketIdError);
  });
});
