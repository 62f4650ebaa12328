import type { DataPoint } from './record';

/** @internal */
export class Cursor {
  constructor(public buf: Buffer, public offset = 0) { }

  readU64LE(): bigint { const v = this.buf.readBigUInt64LE(this.offset); this.offset += 8; return v; }
}

/**
 * Kernel-side `struct datarec { __u64 processed; __u64 dropped; }`, host byte order (LE).
 */
export class DatarecCodec {
  static readonly SIZE = 16;

  // --- bpftool JSON helpers ---

  /** ["0x01", "0x00", ...] -> Buffer */
  static fromHexBytes(bytes: readonly string[]): Buffer {
    const buf = Buffer.allocUnsafe(bytes.length);
    for (let i = 0; i < bytes.length; i++) {
      buf.writeUInt8(parseInt(bytes[i], 16), i);
    }
    return buf;
  }

  /** u32 key -> ["00", "00", "00", "00"] as bpftool's `key hex` expects */
  static keyHex(key: number): string[] {
    const b = Buffer.allocUnsafe(4);
    b.writeUInt32LE(key >>> 0, 0);
    return Array.from(b, byte => byte.toString(16).padStart(2, '0'));
  }

  // --- DECODER ---

  /** Returns undefined when the value is too short to hold a datarec. */
  static decode(buf: Buffer): DataPoint | undefined {
    if (buf.length < DatarecCodec.SIZE) return undefined;
    const cursor = new Cursor(buf);
    const processed = cursor.readU64LE();
    const dropped = cursor.readU64LE();
    return { processed, dropped };
  }
}
