import { TruncatedStreamError } from "./errors";
import type { Bit } from "./types";

export class BitWriter {
  private bytes: number[] = [];
  private current = 0;
  private bitPos = 0;

  writeBit(bit: Bit): void {
    this.current = (this.current << 1) | bit;
    this.bitPos += 1;
    if (this.bitPos === 8) {
      this.bytes.push(this.current & 0xff);
      this.current = 0;
      this.bitPos = 0;
    }
  }

  writeBits(bits: readonly Bit[]): void {
    for (const bit of bits) this.writeBit(bit);
  }

  writeUnsigned(value: number, bits: number): void {
    if (bits <= 0) return;
    if (!Number.isInteger(value) || value < 0 || value >= 2 ** bits) {
      throw new Error(`Value out of range for ${bits} bits: ${value}`);
    }
    // MSB-first within the given width
    for (let i = bits - 1; i >= 0; i -= 1) {
      this.writeBit((value >>> i) & 1 ? 1 : 0);
    }
  }

  get bitLength(): number {
    return this.bytes.length * 8 + this.bitPos;
  }

  alignToByte(): void {
    if (this.bitPos > 0) {
      this.current <<= (8 - this.bitPos);
      this.bytes.push(this.current & 0xff);
      this.current = 0;
      this.bitPos = 0;
    }
  }

  toUint8Array(): Uint8Array {
    this.alignToByte();
    return new Uint8Array(this.bytes);
  }
}

export class BitReader {
  private offset = 0;
  private bitPos = 0;
  constructor(private readonly data: Uint8Array) {}

  get bitsRemaining(): number {
    return (this.data.length - this.offset) * 8 - this.bitPos;
  }

  readBit(): Bit {
    if (this.offset >= this.data.length) {
      throw new TruncatedStreamError();
    }
    const bit: Bit = (this.data[this.offset] >> (7 - this.bitPos)) & 1 ? 1 : 0;
    this.bitPos += 1;
    if (this.bitPos === 8) {
      this.bitPos = 0;
      this.offset += 1;
    }
    return bit;
  }

  readUnsigned(bits: number): number {
    let result = 0;
    for (let i = 0; i < bits; i += 1) {
      result = (result << 1) | this.readBit();
    }
    return result >>> 0;
  }
}
