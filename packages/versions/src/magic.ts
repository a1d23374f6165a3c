import { MagicFormatError } from "@pyc-atlas/core";

export const MAGIC_LENGTH = 4;

/** Python 1.0 and 1.1 terminated their magic with 0x99 0x00 instead of "\r\n". */
export const LEGACY_MAGIC_INTS: readonly number[] = Object.freeze([39170, 39171]);

const CR = 0x0d;
const LF = 0x0a;

function assertMagicInt(magicInt: number): void {
  if (!Number.isInteger(magicInt) || magicInt < 0 || magicInt > 0xffff) {
    throw new MagicFormatError(`magic integer must be an unsigned 16-bit integer, received ${magicInt}`);
  }
}

/** 62211 -> 03 f3 0d 0a */
export function intToMagic(magicInt: number): Uint8Array {
  assertMagicInt(magicInt);
  const bytes = new Uint8Array(MAGIC_LENGTH);
  bytes[0] = magicInt & 0xff;
  bytes[1] = magicInt >>> 8;
  if (LEGACY_MAGIC_INTS.includes(magicInt)) {
    bytes[2] = 0x99;
    bytes[3] = 0x00;
  } else {
    bytes[2] = CR;
    bytes[3] = LF;
  }
  return bytes;
}

/** Reads the little-endian magic integer; the two terminator bytes are not interpreted. */
export function magicToInt(magic: Uint8Array): number {
  if (magic.length !== MAGIC_LENGTH) {
    throw new MagicFormatError(`magic must be ${MAGIC_LENGTH} bytes, received ${magic.length}`);
  }
  return magic[0] | (magic[1] << 8);
}

/** Lower-case hex spelling used as the identity of a magic, e.g. "03f30d0a". */
export function magicKey(magic: Uint8Array): string {
  if (magic.length !== MAGIC_LENGTH) {
    throw new MagicFormatError(`magic must be ${MAGIC_LENGTH} bytes, received ${magic.length}`);
  }
  return Array.from(magic, (byte) => byte.toString(16).padStart(2, "0")).join("");
}

export function formatMagic(magic: Uint8Array): string {
  return magicKey(magic).replace(/(..)(?!$)/g, "$1 ");
}

export type MagicLike = Uint8Array | number;

export function toMagic(magic: MagicLike): Uint8Array {
  return typeof magic === "number" ? intToMagic(magic) : magic;
}
