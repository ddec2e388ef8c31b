import { bytesToHex, hexToBytes, size, slice, type Hex } from 'viem';

/** Canonical lower-case form of a hex string */
export function lowerHex(value: Hex): Hex {
  return bytesToHex(hexToBytes(value));
}

/** Bytes from `start` to the end, or `0x` when nothing is left */
export function tail(data: Hex, start: number): Hex {
  return size(data) > start ? slice(data, start) : '0x';
}
