import { BfastFormatError } from "./errors";

/**
 * BFAST: a container of byte arrays.
 *
 * Layout (little-endian):
 * - Header (32 bytes): magic u64 = 0xBFA5, dataStart u64, dataEnd u64, numArrays u64
 * - Ranges (16 bytes each): begin u64, end u64, absolute offsets
 * - Data: every array starts on a 64-byte boundary, dataStart included
 */
export const BFAST_MAGIC = 0xbfa5n;

/** The magic as read from a file written big-endian */
const BFAST_MAGIC_SWAPPED = 0xa5bf000000000000n;

export const BFAST_HEADER_SIZE = 32;
export const BFAST_RANGE_SIZE = 16;
export const BFAST_ALIGNMENT = 64;

export interface BfastRange {
  begin: number;
  end: number;
}

export interface BfastHeader {
  dataStart: number;
  dataEnd: number;
  numArrays: number;
}

export function alignOffset(offset: number): number {
  const rem = offset % BFAST_ALIGNMENT;
  return rem === 0 ? offset : offset + BFAST_ALIGNMENT - rem;
}

/**
 * Compute where each array lands without writing anything
 */
export function computeBfastLayout(byteLengths: readonly number[]): {
  header: BfastHeader;
  ranges: BfastRange[];
} {
  const dataStart = alignOffset(
    BFAST_HEADER_SIZE + BFAST_RANGE_SIZE * byteLengths.length,
  );
  const ranges: BfastRange[] = [];
  let cursor = dataStart;
  for (const length of byteLengths) {
    const begin = alignOffset(cursor);
    const end = begin + length;
    ranges.push({ begin, end });
    cursor = end;
  }
  return {
    header: { dataStart, dataEnd: cursor, numArrays: byteLengths.length },
    ranges,
  };
}

/**
 * Pack `arrays` into one BFAST byte stream, in order
 */
export function packBfast(arrays: readonly Uint8Array[]): Uint8Array {
  const { header, ranges } = computeBfastLayout(
    arrays.map((a) => a.byteLength),
  );
  const out = new Uint8Array(header.dataEnd);
  const view = new DataView(out.buffer);

  view.setBigUint64(0, BFAST_MAGIC, true);
  view.setBigUint64(8, BigInt(header.dataStart), true);
  view.setBigUint64(16, BigInt(header.dataEnd), true);
  view.setBigUint64(24, BigInt(header.numArrays), true);

  for (let i = 0; i < arrays.length; i++) {
    const { begin, end } = ranges[i];
    const pos = BFAST_HEADER_SIZE + i * BFAST_RANGE_SIZE;
    view.setBigUint64(pos, BigInt(begin), true);
    view.setBigUint64(pos + 8, BigInt(end), true);
    out.set(arrays[i], begin);
  }

  return out;
}

/**
 * Read the header and range table of a BFAST stream
 */
export function readBfastRanges(bytes: Uint8Array): {
  header: BfastHeader;
  ranges: BfastRange[];
} {
  if (bytes.byteLength < BFAST_HEADER_SIZE) {
    throw new BfastFormatError(
      `truncated header: ${bytes.byteLength} of ${BFAST_HEADER_SIZE} bytes`,
    );
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  const magic = view.getBigUint64(0, true);
  if (magic === BFAST_MAGIC_SWAPPED) {
    throw new BfastFormatError("big-endian BFAST streams are not supported");
  }
  if (magic !== BFAST_MAGIC) {
    throw new BfastFormatError(`bad magic 0x${magic.toString(16)}`);
  }

  const dataStart = toOffset(view.getBigUint64(8, true), "dataStart");
  const dataEnd = toOffset(view.getBigUint64(16, true), "dataEnd");
  const numArrays = toOffset(view.getBigUint64(24, true), "numArrays");

  const tableEnd = BFAST_HEADER_SIZE + numArrays * BFAST_RANGE_SIZE;
  if (tableEnd > bytes.byteLength) {
    throw new BfastFormatError(
      `range table of ${numArrays} arrays needs ${tableEnd} bytes, ${bytes.byteLength} available`,
    );
  }
  if (dataStart < tableEnd) {
    throw new BfastFormatError(
      `data section [${dataStart}, ${dataEnd}) overlaps the range table`,
    );
  }
  if (dataStart > dataEnd) {
    throw new BfastFormatError(
      `data section starts at ${dataStart}, after its end ${dataEnd}`,
    );
  }
  if (dataEnd > bytes.byteLength) {
    throw new BfastFormatError(
      `data section ends at ${dataEnd}, past ${bytes.byteLength} bytes`,
    );
  }

  const ranges: BfastRange[] = [];
  for (let i = 0; i < numArrays; i++) {
    const pos = BFAST_HEADER_SIZE + i * BFAST_RANGE_SIZE;
    const begin = toOffset(view.getBigUint64(pos, true), `array ${i} begin`);
    const end = toOffset(view.getBigUint64(pos + 8, true), `array ${i} end`);
    if (begin < dataStart || end > dataEnd || begin > end) {
      throw new BfastFormatError(
        `array ${i} range [${begin}, ${end}) outside data section [${dataStart}, ${dataEnd})`,
      );
    }
    ranges.push({ begin, end });
  }

  return { header: { dataStart, dataEnd, numArrays }, ranges };
}

/**
 * Split a BFAST stream into its arrays. The arrays alias `bytes`.
 */
export function unpackBfast(bytes: Uint8Array): Uint8Array[] {
  const { ranges } = readBfastRanges(bytes);
  return ranges.map(({ begin, end }) => bytes.subarray(begin, end));
}

function toOffset(value: bigint, field: string): number {
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new BfastFormatError(`${field} ${value} is out of range`);
  }
  return Number(value);
}
