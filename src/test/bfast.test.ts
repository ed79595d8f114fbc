import { describe, it, expect } from "vitest";
import {
  BFAST_MAGIC,
  alignOffset,
  computeBfastLayout,
  packBfast,
  readBfastRanges,
  unpackBfast,
} from "../bfast";
import { BfastFormatError } from "../errors";

describe("bfast", () => {
  it("aligns offsets to 64 bytes", () => {
    expect(alignOffset(0)).toBe(0);
    expect(alignOffset(1)).toBe(64);
    expect(alignOffset(64)).toBe(64);
    expect(alignOffset(130)).toBe(192);
  });

  it("lays arrays out after the range table on 64-byte boundaries", () => {
    const { header, ranges } = computeBfastLayout([2, 64, 48, 0, 24, 0]);
    expect(header).toEqual({ dataStart: 128, dataEnd: 384, numArrays: 6 });
    expect(ranges).toEqual([
      { begin: 128, end: 130 },
      { begin: 192, end: 256 },
      { begin: 256, end: 304 },
      { begin: 320, end: 320 },
      { begin: 320, end: 344 },
      { begin: 384, end: 384 },
    ]);
  });

  it("writes the header and range table little-endian", () => {
    const bytes = packBfast([new Uint8Array([7, 8, 9])]);
    const view = new DataView(bytes.buffer);
    expect(bytes.byteLength).toBe(67);
    expect(view.getBigUint64(0, true)).toBe(BFAST_MAGIC);
    expect(view.getBigUint64(8, true)).toBe(64n);
    expect(view.getBigUint64(16, true)).toBe(67n);
    expect(view.getBigUint64(24, true)).toBe(1n);
    expect(view.getBigUint64(32, true)).toBe(64n);
    expect(view.getBigUint64(40, true)).toBe(67n);
    expect(Array.from(bytes.subarray(64))).toEqual([7, 8, 9]);
  });

  it("unpacks the arrays it packed, empty ones included", () => {
    const arrays = [
      new Uint8Array([1, 2, 3]),
      new Uint8Array(0),
      new Uint8Array(100).fill(5),
    ];
    const unpacked = unpackBfast(packBfast(arrays));
    expect(unpacked.map((a) => a.byteLength)).toEqual([3, 0, 100]);
    expect(Array.from(unpacked[0])).toEqual([1, 2, 3]);
    expect(unpacked[2].every((b) => b === 5)).toBe(true);
  });

  it("returns views into the input", () => {
    const bytes = packBfast([new Uint8Array([1])]);
    const [first] = unpackBfast(bytes);
    expect(first.buffer).toBe(bytes.buffer);
    expect(first.byteOffset).toBe(64);
  });

  it("reads a stream that starts inside a larger buffer", () => {
    const packed = packBfast([new Uint8Array([4, 5])]);
    const host = new Uint8Array(packed.byteLength + 8);
    host.set(packed, 8);
    const [first] = unpackBfast(host.subarray(8));
    expect(Array.from(first)).toEqual([4, 5]);
  });

  it("packs an empty container", () => {
    const bytes = packBfast([]);
    expect(bytes.byteLength).toBe(64);
    expect(readBfastRanges(bytes).header).toEqual({
      dataStart: 64,
      dataEnd: 64,
      numArrays: 0,
    });
  });

  describe("errors", () => {
    it("rejects a truncated header", () => {
      expect(() => unpackBfast(new Uint8Array(31))).toThrow(BfastFormatError);
    });

    it("rejects a bad magic", () => {
      const bytes = packBfast([new Uint8Array(1)]);
      bytes[0] = 0;
      expect(() => unpackBfast(bytes)).toThrow("bad magic 0xbf00");
    });

    it("names a big-endian stream", () => {
      const bytes = packBfast([]);
      new DataView(bytes.buffer).setBigUint64(0, BFAST_MAGIC, false);
      expect(() => unpackBfast(bytes)).toThrow(
        "big-endian BFAST streams are not supported",
      );
    });

    it("rejects a range table past the end", () => {
      const bytes = packBfast([new Uint8Array(1)]);
      new DataView(bytes.buffer).setBigUint64(24, 1000n, true);
      expect(() => unpackBfast(bytes)).toThrow(BfastFormatError);
    });

    it("rejects a data section past the end", () => {
      const bytes = packBfast([new Uint8Array(1)]);
      expect(() => unpackBfast(bytes.subarray(0, 64))).toThrow(
        "data section ends at 65, past 64 bytes",
      );
    });

    it("rejects a data section that starts after it ends", () => {
      const bytes = packBfast([new Uint8Array(1)]);
      new DataView(bytes.buffer).setBigUint64(8, 66n, true);
      expect(() => unpackBfast(bytes)).toThrow(
        "data section starts at 66, after its end 65",
      );
    });

    it("rejects a data section inside the range table", () => {
      const bytes = packBfast([new Uint8Array(1)]);
      new DataView(bytes.buffer).setBigUint64(8, 40n, true);
      expect(() => unpackBfast(bytes)).toThrow(
        "data section [40, 65) overlaps the range table",
      );
    });

    it("rejects an array outside the data section", () => {
      const bytes = packBfast([new Uint8Array(1)]);
      new DataView(bytes.buffer).setBigUint64(40, 66n, true);
      expect(() => unpackBfast(bytes)).toThrow(BfastFormatError);
    });

    it("rejects an array that ends before it begins", () => {
      const bytes = packBfast([new Uint8Array(2)]);
      const view = new DataView(bytes.buffer);
      view.setBigUint64(32, 65n, true);
      view.setBigUint64(40, 64n, true);
      expect(() => unpackBfast(bytes)).toThrow(BfastFormatError);
    });
  });
});
