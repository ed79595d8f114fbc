import { afterEach, describe, it, expect, vi } from "vitest";
import { AttributeDescriptor } from "../AttributeDescriptor";
import { packBfast, readBfastRanges, unpackBfast } from "../bfast";
import {
  defaultHeader,
  fromBuffers,
  readG3d,
  toBuffers,
  writeG3d,
} from "../container";
import {
  AlignmentError,
  ArrayCountMismatchError,
  DuplicateAttributeError,
  DescriptorRangeError,
  MalformedError,
} from "../errors";
import { G3d } from "../G3d";
import { formatG3dStats } from "../utils/stats";

const COORDINATES = "g3d:vertex:coordinate:0:float32:3";
const INDICES = "g3d:corner:index:0:int32:1";

function quad(): G3d {
  const g3d = new G3d({ header: "{}" });
  g3d.addVertices(4, new Float32Array([0, 0, 0, 1, 0, 0, 0, 1, 0, 1, 1, 0]));
  g3d.addIndices(6, new Int32Array([0, 1, 2, 2, 1, 3]));
  return g3d;
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("container", () => {
  it("emits metadata, descriptors, then a data/index pair per attribute", () => {
    const buffers = toBuffers(quad());
    expect(buffers.map((b) => [b.name, b.bytes.byteLength])).toEqual([
      ["meta", 2],
      ["descriptors", 64],
      [COORDINATES, 48],
      [`${COORDINATES}:index`, 0],
      [INDICES, 24],
      [`${INDICES}:index`, 0],
    ]);
  });

  it("writes the descriptor table in key order", () => {
    const [, { bytes: table }] = toBuffers(quad());
    expect(AttributeDescriptor.decode(table, 0).toString()).toBe(COORDINATES);
    expect(AttributeDescriptor.decode(table, 32).toString()).toBe(INDICES);
  });

  it("packs 2 + 2N arrays", () => {
    const bytes = writeG3d(quad());
    const { header, ranges } = readBfastRanges(bytes);
    expect(header.numArrays).toBe(6);
    expect(ranges.map((r) => r.end - r.begin)).toEqual([2, 64, 48, 0, 24, 0]);
    expect(bytes.byteLength).toBe(384);
  });

  it("reads back the same keys and bytes", () => {
    const source = quad();
    const g3d = readG3d(writeG3d(source));
    expect(g3d.keys()).toEqual([COORDINATES, INDICES]);
    expect(g3d.header).toBe("{}");
    for (const key of source.keys()) {
      expect(Array.from(g3d.get(key).bytes)).toEqual(
        Array.from(source.get(key).bytes),
      );
      expect(g3d.getIndex(key).byteLength).toBe(0);
    }
    expect(g3d.get(INDICES).array()).toEqual(
      new Int32Array([0, 1, 2, 2, 1, 3]),
    );
    expect(g3d.get(COORDINATES).numElements).toBe(4);
  });

  it("aliases the input unless asked to copy", () => {
    const bytes = writeG3d(quad());
    const aliased = readG3d(bytes);
    const copied = readG3d(bytes, { copy: true });
    expect(aliased.get(INDICES).kind).toBe("reference");
    expect(copied.get(INDICES).kind).toBe("owning");

    bytes.fill(0, 128);
    expect(aliased.get(INDICES).array()).toEqual(new Int32Array(6));
    expect(copied.get(INDICES).array()).toEqual(
      new Int32Array([0, 1, 2, 2, 1, 3]),
    );
  });

  it("carries index buffers", () => {
    const g3d = new G3d({ header: "" });
    g3d.addMapChannelData(1, 2, new Float32Array([0, 0, 0, 1, 1, 1]));
    g3d.add("g3d:corner:uv:0:float32:2", 1, new Float32Array([0.5, 0.5]), {
      index: new Int32Array([2, 0, 1]),
    });
    const read = readG3d(writeG3d(g3d));
    expect(
      read.getIndex("g3d:none:mapchannel_data:1:float32:3").byteLength,
    ).toBe(0);
    expect(Array.from(read.getIndex("g3d:corner:uv:0:float32:2"))).toEqual([
      2, 0, 0, 0, 0, 0, 0, 0, 1, 0, 0, 0,
    ]);
  });

  it("writes a default header from the advisory counts", () => {
    const g3d = new G3d({ vertexCount: 4, faceCount: 2, cornerCount: 6 });
    expect(defaultHeader(g3d)).toBe(
      '{"g3d":"0.9.0","vertexCount":4,"faceCount":2,"cornerCount":6,"polygonSize":3}',
    );
    const [meta] = unpackBfast(writeG3d(g3d));
    expect(new TextDecoder().decode(meta)).toBe(defaultHeader(g3d));
  });

  it("prefers metadata passed to the writer", () => {
    const [meta] = toBuffers(quad(), { metadata: '{"name":"quad"}' });
    expect(new TextDecoder().decode(meta.bytes)).toBe('{"name":"quad"}');
  });

  it("keeps a leading byte order mark in the metadata", () => {
    const g3d = readG3d(writeG3d(quad(), { metadata: "\ufeff{}" }));
    expect(g3d.header).toBe("\ufeff{}");
    const [meta] = unpackBfast(writeG3d(g3d));
    expect(Array.from(meta)).toEqual([0xef, 0xbb, 0xbf, 0x7b, 0x7d]);
  });

  it("logs statistics in debug mode", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const g3d = readG3d(writeG3d(quad()), { debug: true });
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith(formatG3dStats(g3d));
  });

  describe("errors", () => {
    const arrays = () => toBuffers(quad()).map((b) => b.bytes);

    it("rejects a missing array", () => {
      expect(() => fromBuffers(arrays().slice(0, 5))).toThrow(
        ArrayCountMismatchError,
      );
    });

    it("rejects an extra array", () => {
      expect(() => fromBuffers([...arrays(), new Uint8Array(0)])).toThrow(
        "2 descriptors need 6 arrays, found 7",
      );
    });

    it("rejects a container without a descriptor table", () => {
      expect(() => fromBuffers([new Uint8Array(0)])).toThrow(
        ArrayCountMismatchError,
      );
    });

    it("rejects a descriptor table that is not whole records", () => {
      const a = arrays();
      a[1] = a[1].subarray(0, 40);
      expect(() => fromBuffers(a)).toThrow(AlignmentError);
    });

    it("rejects a data array inconsistent with its descriptor", () => {
      const a = arrays();
      a[2] = a[2].subarray(0, 44);
      expect(() => fromBuffers(a)).toThrow(AlignmentError);
    });

    it("validates descriptor records", () => {
      const a = arrays();
      const table = a[1].slice();
      new DataView(table.buffer).setInt32(32 + 16, 42, true);
      a[1] = table;
      expect(() => fromBuffers(a)).toThrow(DescriptorRangeError);
    });

    it("rejects a table naming the same channel twice", () => {
      const a = arrays();
      const table = new Uint8Array(64);
      table.set(a[1].subarray(0, 32), 0);
      table.set(a[1].subarray(0, 32), 32);
      expect(() =>
        fromBuffers([a[0], table, a[2], a[3], a[2], a[5]]),
      ).toThrow(DuplicateAttributeError);
    });

    it("rejects metadata that is not valid UTF-8", () => {
      const a = arrays();
      a[0] = new Uint8Array([0x7b, 0xff, 0x7d]);
      expect(() => fromBuffers(a)).toThrow(MalformedError);
    });

    it("rejects a BFAST stream whose array count does not match", () => {
      const bytes = packBfast(arrays().slice(0, 4));
      expect(() => readG3d(bytes)).toThrow(ArrayCountMismatchError);
    });
  });
});
