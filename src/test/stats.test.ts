import { describe, it, expect } from "vitest";
import { G3d } from "../G3d";
import { formatG3dStats } from "../utils/stats";

describe("formatG3dStats", () => {
  it("lists every attribute with its size", () => {
    const g3d = new G3d({ header: '{"name":"tri"}' });
    g3d.addVertices(3);
    g3d.addIndices(3);
    expect(formatG3dStats(g3d).split("\n")).toEqual([
      "Number of attributes = 2",
      "Header",
      '{"name":"tri"}',
      "g3d:vertex:coordinate:0:float32:3 #bytes=36 #items=3",
      "g3d:corner:index:0:int32:1 #bytes=12 #items=3",
      "3 corners per face",
    ]);
  });

  it("prints an empty header line and variable face sizes", () => {
    const g3d = new G3d();
    g3d.addFaceSizes(2, new Int32Array([3, 4]));
    expect(formatG3dStats(g3d)).toBe(
      [
        "Number of attributes = 1",
        "Header",
        "",
        "g3d:face:facesize:0:int32:1 #bytes=8 #items=2",
        "0 corners per face",
      ].join("\n"),
    );
  });
});
