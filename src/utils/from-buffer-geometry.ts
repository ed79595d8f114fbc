import { BufferAttribute, type BufferGeometry } from "three";
import { G3d } from "../G3d";
import {
  GEOMETRY_ATTRIBUTES,
  INDEX_KEY,
  MATERIAL_ID_KEY,
  type BufferGeometryOptions,
} from "./build-buffer-geometry";

/**
 * Convert a triangle BufferGeometry into a G3d collection. No channel
 * aliases the geometry's arrays.
 */
export function g3dFromBufferGeometry(
  geometry: BufferGeometry,
  options?: BufferGeometryOptions,
): G3d {
  const quiet = options?.quiet ?? false;
  const vertexCount = geometry.hasAttribute("position")
    ? geometry.getAttribute("position").count
    : 0;
  const index = geometry.getIndex();
  const cornerCount = index ? index.count : vertexCount;

  const g3d = new G3d({
    vertexCount,
    cornerCount,
    faceCount: Math.floor(cornerCount / 3),
    polygonSize: 3,
  });

  for (const { key, name, itemSize } of GEOMETRY_ATTRIBUTES) {
    if (!geometry.hasAttribute(name)) continue;
    const attribute = geometry.getAttribute(name);
    if (
      !(attribute instanceof BufferAttribute) ||
      !(attribute.array instanceof Float32Array) ||
      attribute.itemSize !== itemSize
    ) {
      continue;
    }
    g3d.add(key, attribute.count, attribute.array, { copy: true });
  }

  if (!quiet) {
    for (const name of Object.keys(geometry.attributes)) {
      const converted = GEOMETRY_ATTRIBUTES.some(
        (a) => a.name === name && g3d.has(a.key),
      );
      if (!converted) {
        console.warn(`g3dFromBufferGeometry: skipping attribute ${name}`);
      }
    }
  }

  if (index) {
    const indices = Int32Array.from(index.array);
    g3d.add(INDEX_KEY, indices.length, indices);
  }

  if (geometry.groups.length > 0) {
    const faceCount = Math.floor(cornerCount / 3);
    const materialIds = new Int32Array(faceCount);
    for (const group of geometry.groups) {
      const first = Math.floor(group.start / 3);
      const last = Math.min(
        faceCount,
        Math.floor((group.start + group.count) / 3),
      );
      materialIds.fill(group.materialIndex ?? 0, first, last);
    }
    g3d.add(MATERIAL_ID_KEY, faceCount, materialIds);
  }

  return g3d;
}
