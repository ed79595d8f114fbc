import { BufferAttribute, BufferGeometry } from "three";
import type { G3d } from "../G3d";

/**
 * buildBufferGeometry 配置选项
 */
export interface BufferGeometryOptions {
  /** Do not warn about attributes that have no BufferGeometry counterpart */
  quiet?: boolean;
}

/**
 * G3D channels that map one-to-one onto BufferGeometry attributes
 */
export const GEOMETRY_ATTRIBUTES: ReadonlyArray<{
  key: string;
  name: string;
  itemSize: number;
}> = [
  { key: "g3d:vertex:coordinate:0:float32:3", name: "position", itemSize: 3 },
  { key: "g3d:vertex:normal:0:float32:3", name: "normal", itemSize: 3 },
  { key: "g3d:vertex:uv:0:float32:2", name: "uv", itemSize: 2 },
  { key: "g3d:vertex:uv:1:float32:2", name: "uv1", itemSize: 2 },
  { key: "g3d:vertex:color:0:float32:3", name: "color", itemSize: 3 },
  { key: "g3d:vertex:color:0:float32:4", name: "color", itemSize: 4 },
  { key: "g3d:vertex:tangent:0:float32:4", name: "tangent", itemSize: 4 },
];

export const INDEX_KEY = "g3d:corner:index:0:int32:1";
export const MATERIAL_ID_KEY = "g3d:face:materialid:0:int32:1";

/**
 * 从 G3D 数据构建 BufferGeometry
 *
 * Vertex attributes alias the G3D buffers; the index is copied into a
 * Uint32Array. Face material ids become geometry groups.
 */
export function buildBufferGeometry(
  g3d: G3d,
  options?: BufferGeometryOptions,
): BufferGeometry {
  const quiet = options?.quiet ?? false;
  const geometry = new BufferGeometry();
  const used = new Set<string>();

  // 顶点属性
  for (const { key, name, itemSize } of GEOMETRY_ATTRIBUTES) {
    const store = g3d.tryGet(key);
    if (!store) continue;
    geometry.setAttribute(
      name,
      new BufferAttribute(store.view(Float32Array), itemSize),
    );
    used.add(key);
  }

  // 索引
  const indexStore = g3d.tryGet(INDEX_KEY);
  if (indexStore) {
    const indices = Uint32Array.from(indexStore.view(Int32Array));
    geometry.setIndex(new BufferAttribute(indices, 1));
    used.add(INDEX_KEY);
  }

  // 材质分组
  const materialStore = g3d.tryGet(MATERIAL_ID_KEY);
  if (materialStore) {
    const cornersPerFace = g3d.cornersPerFace;
    if (cornersPerFace > 0) {
      addMaterialGroups(
        geometry,
        materialStore.view(Int32Array),
        cornersPerFace,
      );
      used.add(MATERIAL_ID_KEY);
    }
  }

  if (!quiet) {
    for (const key of g3d.keys()) {
      if (!used.has(key)) {
        console.warn(`buildBufferGeometry: skipping ${key}`);
      }
    }
  }

  return geometry;
}

/**
 * One group per run of faces sharing a material id
 */
function addMaterialGroups(
  geometry: BufferGeometry,
  materialIds: Int32Array,
  cornersPerFace: number,
): void {
  let runStart = 0;
  for (let face = 1; face <= materialIds.length; face++) {
    if (
      face === materialIds.length ||
      materialIds[face] !== materialIds[runStart]
    ) {
      geometry.addGroup(
        runStart * cornersPerFace,
        (face - runStart) * cornersPerFace,
        materialIds[runStart],
      );
      runStart = face;
    }
  }
}
