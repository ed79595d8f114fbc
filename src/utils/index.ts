export {
  buildBufferGeometry,
  GEOMETRY_ATTRIBUTES,
  INDEX_KEY,
  MATERIAL_ID_KEY,
  type BufferGeometryOptions,
} from "./build-buffer-geometry";
export { g3dFromBufferGeometry } from "./from-buffer-geometry";
export { formatG3dStats } from "./stats";
