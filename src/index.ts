export * from "./errors";
export {
  Association,
  AttributeType,
  DataType,
  Registry,
  associations,
  attributeTypes,
  dataTypeArray,
  dataTypes,
  dataTypeSize,
  type AssociationName,
  type AttributeTypeName,
  type DataTypeName,
} from "./registry";
export {
  AttributeDescriptor,
  DESCRIPTOR_BYTE_SIZE,
  type AttributeDescriptorFields,
} from "./AttributeDescriptor";
export { Attribute } from "./Attribute";
export {
  OwningAttributeStore,
  ReferenceAttributeStore,
  toBytes,
  type AttributeStore,
} from "./AttributeStore";
export { G3d, type G3dEntry } from "./G3d";
export {
  BFAST_ALIGNMENT,
  BFAST_HEADER_SIZE,
  BFAST_MAGIC,
  BFAST_RANGE_SIZE,
  alignOffset,
  computeBfastLayout,
  packBfast,
  readBfastRanges,
  unpackBfast,
  type BfastHeader,
  type BfastRange,
} from "./bfast";
export {
  DESCRIPTORS_BUFFER_NAME,
  META_BUFFER_NAME,
  defaultHeader,
  fromBuffers,
  readG3d,
  toBuffers,
  writeG3d,
} from "./container";
export {
  buildBufferGeometry,
  formatG3dStats,
  g3dFromBufferGeometry,
  type BufferGeometryOptions,
} from "./utils";
export { G3D_VERSION, formatVersion } from "./version";
export type * from "./types";
