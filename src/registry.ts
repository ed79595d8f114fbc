import { LookupError } from "./errors";
import type { PrimitiveArrayConstructor } from "./types";

/**
 * Primitive scalar types. Values are the on-wire integers.
 */
export const DataType = {
  uint8: 0,
  uint16: 1,
  uint32: 2,
  uint64: 3,
  uint128: 4,
  int8: 5,
  int16: 6,
  int32: 7,
  int64: 8,
  int128: 9,
  float16: 10,
  float32: 11,
  float64: 12,
  float128: 13,
  invalid: 14,
} as const;

export type DataTypeName = keyof typeof DataType;
export type DataType = (typeof DataType)[DataTypeName];

/**
 * Geometric element a value is attached to
 */
export const Association = {
  vertex: 0,
  face: 1,
  corner: 2,
  edge: 3,
  object: 4,
  none: 5,
  invalid: 6,
} as const;

export type AssociationName = keyof typeof Association;
export type Association = (typeof Association)[AssociationName];

/**
 * Semantic role of an attribute channel
 */
export const AttributeType = {
  custom: 0,
  coordinate: 1,
  index: 2,
  faceindex: 3,
  facesize: 4,
  normal: 5,
  binormal: 6,
  tangent: 7,
  materialid: 8,
  polygroup: 9,
  uv: 10,
  color: 11,
  smoothing: 12,
  crease: 13,
  hole: 14,
  invisibility: 15,
  selection: 16,
  pervertex: 17,
  mapchannel_data: 18,
  mapchannel_index: 19,
  invalid: 20,
} as const;

export type AttributeTypeName = keyof typeof AttributeType;
export type AttributeType = (typeof AttributeType)[AttributeTypeName];

/**
 * Bidirectional name/value table over one of the enumerations above
 */
export class Registry<V extends number> {
  private readonly names = new Map<number, string>();
  private readonly values = new Map<string, V>();

  constructor(
    readonly label: string,
    table: Readonly<Record<string, V>>,
    /** Value of the `invalid` member, the exclusive upper bound of valid values */
    readonly invalid: V,
  ) {
    for (const [name, value] of Object.entries(table)) {
      this.names.set(value, name);
      this.values.set(name, value);
    }
  }

  nameOf(value: number): string {
    const name = this.names.get(value);
    if (name === undefined) {
      throw new LookupError(`${this.label}: no name for value ${value}`);
    }
    return name;
  }

  valueOf(name: string): V {
    const value = this.values.get(name);
    if (value === undefined) {
      throw new LookupError(`${this.label}: unknown name "${name}"`);
    }
    return value;
  }

  /** Whether `value` is a member other than `invalid` */
  isValid(value: number): boolean {
    return Number.isInteger(value) && value >= 0 && value < this.invalid;
  }

  /** Registered names in value order, `invalid` included */
  allNames(): string[] {
    return Array.from(this.values.keys());
  }
}

export const dataTypes = new Registry<DataType>(
  "data type",
  DataType,
  DataType.invalid,
);
export const associations = new Registry<Association>(
  "association",
  Association,
  Association.invalid,
);
export const attributeTypes = new Registry<AttributeType>(
  "attribute type",
  AttributeType,
  AttributeType.invalid,
);

const DATA_TYPE_SIZES: readonly number[] = [
  1, 2, 4, 8, 16, 1, 2, 4, 8, 16, 2, 4, 8, 16,
];

/**
 * Byte width of one primitive of `dataType`
 */
export function dataTypeSize(dataType: number): number {
  const size = DATA_TYPE_SIZES[dataType];
  if (size === undefined || !Number.isInteger(dataType)) {
    throw new LookupError(`data type ${dataType} has no size`);
  }
  return size;
}

// float16 maps to its raw bits; 128-bit types have no JavaScript array
const DATA_TYPE_ARRAYS: ReadonlyMap<number, PrimitiveArrayConstructor> =
  new Map<number, PrimitiveArrayConstructor>([
    [DataType.uint8, Uint8Array],
    [DataType.uint16, Uint16Array],
    [DataType.uint32, Uint32Array],
    [DataType.uint64, BigUint64Array],
    [DataType.int8, Int8Array],
    [DataType.int16, Int16Array],
    [DataType.int32, Int32Array],
    [DataType.int64, BigInt64Array],
    [DataType.float16, Uint16Array],
    [DataType.float32, Float32Array],
    [DataType.float64, Float64Array],
  ]);

/**
 * Typed array holding one primitive of `dataType` per slot
 */
export function dataTypeArray(dataType: number): PrimitiveArrayConstructor {
  const ArrayType = DATA_TYPE_ARRAYS.get(dataType);
  if (!ArrayType) {
    throw new LookupError(
      `no typed array for data type ${dataTypes.nameOf(dataType)}`,
    );
  }
  return ArrayType;
}
