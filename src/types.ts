/**
 * Typed arrays that can alias an attribute's bytes one primitive per slot
 */
export type PrimitiveArray =
  | Uint8Array
  | Int8Array
  | Uint16Array
  | Int16Array
  | Uint32Array
  | Int32Array
  | Float32Array
  | Float64Array
  | BigUint64Array
  | BigInt64Array;

/**
 * Constructor of a primitive array, used to reinterpret attribute bytes
 */
export interface PrimitiveArrayConstructor<
  T extends PrimitiveArray = PrimitiveArray,
> {
  readonly BYTES_PER_ELEMENT: number;
  new (buffer: ArrayBufferLike, byteOffset: number, length: number): T;
}

/**
 * Any view accepted as an attribute source
 */
export type ByteSource = ArrayBufferView;

/**
 * Advisory mesh-level counts carried by a G3d collection
 */
export interface G3dOptions {
  vertexCount?: number;
  faceCount?: number;
  cornerCount?: number;
  /** Corners per face, 3 for triangle meshes */
  polygonSize?: number;
  /** Metadata string written as array 0 */
  header?: string;
}

export interface AddAttributeOptions {
  /** Copy `source` into an owning store instead of aliasing it */
  copy?: boolean;
  /** Index buffer written after the data buffer; empty means no indirection */
  index?: ByteSource;
}

export interface G3dWriteOptions {
  /** Overrides the collection's header as array 0 */
  metadata?: string;
}

export interface G3dReadOptions {
  /** Copy every array into owning stores instead of aliasing the input */
  copy?: boolean;
  /** Log a statistics report of the decoded collection */
  debug?: boolean;
}

/**
 * A container array with the name it is reported under
 */
export interface NamedBuffer {
  name: string;
  bytes: Uint8Array;
}
