import { Attribute } from "./Attribute";
import type { AttributeDescriptor } from "./AttributeDescriptor";
import { AlignmentError, CopyRangeError, NotFoundError } from "./errors";
import { dataTypeArray } from "./registry";
import type {
  ByteSource,
  PrimitiveArray,
  PrimitiveArrayConstructor,
} from "./types";

/**
 * Typed access shared by both ways of backing an attribute
 */
interface TypedAttributeAccess {
  readonly attribute: Attribute;
  readonly descriptor: AttributeDescriptor;
  readonly bytes: Uint8Array;
  readonly numElements: number;
  /**
   * Alias the bytes as primitives of `ArrayType`. The array's width must
   * equal the data type size; arity is not folded in.
   */
  view<T extends PrimitiveArray>(ArrayType: PrimitiveArrayConstructor<T>): T;
  /** `view` with the data type's own typed array */
  array(): PrimitiveArray;
  /** Primitives of logical element `index` */
  element(index: number): PrimitiveArray;
}

/**
 * A typed byte-backed attribute store, either aliasing caller memory or
 * owning its buffer
 */
export type AttributeStore = ReferenceAttributeStore | OwningAttributeStore;

/**
 * Aliases a caller-owned range. The caller keeps that memory alive and
 * unchanged for as long as the store is in use.
 */
export class ReferenceAttributeStore implements TypedAttributeAccess {
  readonly kind = "reference";
  readonly attribute: Attribute;

  constructor(
    descriptor: AttributeDescriptor,
    source: ByteSource | null | undefined,
  ) {
    this.attribute = new Attribute(descriptor, source && toBytes(source));
  }

  get descriptor(): AttributeDescriptor {
    return this.attribute.descriptor;
  }

  get bytes(): Uint8Array {
    return this.attribute.bytes;
  }

  get numElements(): number {
    return this.attribute.numElements;
  }

  view<T extends PrimitiveArray>(ArrayType: PrimitiveArrayConstructor<T>): T {
    return viewAttribute(this.attribute, ArrayType);
  }

  array(): PrimitiveArray {
    return viewAttribute(
      this.attribute,
      dataTypeArray(this.descriptor.dataType),
    );
  }

  element(index: number): PrimitiveArray {
    return elementOf(this, index);
  }
}

/**
 * Owns a buffer of `elementCount` elements, zeroed or copied from `source`
 */
export class OwningAttributeStore implements TypedAttributeAccess {
  readonly kind = "owning";
  readonly attribute: Attribute;

  constructor(
    descriptor: AttributeDescriptor,
    elementCount: number,
    source?: ByteSource,
  ) {
    if (!Number.isInteger(elementCount) || elementCount < 0) {
      throw new RangeError(`invalid element count ${elementCount}`);
    }
    const byteLength = elementCount * descriptor.dataElementSize;
    const buffer = new Uint8Array(byteLength);
    if (source) {
      const sourceBytes = toBytes(source);
      if (sourceBytes.byteLength < byteLength) {
        throw new CopyRangeError(
          `source has ${sourceBytes.byteLength} bytes, ${descriptor} needs ${byteLength}`,
        );
      }
      buffer.set(sourceBytes.subarray(0, byteLength));
    }
    this.attribute = new Attribute(descriptor, buffer);
  }

  get descriptor(): AttributeDescriptor {
    return this.attribute.descriptor;
  }

  get bytes(): Uint8Array {
    return this.attribute.bytes;
  }

  get numElements(): number {
    return this.attribute.numElements;
  }

  view<T extends PrimitiveArray>(ArrayType: PrimitiveArrayConstructor<T>): T {
    return viewAttribute(this.attribute, ArrayType);
  }

  array(): PrimitiveArray {
    return viewAttribute(
      this.attribute,
      dataTypeArray(this.descriptor.dataType),
    );
  }

  element(index: number): PrimitiveArray {
    return elementOf(this, index);
  }
}

/**
 * Byte view over any array buffer view, sharing its memory
 */
export function toBytes(source: ByteSource): Uint8Array {
  return source instanceof Uint8Array
    ? source
    : new Uint8Array(source.buffer, source.byteOffset, source.byteLength);
}

function viewAttribute<T extends PrimitiveArray>(
  attribute: Attribute,
  ArrayType: PrimitiveArrayConstructor<T>,
): T {
  const width = attribute.descriptor.dataTypeSize;
  if (ArrayType.BYTES_PER_ELEMENT !== width) {
    throw new AlignmentError(
      `${ArrayType.BYTES_PER_ELEMENT}-byte slots cannot hold ${attribute.descriptor.dataTypeName} values`,
    );
  }
  const { buffer, byteOffset, byteLength } = attribute.bytes;
  if (byteOffset % width !== 0) {
    throw new AlignmentError(
      `byte offset ${byteOffset} is not aligned to ${width} bytes`,
    );
  }
  return new ArrayType(buffer, byteOffset, byteLength / width);
}

function elementOf(store: TypedAttributeAccess, index: number): PrimitiveArray {
  if (!Number.isInteger(index) || index < 0 || index >= store.numElements) {
    throw new NotFoundError(
      `element ${index} out of range [0, ${store.numElements})`,
    );
  }
  const arity = store.descriptor.dataArity;
  return store.array().subarray(index * arity, (index + 1) * arity);
}
