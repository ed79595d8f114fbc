import type { AttributeDescriptor } from "./AttributeDescriptor";
import { AlignmentError, NullRangeError } from "./errors";

/**
 * A descriptor bound to a byte range it does not own
 */
export class Attribute {
  readonly bytes: Uint8Array;

  constructor(
    readonly descriptor: AttributeDescriptor,
    bytes: Uint8Array | null | undefined,
  ) {
    if (!bytes) {
      throw new NullRangeError(`attribute ${descriptor} has no byte range`);
    }
    const elementSize = descriptor.dataElementSize;
    if (bytes.byteLength % elementSize !== 0) {
      throw new AlignmentError(
        `${bytes.byteLength} bytes is not a multiple of the ${elementSize}-byte elements of ${descriptor}`,
      );
    }
    this.bytes = bytes;
  }

  get byteSize(): number {
    return this.bytes.byteLength;
  }

  get dataElementSize(): number {
    return this.descriptor.dataElementSize;
  }

  get numElements(): number {
    return this.byteSize / this.dataElementSize;
  }
}
