/**
 * Base class for every error raised by the G3D core
 */
export class G3dError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Unknown registry name, or a size asked of `invalid` */
export class LookupError extends G3dError {}

/** Enum field of a descriptor outside its valid span */
export class DescriptorRangeError extends G3dError {}

/** Descriptor arity <= 0 */
export class ArityError extends G3dError {}

/** Canonical string or binary record that cannot be parsed */
export class MalformedError extends G3dError {}

/**
 * A parsed descriptor did not re-encode to its input string.
 * Signals drift between the grammar and the registries.
 */
export class InternalConsistencyError extends G3dError {}

/** Byte length not a multiple of the element size, or a misaligned view */
export class AlignmentError extends G3dError {}

/** Missing byte range */
export class NullRangeError extends G3dError {}

/** Source shorter than the bytes it has to provide */
export class CopyRangeError extends G3dError {}

export class DuplicateAttributeError extends G3dError {}

export class NotFoundError extends G3dError {}

/** Container array count is not 2 + 2N */
export class ArrayCountMismatchError extends G3dError {}

/** Byte stream that is not a readable BFAST container */
export class BfastFormatError extends G3dError {}
