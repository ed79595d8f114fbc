import {
  ArityError,
  DescriptorRangeError,
  InternalConsistencyError,
  LookupError,
  MalformedError,
} from "./errors";
import {
  associations,
  attributeTypes,
  dataTypes,
  dataTypeSize,
  type Registry,
  type Association,
  type AttributeType,
  type DataType,
} from "./registry";

/** Size of one binary descriptor record */
export const DESCRIPTOR_BYTE_SIZE = 32;

const PREFIX = "g3d";
const TOKEN_COUNT = 6;
const INTEGER_TOKEN = /^(0|[1-9][0-9]*)$/;
const INT32_MAX = 0x7fffffff;

/**
 * The five semantic fields of a descriptor
 */
export interface AttributeDescriptorFields {
  association: number;
  attributeType: number;
  attributeTypeIndex: number;
  dataArity: number;
  dataType: number;
}

/**
 * Identifies one attribute channel: what it is attached to, what role it
 * plays, and how its values are laid out.
 *
 * Canonical form:
 * `g3d:<association>:<attribute_type>:<attribute_type_index>:<data_type>:<data_arity>`
 */
export class AttributeDescriptor implements AttributeDescriptorFields {
  readonly association: number;
  readonly attributeType: number;
  readonly attributeTypeIndex: number;
  readonly dataArity: number;
  readonly dataType: number;

  /**
   * Validates unless `validate` is false; `decode` and `fromString` build
   * unchecked first and validate themselves.
   */
  constructor(fields: AttributeDescriptorFields, validate: boolean = true) {
    this.association = fields.association;
    this.attributeType = fields.attributeType;
    this.attributeTypeIndex = fields.attributeTypeIndex;
    this.dataArity = fields.dataArity;
    this.dataType = fields.dataType;
    Object.freeze(this);
    if (validate) this.validate();
  }

  static of(
    association: Association,
    attributeType: AttributeType,
    attributeTypeIndex: number,
    dataType: DataType,
    dataArity: number,
  ): AttributeDescriptor {
    return new AttributeDescriptor({
      association,
      attributeType,
      attributeTypeIndex,
      dataType,
      dataArity,
    });
  }

  validate(): void {
    if (!associations.isValid(this.association)) {
      throw new DescriptorRangeError(
        `association ${this.association} out of range`,
      );
    }
    if (!attributeTypes.isValid(this.attributeType)) {
      throw new DescriptorRangeError(
        `attribute type ${this.attributeType} out of range`,
      );
    }
    if (!isInt32(this.attributeTypeIndex) || this.attributeTypeIndex < 0) {
      throw new DescriptorRangeError(
        `attribute type index ${this.attributeTypeIndex} is not in [0, ${INT32_MAX}]`,
      );
    }
    if (!isInt32(this.dataArity) || this.dataArity <= 0) {
      throw new ArityError(
        `data arity must be in [1, ${INT32_MAX}], got ${this.dataArity}`,
      );
    }
    if (!dataTypes.isValid(this.dataType)) {
      throw new DescriptorRangeError(`data type ${this.dataType} out of range`);
    }
  }

  get dataTypeSize(): number {
    return dataTypeSize(this.dataType);
  }

  /** Bytes per logical element: primitive width times arity */
  get dataElementSize(): number {
    return this.dataTypeSize * this.dataArity;
  }

  get associationName(): string {
    return associations.nameOf(this.association);
  }

  get attributeTypeName(): string {
    return attributeTypes.nameOf(this.attributeType);
  }

  get dataTypeName(): string {
    return dataTypes.nameOf(this.dataType);
  }

  /** Canonical string, the collection key of the channel */
  toString(): string {
    return [
      PREFIX,
      this.associationName,
      this.attributeTypeName,
      this.attributeTypeIndex,
      this.dataTypeName,
      this.dataArity,
    ].join(":");
  }

  equals(other: AttributeDescriptorFields): boolean {
    return (
      this.association === other.association &&
      this.attributeType === other.attributeType &&
      this.attributeTypeIndex === other.attributeTypeIndex &&
      this.dataArity === other.dataArity &&
      this.dataType === other.dataType
    );
  }

  with(changes: Partial<AttributeDescriptorFields>): AttributeDescriptor {
    return new AttributeDescriptor({ ...this.fields(), ...changes });
  }

  fields(): AttributeDescriptorFields {
    return {
      association: this.association,
      attributeType: this.attributeType,
      attributeTypeIndex: this.attributeTypeIndex,
      dataArity: this.dataArity,
      dataType: this.dataType,
    };
  }

  /**
   * Parse a canonical string. The result is re-encoded and compared with
   * the input, so every accepted string is the canonical one.
   */
  static fromString(s: string): AttributeDescriptor {
    const tokens = s.split(":");
    if (tokens.length < TOKEN_COUNT) {
      throw new MalformedError(`insufficient tokens in "${s}"`);
    }
    if (tokens.length > TOKEN_COUNT) {
      throw new MalformedError(`too many tokens in "${s}"`);
    }
    const [prefix, association, attributeType, typeIndex, dataType, arity] =
      tokens;
    if (prefix !== PREFIX) {
      throw new MalformedError(`expected "${PREFIX}" prefix in "${s}"`);
    }

    const desc = new AttributeDescriptor(
      {
        association: parseName(associations, association),
        attributeType: parseName(attributeTypes, attributeType),
        attributeTypeIndex: parseInteger(typeIndex, "attribute type index"),
        dataType: parseName(dataTypes, dataType),
        dataArity: parseInteger(arity, "data arity"),
      },
      false,
    );
    desc.validate();

    const encoded = desc.toString();
    if (encoded !== s) {
      throw new InternalConsistencyError(
        `parsed descriptor encodes as "${encoded}", not "${s}"`,
      );
    }
    return desc;
  }

  /**
   * Write the 32-byte record. Field order on the wire is association,
   * attribute type, type index, arity, data type; the last 12 bytes are
   * reserved and written as zero.
   */
  encode(
    target: Uint8Array = new Uint8Array(DESCRIPTOR_BYTE_SIZE),
    offset: number = 0,
  ): Uint8Array {
    if (offset < 0 || offset + DESCRIPTOR_BYTE_SIZE > target.byteLength) {
      throw new RangeError(
        `descriptor record at ${offset} does not fit in ${target.byteLength} bytes`,
      );
    }
    const view = new DataView(target.buffer, target.byteOffset + offset);
    view.setInt32(0, this.association, true);
    view.setInt32(4, this.attributeType, true);
    view.setInt32(8, this.attributeTypeIndex, true);
    view.setInt32(12, this.dataArity, true);
    view.setInt32(16, this.dataType, true);
    target.fill(0, offset + 20, offset + DESCRIPTOR_BYTE_SIZE);
    return target;
  }

  /**
   * Read and validate one record. Reserved bytes are not inspected.
   */
  static decode(bytes: Uint8Array, offset: number = 0): AttributeDescriptor {
    if (offset < 0 || offset + DESCRIPTOR_BYTE_SIZE > bytes.byteLength) {
      throw new MalformedError(
        `descriptor record at ${offset} needs ${DESCRIPTOR_BYTE_SIZE} bytes, ${bytes.byteLength - offset} available`,
      );
    }
    const view = new DataView(bytes.buffer, bytes.byteOffset + offset);
    return new AttributeDescriptor({
      association: view.getInt32(0, true),
      attributeType: view.getInt32(4, true),
      attributeTypeIndex: view.getInt32(8, true),
      dataArity: view.getInt32(12, true),
      dataType: view.getInt32(16, true),
    });
  }
}

function isInt32(value: number): boolean {
  return (
    Number.isInteger(value) && value >= -INT32_MAX - 1 && value <= INT32_MAX
  );
}

function parseName(registry: Registry<number>, token: string): number {
  try {
    return registry.valueOf(token);
  } catch (err) {
    if (err instanceof LookupError) {
      throw new MalformedError(err.message, { cause: err });
    }
    throw err;
  }
}

function parseInteger(token: string, field: string): number {
  if (!INTEGER_TOKEN.test(token)) {
    throw new MalformedError(`${field} "${token}" is not a base-10 integer`);
  }
  const value = Number(token);
  if (value > INT32_MAX) {
    throw new MalformedError(`${field} ${token} does not fit in int32`);
  }
  return value;
}
