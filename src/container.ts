import {
  AttributeDescriptor,
  DESCRIPTOR_BYTE_SIZE,
} from "./AttributeDescriptor";
import {
  OwningAttributeStore,
  ReferenceAttributeStore,
  type AttributeStore,
} from "./AttributeStore";
import { packBfast, unpackBfast } from "./bfast";
import {
  AlignmentError,
  ArrayCountMismatchError,
  MalformedError,
} from "./errors";
import { G3d } from "./G3d";
import type { G3dReadOptions, G3dWriteOptions, NamedBuffer } from "./types";
import { formatG3dStats } from "./utils/stats";
import { formatVersion } from "./version";

export const META_BUFFER_NAME = "meta";
export const DESCRIPTORS_BUFFER_NAME = "descriptors";

/**
 * Metadata written when neither the options nor the collection carry one
 */
export function defaultHeader(g3d: G3d): string {
  return JSON.stringify({
    g3d: formatVersion(),
    vertexCount: g3d.vertexCount,
    faceCount: g3d.faceCount,
    cornerCount: g3d.cornerCount,
    polygonSize: g3d.polygonSize,
  });
}

/**
 * The container arrays of `g3d`, in write order: metadata, descriptor
 * table, then a data and an index buffer per attribute. Data buffers
 * alias the stores.
 */
export function toBuffers(g3d: G3d, options?: G3dWriteOptions): NamedBuffer[] {
  const entries = g3d.entries();
  const header = options?.metadata ?? g3d.header ?? defaultHeader(g3d);

  const descriptors = new Uint8Array(entries.length * DESCRIPTOR_BYTE_SIZE);
  entries.forEach(({ store }, i) => {
    store.descriptor.encode(descriptors, i * DESCRIPTOR_BYTE_SIZE);
  });

  const buffers: NamedBuffer[] = [
    { name: META_BUFFER_NAME, bytes: new TextEncoder().encode(header) },
    { name: DESCRIPTORS_BUFFER_NAME, bytes: descriptors },
  ];
  for (const { key, store, index } of entries) {
    buffers.push({ name: key, bytes: store.bytes });
    buffers.push({ name: `${key}:index`, bytes: index });
  }
  return buffers;
}

/**
 * Serialize `g3d` to a BFAST byte stream
 */
export function writeG3d(g3d: G3d, options?: G3dWriteOptions): Uint8Array {
  return packBfast(toBuffers(g3d, options).map((b) => b.bytes));
}

/**
 * Rebuild a collection from container arrays. Stores alias `arrays`
 * unless `options.copy` is set.
 */
export function fromBuffers(
  arrays: readonly Uint8Array[],
  options?: G3dReadOptions,
): G3d {
  if (arrays.length < 2) {
    throw new ArrayCountMismatchError(
      `expected metadata and descriptor arrays, found ${arrays.length} arrays`,
    );
  }
  const [meta, table] = arrays;

  if (table.byteLength % DESCRIPTOR_BYTE_SIZE !== 0) {
    throw new AlignmentError(
      `descriptor table of ${table.byteLength} bytes is not a multiple of ${DESCRIPTOR_BYTE_SIZE}`,
    );
  }
  const count = table.byteLength / DESCRIPTOR_BYTE_SIZE;
  const descriptors: AttributeDescriptor[] = [];
  for (let i = 0; i < count; i++) {
    descriptors.push(
      AttributeDescriptor.decode(table, i * DESCRIPTOR_BYTE_SIZE),
    );
  }

  if (arrays.length !== 2 + 2 * count) {
    throw new ArrayCountMismatchError(
      `${count} descriptors need ${2 + 2 * count} arrays, found ${arrays.length}`,
    );
  }

  const g3d = new G3d({ header: decodeMetadata(meta) });
  descriptors.forEach((descriptor, i) => {
    const data = arrays[2 + 2 * i];
    const index = arrays[3 + 2 * i];
    let store: AttributeStore = new ReferenceAttributeStore(descriptor, data);
    if (options?.copy) {
      store = new OwningAttributeStore(descriptor, store.numElements, data);
    }
    g3d.insert(store, options?.copy ? index.slice() : index);
  });

  if (options?.debug) {
    console.log(formatG3dStats(g3d));
  }
  return g3d;
}

/**
 * Deserialize a BFAST byte stream written by `writeG3d`
 */
export function readG3d(bytes: Uint8Array, options?: G3dReadOptions): G3d {
  return fromBuffers(unpackBfast(bytes), options);
}

const metadataDecoder = new TextDecoder("utf-8", {
  fatal: true,
  ignoreBOM: true,
});

function decodeMetadata(meta: Uint8Array): string {
  try {
    return metadataDecoder.decode(meta);
  } catch (err) {
    throw new MalformedError("metadata is not valid UTF-8", { cause: err });
  }
}
