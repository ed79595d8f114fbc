import { AttributeDescriptor } from "./AttributeDescriptor";
import {
  OwningAttributeStore,
  ReferenceAttributeStore,
  toBytes,
  type AttributeStore,
} from "./AttributeStore";
import {
  CopyRangeError,
  DuplicateAttributeError,
  NotFoundError,
} from "./errors";
import { AttributeType } from "./registry";
import type { AddAttributeOptions, ByteSource, G3dOptions } from "./types";

/**
 * One channel of the collection: its store and its index buffer
 */
export interface G3dEntry {
  readonly key: string;
  readonly store: AttributeStore;
  /** Empty when the data is attached to elements directly */
  readonly index: Uint8Array;
}

const EMPTY_INDEX = new Uint8Array(0);

/**
 * A mesh as an insertion-ordered set of attribute channels keyed by their
 * canonical descriptor strings.
 *
 * Passing `data` to an `add*` method makes the channel alias it; the
 * caller keeps that memory alive. Without `data` the channel owns a zeroed
 * buffer the caller fills through `store.array()`.
 *
 * Not synchronized: writers need exclusive access.
 */
export class G3d {
  vertexCount: number;
  faceCount: number;
  cornerCount: number;
  polygonSize: number;
  header: string | undefined;

  private readonly _entries = new Map<string, G3dEntry>();

  constructor(options?: G3dOptions) {
    this.vertexCount = options?.vertexCount ?? 0;
    this.faceCount = options?.faceCount ?? 0;
    this.cornerCount = options?.cornerCount ?? 0;
    this.polygonSize = options?.polygonSize ?? 3;
    this.header = options?.header;
  }

  get size(): number {
    return this._entries.size;
  }

  /**
   * Add a channel of `elementCount` elements. The collection is left
   * unchanged when this throws.
   */
  add(
    descriptor: AttributeDescriptor | string,
    elementCount: number,
    source?: ByteSource,
    options?: AddAttributeOptions,
  ): AttributeStore {
    const desc =
      typeof descriptor === "string"
        ? AttributeDescriptor.fromString(descriptor)
        : descriptor;
    const key = desc.toString();
    if (this._entries.has(key)) {
      throw new DuplicateAttributeError(`attribute ${key} already exists`);
    }

    if (!Number.isInteger(elementCount) || elementCount < 0) {
      throw new RangeError(`invalid element count ${elementCount} for ${key}`);
    }

    let store: AttributeStore;
    if (!source || options?.copy) {
      store = new OwningAttributeStore(desc, elementCount, source);
    } else {
      const bytes = toBytes(source);
      const byteLength = elementCount * desc.dataElementSize;
      if (bytes.byteLength < byteLength) {
        throw new CopyRangeError(
          `source has ${bytes.byteLength} bytes, ${key} needs ${byteLength}`,
        );
      }
      store = new ReferenceAttributeStore(desc, bytes.subarray(0, byteLength));
    }

    const index = options?.index ? toBytes(options.index) : EMPTY_INDEX;
    this._entries.set(key, { key, store, index });
    return store;
  }

  /**
   * Insert a store built elsewhere, keyed by its descriptor
   */
  insert(store: AttributeStore, index: Uint8Array = EMPTY_INDEX): void {
    const key = store.descriptor.toString();
    if (this._entries.has(key)) {
      throw new DuplicateAttributeError(`attribute ${key} already exists`);
    }
    this._entries.set(key, { key, store, index });
  }

  get(key: string): AttributeStore {
    return this.entry(key).store;
  }

  tryGet(key: string): AttributeStore | undefined {
    return this._entries.get(key)?.store;
  }

  has(key: string): boolean {
    return this._entries.has(key);
  }

  remove(key: string): void {
    if (!this._entries.delete(key)) {
      throw new NotFoundError(`attribute ${key} not found`);
    }
  }

  /** Keys in insertion order, the order channels are serialized in */
  keys(): string[] {
    return Array.from(this._entries.keys());
  }

  entries(): G3dEntry[] {
    return Array.from(this._entries.values(), (entry) => ({ ...entry }));
  }

  getIndex(key: string): Uint8Array {
    return this.entry(key).index;
  }

  setIndex(key: string, index: ByteSource): void {
    const entry = this.entry(key);
    this._entries.set(key, { ...entry, index: toBytes(index) });
  }

  /**
   * Corners per face: `polygonSize`, or 0 when a facesize channel makes
   * face sizes variable
   */
  get cornersPerFace(): number {
    for (const { store } of this._entries.values()) {
      if (store.descriptor.attributeType === AttributeType.facesize) return 0;
    }
    return this.polygonSize;
  }

  addVertices(count: number, data?: Float32Array): AttributeStore {
    return this.add("g3d:vertex:coordinate:0:float32:3", count, data);
  }

  addVerticesAsFloat4(count: number, data?: Float32Array): AttributeStore {
    return this.add("g3d:vertex:coordinate:0:float32:4", count, data);
  }

  addIndices(count: number, data?: Int32Array): AttributeStore {
    return this.add("g3d:corner:index:0:int32:1", count, data);
  }

  addUvs(count: number, data?: Float32Array): AttributeStore {
    return this.add("g3d:vertex:uv:0:float32:2", count, data);
  }

  addUv2s(count: number, data?: Float32Array): AttributeStore {
    return this.add("g3d:vertex:uv:1:float32:2", count, data);
  }

  addVertexNormals(count: number, data?: Float32Array): AttributeStore {
    return this.add("g3d:vertex:normal:0:float32:3", count, data);
  }

  addMaterialIds(count: number, data?: Int32Array): AttributeStore {
    return this.add("g3d:face:materialid:0:int32:1", count, data);
  }

  addFaceSizes(count: number, data?: Int32Array): AttributeStore {
    return this.add("g3d:face:facesize:0:int32:1", count, data);
  }

  /** Float triples addressed only through the matching map channel index */
  addMapChannelData(
    id: number,
    count: number,
    data?: Float32Array,
  ): AttributeStore {
    const desc = AttributeDescriptor.fromString(
      "g3d:none:mapchannel_data:0:float32:3",
    ).with({ attributeTypeIndex: id });
    return this.add(desc, count, data);
  }

  /** One integer per corner indexing into the map channel data */
  addMapChannelIndex(
    id: number,
    count: number,
    data?: Int32Array,
  ): AttributeStore {
    const desc = AttributeDescriptor.fromString(
      "g3d:corner:mapchannel_index:0:int32:1",
    ).with({ attributeTypeIndex: id });
    return this.add(desc, count, data);
  }

  /**
   * Add a map channel as a data/index pair. The index has
   * `numTextureFaces * polygonSize` entries.
   */
  addMapChannel(
    id: number,
    textureVertices: Float32Array | undefined,
    numTextureVertices: number,
    textureIndices: Int32Array | undefined,
    numTextureFaces: number,
  ): [data: AttributeStore, index: AttributeStore] {
    const data = this.addMapChannelData(
      id,
      numTextureVertices,
      textureVertices,
    );
    try {
      const index = this.addMapChannelIndex(
        id,
        numTextureFaces * this.polygonSize,
        textureIndices,
      );
      return [data, index];
    } catch (err) {
      this._entries.delete(data.descriptor.toString());
      throw err;
    }
  }

  private entry(key: string): G3dEntry {
    const entry = this._entries.get(key);
    if (!entry) {
      throw new NotFoundError(`attribute ${key} not found`);
    }
    return entry;
  }
}

