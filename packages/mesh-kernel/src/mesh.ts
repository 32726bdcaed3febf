/**
 * Indexed polygon mesh, the value that flows along graph edges.
 *
 * A mesh is a list of vertex positions, a list of faces (ordered vertex
 * indices, counter-clockwise when seen from outside), and attribute channels.
 * Instances are read-only once built: every operation that "changes" a mesh
 * builds a new one through MeshBuilder, so no two meshes share storage.
 */

import { GeometryError } from './errors.js';
import {
  type Channel, type ChannelKey, type ChannelType, type ChannelValue,
  MeshChannels, channelValue, cloneChannel, defaultChannelValue, makeChannel,
} from './channels.js';
import { type BoundingBox, type ReadonlyVec3, type Vec3, boundsOf, copy3 } from './vec3.js';

export type Face = readonly number[];

/** Read-only view handed to renderers. Every array is a frozen copy. */
export interface MeshSnapshot {
  readonly vertexCount: number;
  readonly faceCount: number;
  readonly positions: readonly ReadonlyVec3[];
  readonly faces: readonly Face[];
  readonly channels: readonly Readonly<Channel>[];
  readonly bounds: { readonly min: ReadonlyVec3; readonly max: ReadonlyVec3 };
}

/** Triangle list produced by triangulate(). */
export interface TriangleMesh {
  vertices: Vec3[];
  /** Triangle indices into vertices[], groups of 3. */
  indices: number[];
  vertexCount: number;
  triangleCount: number;
  bounds: BoundingBox;
}

function validate(positionCount: number, faces: readonly Face[]): void {
  for (let f = 0; f < faces.length; f++) {
    const face = faces[f];
    if (face.length < 3) {
      throw new GeometryError(`Face ${f} has ${face.length} vertices; at least 3 are required`);
    }
    for (let c = 0; c < face.length; c++) {
      const v = face[c];
      if (!Number.isInteger(v) || v < 0 || v >= positionCount) {
        throw new GeometryError(
          `Face ${f} references vertex ${v}, but the mesh has ${positionCount} vertices`
        );
      }
      if (v === face[(c + 1) % face.length]) {
        throw new GeometryError(`Face ${f} repeats vertex ${v} on consecutive corners`);
      }
    }
  }
}

function elementCount(key: ChannelKey, vertexCount: number, faces: readonly Face[]): number {
  switch (key) {
    case 'vertex': return vertexCount;
    case 'face': return faces.length;
    case 'halfedge': return faces.reduce((n, f) => n + f.length, 0);
  }
}

export class Mesh {
  private constructor(
    private readonly _positions: readonly ReadonlyVec3[],
    private readonly _faces: readonly Face[],
    private readonly _channels: MeshChannels,
  ) {}

  static empty(): Mesh {
    return new Mesh([], [], new MeshChannels());
  }

  /**
   * Build a mesh from explicit positions and faces. Inputs are copied.
   * Throws GeometryError on out-of-range indices, faces with fewer than
   * three corners, repeated consecutive corners, non-finite coordinates,
   * or channels whose length does not match their element count.
   */
  static fromPolygons(
    positions: readonly ReadonlyVec3[],
    faces: readonly Face[],
    channels: Iterable<Channel> = [],
  ): Mesh {
    for (let i = 0; i < positions.length; i++) {
      if (!positions[i].every(Number.isFinite)) {
        throw new GeometryError(`Vertex ${i} has a non-finite coordinate`);
      }
    }
    validate(positions.length, faces);
    const set = new MeshChannels();
    for (const ch of channels) {
      const expected = elementCount(ch.key, positions.length, faces);
      if (ch.values.length !== expected) {
        throw new GeometryError(
          `Channel "${ch.key}:${ch.name}" has ${ch.values.length} values, expected ${expected}`
        );
      }
      set.set(cloneChannel(ch));
    }
    return new Mesh(positions.map(copy3), faces.map((f) => [...f]), set);
  }

  get vertexCount(): number {
    return this._positions.length;
  }

  get faceCount(): number {
    return this._faces.length;
  }

  /** Total number of face corners (halfedges). */
  get cornerCount(): number {
    return elementCount('halfedge', 0, this._faces);
  }

  get positions(): readonly ReadonlyVec3[] {
    return this._positions;
  }

  get faces(): readonly Face[] {
    return this._faces;
  }

  position(i: number): Vec3 {
    return copy3(this._positions[i]);
  }

  face(i: number): number[] {
    return [...this._faces[i]];
  }

  channels(key?: ChannelKey): readonly Readonly<Channel>[] {
    return this._channels.list(key);
  }

  channel(key: ChannelKey, name: string): Readonly<Channel> | undefined {
    return this._channels.get(key, name);
  }

  /** Copy of all channels, for builders that start from this mesh. */
  channelSet(): MeshChannels {
    return this._channels.clone();
  }

  /** Undirected edges as sorted [a, b] pairs, in first-seen order. */
  edges(): [number, number][] {
    const seen = new Set<string>();
    const out: [number, number][] = [];
    for (const face of this._faces) {
      for (let c = 0; c < face.length; c++) {
        const a = face[c], b = face[(c + 1) % face.length];
        const lo = Math.min(a, b), hi = Math.max(a, b);
        const key = `${lo}:${hi}`;
        if (!seen.has(key)) {
          seen.add(key);
          out.push([lo, hi]);
        }
      }
    }
    return out;
  }

  bounds(): BoundingBox {
    return boundsOf(this._positions);
  }

  /** New mesh with the same geometry and channels (no shared storage). */
  clone(): Mesh {
    return Mesh.fromPolygons(this._positions, this._faces, this._channels.list());
  }

  /** Deep-frozen copy for the rendering collaborator. */
  snapshot(): MeshSnapshot {
    const positions = this._positions.map((p) => Object.freeze(copy3(p)));
    const faces = this._faces.map((f) => Object.freeze([...f]));
    const channels = this._channels.list().map((ch) => {
      const copy = cloneChannel(ch);
      for (const v of copy.values) if (Array.isArray(v)) Object.freeze(v);
      Object.freeze(copy.values);
      return Object.freeze(copy);
    });
    const bounds = this.bounds();
    return Object.freeze({
      vertexCount: positions.length,
      faceCount: faces.length,
      positions: Object.freeze(positions),
      faces: Object.freeze(faces),
      channels: Object.freeze(channels),
      bounds: Object.freeze({ min: Object.freeze(bounds.min), max: Object.freeze(bounds.max) }),
    });
  }
}

/**
 * Exclusive, mutable mesh under construction. Operations create a builder,
 * append vertices and faces, and call build() exactly once.
 *
 * Channel values are recorded per element as they are added; elements added
 * without a value for a channel get the type default.
 */
export class MeshBuilder {
  private readonly positions: Vec3[] = [];
  private readonly faces: number[][] = [];
  private readonly layouts = new Map<string, { key: ChannelKey; type: ChannelType; name: string }>();
  private readonly values = new Map<string, ChannelValue[]>();

  /** Declare a channel so that values can be attached to elements. */
  declareChannel(key: ChannelKey, type: ChannelType, name: string): void {
    const id = `${key}:${name}`;
    const existing = this.layouts.get(id);
    if (existing) {
      if (existing.type !== type) {
        throw new GeometryError(`Channel "${id}" is declared as ${existing.type}, cannot redeclare as ${type}`);
      }
      return;
    }
    this.layouts.set(id, { key, type, name });
    const count = this.count(key);
    this.values.set(id, Array.from({ length: count }, () => defaultChannelValue(type)));
  }

  /** Declare every channel of a mesh (except those of the excluded kinds). */
  declareChannelsOf(mesh: Mesh, exclude: readonly ChannelKey[] = []): void {
    for (const ch of mesh.channels()) {
      if (!exclude.includes(ch.key)) this.declareChannel(ch.key, ch.type, ch.name);
    }
  }

  get vertexCount(): number {
    return this.positions.length;
  }

  get faceCount(): number {
    return this.faces.length;
  }

  addVertex(p: ReadonlyVec3, attributes?: ReadonlyMap<string, ChannelValue>): number {
    this.positions.push(copy3(p));
    this.pushValues('vertex', 1, attributes);
    return this.positions.length - 1;
  }

  /** Add a vertex that inherits every vertex channel value of `source[index]`. */
  addVertexFrom(p: ReadonlyVec3, source: Mesh, index: number): number {
    return this.addVertex(p, attributesOf(source, 'vertex', index));
  }

  addFace(face: readonly number[], attributes?: ReadonlyMap<string, ChannelValue>): number {
    this.faces.push([...face]);
    this.pushValues('face', 1, attributes);
    this.pushValues('halfedge', face.length);
    return this.faces.length - 1;
  }

  addFaceFrom(face: readonly number[], source: Mesh, index: number): number {
    return this.addFace(face, attributesOf(source, 'face', index));
  }

  setPosition(i: number, p: ReadonlyVec3): void {
    this.positions[i] = copy3(p);
  }

  getPosition(i: number): Vec3 {
    return copy3(this.positions[i]);
  }

  setFace(i: number, face: readonly number[]): void {
    if (face.length !== this.faces[i].length && this.hasHalfedgeChannels()) {
      throw new GeometryError('Cannot resize a face while halfedge channels are declared');
    }
    this.faces[i] = [...face];
  }

  /** Set a declared channel value on an existing element. */
  setValue(key: ChannelKey, name: string, index: number, value: ChannelValue): void {
    const id = `${key}:${name}`;
    const list = this.values.get(id);
    if (!list) throw new GeometryError(`Channel "${id}" is not declared`);
    list[index] = value;
  }

  build(): Mesh {
    const channels: Channel[] = [];
    for (const [id, layout] of this.layouts) {
      channels.push(makeChannel(layout.key, layout.type, layout.name, this.values.get(id) ?? []));
    }
    return Mesh.fromPolygons(this.positions, this.faces, channels);
  }

  private count(key: ChannelKey): number {
    return elementCount(key, this.positions.length, this.faces);
  }

  private hasHalfedgeChannels(): boolean {
    return [...this.layouts.values()].some((l) => l.key === 'halfedge');
  }

  private pushValues(key: ChannelKey, n: number, attributes?: ReadonlyMap<string, ChannelValue>): void {
    for (const [id, layout] of this.layouts) {
      if (layout.key !== key) continue;
      const list = this.values.get(id);
      if (!list) continue;
      for (let i = 0; i < n; i++) {
        list.push(attributes?.get(layout.name) ?? defaultChannelValue(layout.type));
      }
    }
  }
}

/** Channel values of one element, by channel name. */
export function attributesOf(mesh: Mesh, key: ChannelKey, index: number): Map<string, ChannelValue> {
  const out = new Map<string, ChannelValue>();
  for (const ch of mesh.channels(key)) out.set(ch.name, channelValue(ch, index));
  return out;
}
