/**
 * Topological edits: extrude, inset, chamfer.
 *
 * All three keep face winding consistent with the input, copy vertex
 * channels from the vertex each new vertex came from, copy face channels
 * from the face each new face came from, and drop halfedge channels (the
 * corners they described no longer exist).
 */

import { GeometryError } from './errors.js';
import { buildHalfEdges, isInteriorVertex } from './halfedge.js';
import { Mesh, MeshBuilder } from './mesh.js';
import { newellNormal } from './normals.js';
import { checkSelection } from './selection.js';
import { type Vec3, add, centroid, length, lerp, normalize, scale, sub } from './vec3.js';

function requireFinite(what: string, value: number): void {
  if (!Number.isFinite(value)) throw new GeometryError(`${what} must be a finite number, got ${value}`);
}

function startFrom(mesh: Mesh): MeshBuilder {
  const builder = new MeshBuilder();
  builder.declareChannelsOf(mesh, ['halfedge']);
  return builder;
}

/**
 * Region extrusion. Connected selected faces move together along the
 * average of their normals at each vertex; side quads are created only on
 * the boundary of the selected region.
 *
 * Vertices that are used only by selected faces and lie inside the region
 * are moved in place; the others are duplicated, so the original mesh keeps
 * its shape around the region.
 *
 * Degenerate policy: amount 0 is allowed and yields zero-area side quads.
 * A vertex whose selected faces are all zero-area does not move.
 */
export function extrudeFaces(mesh: Mesh, faces: readonly number[], amount: number): Mesh {
  requireFinite('extrude amount', amount);
  const selected = new Set(checkSelection(faces, mesh.faceCount, 'extrude face'));
  if (selected.size === 0) return mesh.clone();

  const table = buildHalfEdges(mesh);
  const isBoundary = (h: number): boolean => {
    const twin = table.halfedges[h].twin;
    return twin === null || !selected.has(table.halfedges[twin].face);
  };

  const direction = new Map<number, Vec3>();
  for (const f of selected) {
    const n = newellNormal(mesh.positions, mesh.faces[f]);
    for (const v of mesh.faces[f]) direction.set(v, add(direction.get(v) ?? [0, 0, 0], n));
  }

  const split = new Set<number>();
  mesh.faces.forEach((face, f) => {
    if (!selected.has(f)) for (const v of face) if (direction.has(v)) split.add(v);
  });
  for (const f of selected) {
    const start = table.faceStart[f];
    for (let c = 0; c < mesh.faces[f].length; c++) {
      if (isBoundary(start + c)) split.add(table.halfedges[start + c].from);
    }
  }

  const builder = startFrom(mesh);
  for (let v = 0; v < mesh.vertexCount; v++) builder.addVertexFrom(mesh.positions[v], mesh, v);

  const moved = new Map<number, number>();
  for (const [v, sum] of direction) {
    const target = add(mesh.positions[v], scale(normalize(sum), amount));
    if (split.has(v)) {
      moved.set(v, builder.addVertexFrom(target, mesh, v));
    } else {
      builder.setPosition(v, target);
      moved.set(v, v);
    }
  }
  const lifted = (v: number): number => moved.get(v) ?? v;

  mesh.faces.forEach((face, f) => {
    builder.addFaceFrom(selected.has(f) ? face.map(lifted) : face, mesh, f);
  });
  for (const f of selected) {
    const start = table.faceStart[f];
    for (let c = 0; c < mesh.faces[f].length; c++) {
      if (!isBoundary(start + c)) continue;
      const { from: a, to: b } = table.halfedges[start + c];
      builder.addFaceFrom([a, b, lifted(b), lifted(a)], mesh, f);
    }
  }
  return builder.build();
}

/**
 * Per-face inset. Each selected face is replaced, at the same face index,
 * by a smaller copy whose corners move `fraction` of the way toward the
 * face centroid, and a ring of quads is appended to join the two.
 */
export function insetFaces(mesh: Mesh, faces: readonly number[], fraction: number): Mesh {
  if (!(fraction > 0 && fraction < 1)) {
    throw new GeometryError(`inset fraction must be strictly between 0 and 1, got ${fraction}`);
  }
  const selected = new Set(checkSelection(faces, mesh.faceCount, 'inset face'));
  if (selected.size === 0) return mesh.clone();

  const builder = startFrom(mesh);
  for (let v = 0; v < mesh.vertexCount; v++) builder.addVertexFrom(mesh.positions[v], mesh, v);

  const rings: { outer: readonly number[]; inner: number[]; face: number }[] = [];
  mesh.faces.forEach((face, f) => {
    if (!selected.has(f)) {
      builder.addFaceFrom(face, mesh, f);
      return;
    }
    const c = centroid(face.map((v) => mesh.positions[v]));
    const inner = face.map((v) => builder.addVertexFrom(lerp(mesh.positions[v], c, fraction), mesh, v));
    builder.addFaceFrom(inner, mesh, f);
    rings.push({ outer: face, inner, face: f });
  });

  for (const { outer, inner, face } of rings) {
    for (let i = 0; i < outer.length; i++) {
      const j = (i + 1) % outer.length;
      builder.addFaceFrom([outer[i], outer[j], inner[j], inner[i]], mesh, face);
    }
  }
  return builder.build();
}

/**
 * Cut each selected vertex off with a cap face. Every edge leaving the
 * vertex gets a new point `amount` away from it (at most half the edge, so
 * neighbouring cuts never cross); faces around the vertex pick up the two
 * new points in its place, and the cap joins all of them.
 *
 * Degenerate policy: boundary vertices and vertices without faces are
 * skipped. A zero-length edge yields a point on the vertex itself.
 */
export function chamferVertices(mesh: Mesh, vertices: readonly number[], amount: number): Mesh {
  if (!(amount > 0) || !Number.isFinite(amount)) {
    throw new GeometryError(`chamfer amount must be a positive number, got ${amount}`);
  }
  const table = buildHalfEdges(mesh);
  const targets = checkSelection(vertices, mesh.vertexCount, 'chamfer vertex')
    .filter((v) => isInteriorVertex(table, v));
  if (targets.length === 0) return mesh.clone();
  const cut = new Set(targets);

  const builder = startFrom(mesh);
  const remap: number[] = [];
  for (let v = 0; v < mesh.vertexCount; v++) {
    remap.push(cut.has(v) ? -1 : builder.addVertexFrom(mesh.positions[v], mesh, v));
  }

  const points = new Map<string, number>();
  const pointOn = (v: number, w: number): number => {
    const key = `${v}:${w}`;
    const existing = points.get(key);
    if (existing !== undefined) return existing;
    const p = mesh.positions[v];
    const d = sub(mesh.positions[w], p);
    const len = length(d);
    const at = len > 0 ? add(p, scale(d, Math.min(amount, len / 2) / len)) : p;
    const index = builder.addVertexFrom(at, mesh, v);
    points.set(key, index);
    return index;
  };

  mesh.faces.forEach((face, f) => {
    const n = face.length;
    const out: number[] = [];
    for (let i = 0; i < n; i++) {
      const v = face[i];
      if (cut.has(v)) {
        out.push(pointOn(v, face[(i + n - 1) % n]), pointOn(v, face[(i + 1) % n]));
      } else {
        out.push(remap[v]);
      }
    }
    builder.addFaceFrom(out, mesh, f);
  });

  for (const v of targets) {
    // Each face around v contributes the edge next-point → prev-point; the
    // edges chain into one loop that winds opposite to the faces around it.
    const link = new Map<number, number>();
    let owner = -1;
    for (const h of table.outgoing[v]) {
      const he = table.halfedges[h];
      const prev = table.halfedges[he.prev].from;
      link.set(pointOn(v, he.to), pointOn(v, prev));
      if (owner < 0) owner = he.face;
    }
    const first = pointOn(v, table.halfedges[table.outgoing[v][0]].to);
    const cap: number[] = [first];
    for (let next = link.get(first); next !== undefined && next !== first; next = link.get(next)) {
      cap.push(next);
      if (cap.length > link.size) throw new GeometryError(`Vertex ${v} has a non-manifold fan; cannot chamfer`);
    }
    if (cap.length !== link.size) {
      throw new GeometryError(`Vertex ${v} has a non-manifold fan; cannot chamfer`);
    }
    builder.addFaceFrom(cap, mesh, owner);
  }
  return builder.build();
}
