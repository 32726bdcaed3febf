/**
 * Polygon subdivision. Every n-gon becomes n quads; each iteration adds one
 * vertex per edge and one per face. The result's vertex order is stable:
 * the original vertices, then one vertex per edge (in Mesh.edges() order),
 * then one per face.
 *
 *   linear         new vertices at edge midpoints and face centroids,
 *                   original vertices stay put.
 *   catmull-clark  smoothing rules; boundary edges use their midpoint and
 *                   boundary vertices stay put, so open meshes keep their
 *                   outline.
 */

import { type ChannelValue, mixChannelValues } from './channels.js';
import { GeometryError } from './errors.js';
import { Mesh, MeshBuilder } from './mesh.js';
import { type Vec3, add, centroid, lerp, scale } from './vec3.js';

export type SubdivisionTechnique = 'linear' | 'catmull-clark';

export const SUBDIVISION_TECHNIQUES: readonly SubdivisionTechnique[] = ['linear', 'catmull-clark'];

export const MAX_SUBDIVISION_ITERATIONS = 6;

export function subdivide(mesh: Mesh, iterations: number, technique: SubdivisionTechnique): Mesh {
  if (!Number.isInteger(iterations) || iterations < 0 || iterations > MAX_SUBDIVISION_ITERATIONS) {
    throw new GeometryError(
      `subdivision iterations must be an integer in 0..${MAX_SUBDIVISION_ITERATIONS}, got ${iterations}`
    );
  }
  let current = mesh.clone();
  for (let i = 0; i < iterations; i++) current = subdivideOnce(current, technique === 'catmull-clark');
  return current;
}

interface EdgeInfo {
  a: number;
  b: number;
  faces: number[];
}

function subdivideOnce(mesh: Mesh, smooth: boolean): Mesh {
  const edges: EdgeInfo[] = mesh.edges().map(([a, b]) => ({ a, b, faces: [] }));
  const edgeIndex = new Map<string, number>();
  edges.forEach((e, i) => edgeIndex.set(`${e.a}:${e.b}`, i));
  const edgeOf = (u: number, v: number): number => {
    const i = edgeIndex.get(u < v ? `${u}:${v}` : `${v}:${u}`);
    if (i === undefined) throw new GeometryError(`Edge ${u}-${v} is missing from the edge table`);
    return i;
  };

  const vertexFaces: Set<number>[] = Array.from({ length: mesh.vertexCount }, () => new Set<number>());
  const vertexEdges: number[][] = Array.from({ length: mesh.vertexCount }, () => []);
  mesh.faces.forEach((face, f) => {
    for (let i = 0; i < face.length; i++) {
      edges[edgeOf(face[i], face[(i + 1) % face.length])].faces.push(f);
      vertexFaces[face[i]].add(f);
    }
  });
  edges.forEach((e, i) => {
    vertexEdges[e.a].push(i);
    vertexEdges[e.b].push(i);
  });

  const facePoints = mesh.faces.map((face) => centroid(face.map((v) => mesh.positions[v])));
  const midpoint = (e: EdgeInfo): Vec3 => lerp(mesh.positions[e.a], mesh.positions[e.b], 0.5);
  const isInteriorEdge = (e: EdgeInfo): boolean => e.faces.length === 2;

  const edgePoints = edges.map((e): Vec3 => {
    if (!smooth || !isInteriorEdge(e)) return midpoint(e);
    const sum = add(add(mesh.positions[e.a], mesh.positions[e.b]), add(facePoints[e.faces[0]], facePoints[e.faces[1]]));
    return scale(sum, 0.25);
  });

  const vertexPoints = mesh.positions.map((p, v): Vec3 => {
    const incident = vertexEdges[v];
    if (!smooth || incident.length === 0) return [p[0], p[1], p[2]];
    if (!incident.every((i) => isInteriorEdge(edges[i]))) return [p[0], p[1], p[2]];
    const n = incident.length;
    const q = centroid([...vertexFaces[v]].map((f) => facePoints[f]));
    const r = centroid(incident.map((i) => midpoint(edges[i])));
    return scale(add(add(q, scale(r, 2)), scale(p, n - 3)), 1 / n);
  });

  const builder = new MeshBuilder();
  builder.declareChannelsOf(mesh, ['halfedge']);
  const mixed = (sources: readonly number[]): Map<string, ChannelValue> => {
    const out = new Map<string, ChannelValue>();
    for (const ch of mesh.channels('vertex')) out.set(ch.name, mixChannelValues(ch, sources));
    return out;
  };

  vertexPoints.forEach((p, v) => builder.addVertexFrom(p, mesh, v));
  const edgeBase = builder.vertexCount;
  edges.forEach((e, i) => builder.addVertex(edgePoints[i], mixed([e.a, e.b])));
  const faceBase = builder.vertexCount;
  mesh.faces.forEach((face, f) => builder.addVertex(facePoints[f], mixed(face)));

  mesh.faces.forEach((face, f) => {
    const n = face.length;
    for (let i = 0; i < n; i++) {
      const v = face[i];
      const next = edgeBase + edgeOf(v, face[(i + 1) % n]);
      const prev = edgeBase + edgeOf(face[(i + n - 1) % n], v);
      builder.addFaceFrom([v, next, faceBase + f, prev], mesh, f);
    }
  });
  return builder.build();
}
