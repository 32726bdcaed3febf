/**
 * Half-edge connectivity derived from an indexed mesh.
 *
 * Halfedge h runs from face corner c to corner c+1 of its face. Halfedges are
 * numbered in face order, so halfedge index == corner index and halfedge
 * channels line up with this table. `twin` is the opposite halfedge of the
 * neighbouring face, or null on a boundary. When more than one halfedge
 * claims the same directed edge (inconsistent winding or non-manifold input)
 * only the first one keeps a twin; the rest are treated as boundary.
 */

import type { Mesh } from './mesh.js';

export interface HalfEdge {
  from: number;
  to: number;
  face: number;
  next: number;
  prev: number;
  twin: number | null;
}

export interface HalfEdgeTable {
  halfedges: HalfEdge[];
  /** First halfedge of each face. */
  faceStart: number[];
  /** Outgoing halfedges per vertex. */
  outgoing: number[][];
}

export function buildHalfEdges(mesh: Mesh): HalfEdgeTable {
  const halfedges: HalfEdge[] = [];
  const faceStart: number[] = [];
  const outgoing: number[][] = Array.from({ length: mesh.vertexCount }, () => []);
  const byDirected = new Map<string, number>();

  mesh.faces.forEach((face, f) => {
    const start = halfedges.length;
    faceStart.push(start);
    const n = face.length;
    for (let c = 0; c < n; c++) {
      const h = start + c;
      const from = face[c], to = face[(c + 1) % n];
      halfedges.push({
        from,
        to,
        face: f,
        next: start + ((c + 1) % n),
        prev: start + ((c + n - 1) % n),
        twin: null,
      });
      outgoing[from].push(h);
      const key = `${from}:${to}`;
      if (!byDirected.has(key)) byDirected.set(key, h);
    }
  });

  for (const [key, h] of byDirected) {
    const [from, to] = key.split(':');
    const opposite = byDirected.get(`${to}:${from}`);
    if (opposite !== undefined) halfedges[h].twin = opposite;
  }

  return { halfedges, faceStart, outgoing };
}

/** True when every edge around vertex v has a neighbour on both sides. */
export function isInteriorVertex(table: HalfEdgeTable, v: number): boolean {
  const out = table.outgoing[v];
  if (out.length === 0) return false;
  for (const h of out) {
    const he = table.halfedges[h];
    if (he.twin === null) return false;
    if (table.halfedges[he.prev].twin === null) return false;
  }
  return true;
}
