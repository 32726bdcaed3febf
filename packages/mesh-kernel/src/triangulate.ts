/**
 * Fan triangulation for the rendering hand-off. Polygons are assumed convex
 * (every primitive and edit in this kernel keeps them so); concave faces
 * still produce a triangle list, just not a correct cover.
 */

import type { MeshSnapshot, TriangleMesh } from './mesh.js';
import { boundsOf, copy3 } from './vec3.js';

export function triangulate(snapshot: MeshSnapshot): TriangleMesh {
  const vertices = snapshot.positions.map(copy3);
  const indices: number[] = [];
  for (const face of snapshot.faces) {
    for (let i = 1; i + 1 < face.length; i++) {
      indices.push(face[0], face[i], face[i + 1]);
    }
  }
  return {
    vertices,
    indices,
    vertexCount: vertices.length,
    triangleCount: indices.length / 3,
    bounds: boundsOf(vertices),
  };
}
