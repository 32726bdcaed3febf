/**
 * Mesh bridge: converts the engine's read-only mesh snapshot into Three.js
 * objects a host can add to its scene. Nothing here renders.
 *
 * Polygons are fan-triangulated into a non-indexed BufferGeometry (one
 * position per triangle corner). A vertex "normal" channel, when present,
 * becomes the normal attribute; otherwise flat normals are computed. A
 * vertex "uv" vec2 channel becomes the uv attribute.
 */

import * as THREE from 'three';
import { triangulate, type MeshSnapshot } from '@meshgraph/mesh-kernel';
import { type Palette, type ThemeMode, paletteFor } from './palette.js';

export interface MeshView {
  geometry: THREE.BufferGeometry;
  mesh: THREE.Mesh;
  /** Feature edges (dihedral angle above the threshold). */
  edges: THREE.LineSegments;
  /** Every polygon edge; triangulation diagonals are not drawn. */
  wireframe: THREE.LineSegments;
  triangleCount: number;
  bounds: THREE.Box3;
}

export interface MeshViewError {
  error: string;
}

export type MeshViewResult = MeshView | MeshViewError;

export function isError(r: MeshViewResult): r is MeshViewError {
  return 'error' in r;
}

export interface MeshViewOptions {
  theme?: ThemeMode;
  /** Feature edge threshold in degrees (default 30). */
  edgeAngle?: number;
}

export function snapshotToView(snapshot: MeshSnapshot, options: MeshViewOptions = {}): MeshViewResult {
  const tri = triangulate(snapshot);
  if (tri.triangleCount === 0) {
    return { error: 'Mesh has 0 triangles. Check the output node.' };
  }
  const palette = paletteFor(options.theme ?? 'dark');

  const positions = new Float32Array(tri.indices.length * 3);
  for (let i = 0; i < tri.indices.length; i++) {
    const v = tri.vertices[tri.indices[i]];
    positions[i * 3] = v[0];
    positions[i * 3 + 1] = v[1];
    positions[i * 3 + 2] = v[2];
  }

  const geometry = new THREE.BufferGeometry();
  geometry.setAttribute('position', new THREE.BufferAttribute(positions, 3));

  let hasNormals = false;
  for (const ch of snapshot.channels) {
    if (ch.key !== 'vertex') continue;
    if (ch.type === 'vec3' && ch.name === 'normal') {
      const normals = new Float32Array(positions.length);
      tri.indices.forEach((v, i) => normals.set(ch.values[v], i * 3));
      geometry.setAttribute('normal', new THREE.BufferAttribute(normals, 3));
      hasNormals = true;
    } else if (ch.type === 'vec2' && ch.name === 'uv') {
      const uvs = new Float32Array(tri.indices.length * 2);
      tri.indices.forEach((v, i) => uvs.set(ch.values[v], i * 2));
      geometry.setAttribute('uv', new THREE.BufferAttribute(uvs, 2));
    }
  }
  if (!hasNormals) geometry.computeVertexNormals();
  geometry.computeBoundingBox();
  geometry.computeBoundingSphere();

  const material = new THREE.MeshStandardMaterial({
    color: palette.geometry,
    metalness: 0.3,
    roughness: 0.5,
    side: THREE.DoubleSide,
  });
  const mesh = new THREE.Mesh(geometry, material);

  const edges = new THREE.LineSegments(
    new THREE.EdgesGeometry(geometry, options.edgeAngle ?? 30),
    lineMaterial(palette, palette.edges),
  );
  const wireframe = new THREE.LineSegments(polygonEdges(snapshot), lineMaterial(palette, palette.wireframe));

  const bounds = new THREE.Box3(
    new THREE.Vector3(...snapshot.bounds.min),
    new THREE.Vector3(...snapshot.bounds.max),
  );

  return { geometry, mesh, edges, wireframe, triangleCount: tri.triangleCount, bounds };
}

function lineMaterial(palette: Palette, color: number): THREE.LineBasicMaterial {
  return new THREE.LineBasicMaterial({ color, opacity: palette.lineOpacity, transparent: true });
}

/** One segment per undirected polygon edge. */
function polygonEdges(snapshot: MeshSnapshot): THREE.BufferGeometry {
  const seen = new Set<string>();
  const vertices: number[] = [];
  for (const face of snapshot.faces) {
    for (let i = 0; i < face.length; i++) {
      const a = face[i];
      const b = face[(i + 1) % face.length];
      const key = a < b ? `${a}:${b}` : `${b}:${a}`;
      if (seen.has(key)) continue;
      seen.add(key);
      vertices.push(...snapshot.positions[a], ...snapshot.positions[b]);
    }
  }
  const geometry = new THREE.BufferGeometry();
  geometry.setAttribute('position', new THREE.Float32BufferAttribute(vertices, 3));
  return geometry;
}

/** Release GPU-side resources of a view the host no longer shows. */
export function disposeView(view: MeshView): void {
  for (const object of [view.mesh, view.edges, view.wireframe]) {
    object.geometry.dispose();
    const material = object.material;
    if (Array.isArray(material)) material.forEach((m) => m.dispose());
    else material.dispose();
  }
}
