// Public API
export { Mesh, MeshBuilder, attributesOf } from './mesh.js';
export type { Face, MeshSnapshot, TriangleMesh } from './mesh.js';
export type { Vec2, Vec3, Vec4, ReadonlyVec3, BoundingBox } from './vec3.js';
export { vec3, add, sub, scale, lerp, dot, cross, length, normalize, centroid, boundsOf } from './vec3.js';
export { GeometryError } from './errors.js';

// Attribute channels
export type { Channel, ChannelKey, ChannelType, ChannelValue } from './channels.js';
export {
  CHANNEL_KEYS, CHANNEL_TYPES, MeshChannels,
  makeChannel, filledChannel, defaultChannelValue, isChannelValue, channelId,
} from './channels.js';

// Matrices
export type { Mat4 } from './matrix.js';
export { identity, translation, scaling, rotationX, rotationY, rotationZ, multiply, compose, determinant3 } from './matrix.js';

// Primitives
export { box, quad, circle, cylinder, uvSphere } from './primitives.js';

// Whole-mesh operations
export { merge, transform, jitter } from './ops.js';

// Topological edits
export { extrudeFaces, insetFaces, chamferVertices } from './edit-ops.js';
export { subdivide, SUBDIVISION_TECHNIQUES, MAX_SUBDIVISION_ITERATIONS } from './subdivide.js';
export type { SubdivisionTechnique } from './subdivide.js';

// Derived data
export { computeNormals, faceNormal, faceArea, newellNormal } from './normals.js';
export { buildHalfEdges, isInteriorVertex } from './halfedge.js';
export type { HalfEdge, HalfEdgeTable } from './halfedge.js';
export { parseSelection, checkSelection, isSelectionExpression } from './selection.js';
export { triangulate } from './triangulate.js';
export { mulberry32 } from './random.js';
