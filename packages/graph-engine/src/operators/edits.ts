import {
  chamferVertices, compose, computeNormals, extrudeFaces, insetFaces, jitter, merge,
  parseSelection, subdivide, transform, SUBDIVISION_TECHNIQUES, MAX_SUBDIVISION_ITERATIONS,
} from '@meshgraph/mesh-kernel';
import { OperatorError } from '../errors.js';
import type { InputSlot, OutputSlot } from '../types.js';
import { defineOperator, meshValue } from './library.js';

const meshIn = (name = 'mesh'): InputSlot => ({ name, type: 'mesh' });
const meshOut = (): OutputSlot[] => [{ name: 'mesh', type: 'mesh' }];

export const Transform = defineOperator({
  name: 'Transform',
  version: 1,
  category: 'transform',
  description: 'Scale, rotate (degrees, X then Y then Z) and translate. Negative scales mirror and keep faces outward.',
  inputs: [
    meshIn(),
    { name: 'translate', type: 'vector', default: [0, 0, 0] },
    { name: 'rotate', type: 'vector', default: [0, 0, 0], description: 'Euler angles in degrees' },
    { name: 'scale', type: 'vector', default: [1, 1, 1] },
  ],
  outputs: meshOut(),
  evaluate: (i) => ({
    mesh: meshValue(transform(i.mesh('mesh'), compose(i.vector('translate'), i.vector('rotate'), i.vector('scale')))),
  }),
});

export const Merge = defineOperator({
  name: 'Merge',
  version: 1,
  category: 'transform',
  description: 'Disjoint union of two meshes; vertices are not welded.',
  inputs: [meshIn('a'), meshIn('b')],
  outputs: meshOut(),
  evaluate: (i) => ({ mesh: meshValue(merge(i.mesh('a'), i.mesh('b'))) }),
});

export const Extrude = defineOperator({
  name: 'Extrude',
  version: 1,
  category: 'edit',
  description: 'Extrude selected faces as regions along their averaged normals.',
  inputs: [
    meshIn(),
    { name: 'faces', type: 'selection', default: '*' },
    { name: 'amount', type: 'scalar', default: 1 },
  ],
  outputs: meshOut(),
  evaluate: (i) => {
    const mesh = i.mesh('mesh');
    return { mesh: meshValue(extrudeFaces(mesh, parseSelection(i.text('faces'), mesh.faceCount), i.scalar('amount'))) };
  },
});

export const Inset = defineOperator({
  name: 'Inset',
  version: 1,
  category: 'edit',
  description: 'Inset each selected face toward its centroid, joined by a ring of quads.',
  inputs: [
    meshIn(),
    { name: 'faces', type: 'selection', default: '*' },
    { name: 'fraction', type: 'scalar', default: 0.25, min: 0, max: 1 },
  ],
  outputs: meshOut(),
  evaluate: (i) => {
    const mesh = i.mesh('mesh');
    return { mesh: meshValue(insetFaces(mesh, parseSelection(i.text('faces'), mesh.faceCount), i.scalar('fraction'))) };
  },
});

export const Chamfer = defineOperator({
  name: 'Chamfer',
  version: 1,
  category: 'edit',
  description: 'Cut selected interior vertices into cap faces. Boundary vertices are left alone.',
  inputs: [
    meshIn(),
    { name: 'vertices', type: 'selection', default: '*' },
    { name: 'amount', type: 'scalar', default: 0.1, min: 0 },
  ],
  outputs: meshOut(),
  evaluate: (i) => {
    const mesh = i.mesh('mesh');
    return { mesh: meshValue(chamferVertices(mesh, parseSelection(i.text('vertices'), mesh.vertexCount), i.scalar('amount'))) };
  },
});

export const Subdivide = defineOperator({
  name: 'Subdivide',
  version: 1,
  category: 'edit',
  description: 'Split every n-gon into n quads, with optional Catmull-Clark smoothing.',
  inputs: [
    meshIn(),
    { name: 'iterations', type: 'scalar', default: 1, min: 0, max: MAX_SUBDIVISION_ITERATIONS, integer: true },
    { name: 'technique', type: 'enum', default: 'catmull-clark', options: SUBDIVISION_TECHNIQUES },
  ],
  outputs: meshOut(),
  evaluate: (i) => {
    const technique = SUBDIVISION_TECHNIQUES.find((t) => t === i.text('technique'));
    if (!technique) throw new OperatorError(`Unknown subdivision technique "${i.text('technique')}"`);
    return { mesh: meshValue(subdivide(i.mesh('mesh'), i.scalar('iterations'), technique)) };
  },
});

export const ComputeNormals = defineOperator({
  name: 'ComputeNormals',
  version: 1,
  category: 'edit',
  description: 'Write area-weighted vertex normals and face normals into the "normal" channels.',
  inputs: [meshIn()],
  outputs: meshOut(),
  evaluate: (i) => ({ mesh: meshValue(computeNormals(i.mesh('mesh'))) }),
});

export const Jitter = defineOperator({
  name: 'Jitter',
  version: 1,
  category: 'edit',
  description: 'Displace every vertex by a seeded random offset of up to `amount` per axis.',
  inputs: [
    meshIn(),
    { name: 'amount', type: 'scalar', default: 0.05, min: 0 },
    { name: 'seed', type: 'scalar', default: 0, integer: true },
  ],
  outputs: meshOut(),
  evaluate: (i) => ({ mesh: meshValue(jitter(i.mesh('mesh'), i.scalar('amount'), i.scalar('seed'))) }),
});
