import { box, circle, cylinder, quad, uvSphere } from '@meshgraph/mesh-kernel';
import { defineOperator, meshValue } from './library.js';
import type { InputSlot, OutputSlot } from '../types.js';

const center = (): InputSlot => ({ name: 'center', type: 'vector', default: [0, 0, 0] });
const meshOut = (): OutputSlot[] => [{ name: 'mesh', type: 'mesh' }];

export const Box = defineOperator({
  name: 'Box',
  version: 1,
  category: 'primitive',
  description: 'Axis-aligned box.',
  inputs: [
    center(),
    { name: 'size', type: 'vector', default: [1, 1, 1], description: 'Edge lengths along X, Y, Z' },
  ],
  outputs: meshOut(),
  evaluate: (i) => ({ mesh: meshValue(box(i.vector('center'), i.vector('size'))) }),
});

export const Quad = defineOperator({
  name: 'Quad',
  version: 1,
  category: 'primitive',
  description: 'Single quad facing `normal`; `right` sets its in-plane orientation.',
  inputs: [
    center(),
    { name: 'normal', type: 'vector', default: [0, 1, 0] },
    { name: 'right', type: 'vector', default: [1, 0, 0] },
    { name: 'width', type: 'scalar', default: 1, min: 0 },
    { name: 'height', type: 'scalar', default: 1, min: 0 },
  ],
  outputs: meshOut(),
  evaluate: (i) => ({
    mesh: meshValue(quad(i.vector('center'), i.vector('normal'), i.vector('right'), [i.scalar('width'), i.scalar('height')])),
  }),
});

export const Circle = defineOperator({
  name: 'Circle',
  version: 1,
  category: 'primitive',
  description: 'Flat n-gon in the XZ plane facing +Y.',
  inputs: [
    center(),
    { name: 'radius', type: 'scalar', default: 1, min: 0 },
    { name: 'segments', type: 'scalar', default: 16, min: 3, max: 1024, integer: true },
  ],
  outputs: meshOut(),
  evaluate: (i) => ({ mesh: meshValue(circle(i.vector('center'), i.scalar('radius'), i.scalar('segments'))) }),
});

export const Cylinder = defineOperator({
  name: 'Cylinder',
  version: 1,
  category: 'primitive',
  description: 'Capped cylinder along Y.',
  inputs: [
    center(),
    { name: 'radius', type: 'scalar', default: 1, min: 0 },
    { name: 'height', type: 'scalar', default: 2, min: 0 },
    { name: 'segments', type: 'scalar', default: 16, min: 3, max: 1024, integer: true },
  ],
  outputs: meshOut(),
  evaluate: (i) => ({
    mesh: meshValue(cylinder(i.vector('center'), i.scalar('radius'), i.scalar('height'), i.scalar('segments'))),
  }),
});

export const Sphere = defineOperator({
  name: 'Sphere',
  version: 1,
  category: 'primitive',
  description: 'Latitude/longitude sphere with triangle fans at the poles.',
  inputs: [
    center(),
    { name: 'radius', type: 'scalar', default: 1, min: 0 },
    { name: 'rings', type: 'scalar', default: 8, min: 2, max: 512, integer: true },
    { name: 'segments', type: 'scalar', default: 16, min: 3, max: 1024, integer: true },
  ],
  outputs: meshOut(),
  evaluate: (i) => ({
    mesh: meshValue(uvSphere(i.vector('center'), i.scalar('radius'), i.scalar('rings'), i.scalar('segments'))),
  }),
});
