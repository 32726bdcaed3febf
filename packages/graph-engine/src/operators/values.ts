import { add, cross, length, normalize, sub } from '@meshgraph/mesh-kernel';
import type { Vec3 } from '@meshgraph/mesh-kernel';
import { OperatorError } from '../errors.js';
import { defineOperator, scalarValue, vectorValue } from './library.js';

export const MakeScalar = defineOperator({
  name: 'MakeScalar',
  version: 1,
  category: 'value',
  description: 'Constant scalar.',
  inputs: [{ name: 'value', type: 'scalar', default: 0 }],
  outputs: [{ name: 'value', type: 'scalar' }],
  evaluate: (i) => ({ value: scalarValue(i.scalar('value')) }),
});

export const MakeVector = defineOperator({
  name: 'MakeVector',
  version: 1,
  category: 'value',
  description: 'Vector from three scalars.',
  inputs: [
    { name: 'x', type: 'scalar', default: 0 },
    { name: 'y', type: 'scalar', default: 0 },
    { name: 'z', type: 'scalar', default: 0 },
  ],
  outputs: [{ name: 'vector', type: 'vector' }],
  evaluate: (i) => ({ vector: vectorValue([i.scalar('x'), i.scalar('y'), i.scalar('z')]) }),
});

const SCALAR_OPS = ['add', 'subtract', 'multiply', 'divide', 'min', 'max', 'power'] as const;

export const ScalarMath = defineOperator({
  name: 'ScalarMath',
  version: 1,
  category: 'value',
  description: 'Binary arithmetic on scalars. Division by zero fails the node.',
  inputs: [
    { name: 'a', type: 'scalar', default: 0 },
    { name: 'b', type: 'scalar', default: 0 },
    { name: 'operation', type: 'enum', default: 'add', options: SCALAR_OPS },
  ],
  outputs: [{ name: 'result', type: 'scalar' }],
  evaluate: (i) => {
    const a = i.scalar('a');
    const b = i.scalar('b');
    const result = scalarOp(i.text('operation'), a, b);
    if (!Number.isFinite(result)) {
      throw new OperatorError(`ScalarMath ${i.text('operation')}(${a}, ${b}) is not a finite number`);
    }
    return { result: scalarValue(result) };
  },
});

function scalarOp(op: string, a: number, b: number): number {
  switch (op) {
    case 'add': return a + b;
    case 'subtract': return a - b;
    case 'multiply': return a * b;
    case 'divide':
      if (b === 0) throw new OperatorError('ScalarMath divide by zero');
      return a / b;
    case 'min': return Math.min(a, b);
    case 'max': return Math.max(a, b);
    case 'power': return a ** b;
    default: throw new OperatorError(`Unknown scalar operation "${op}"`);
  }
}

const VECTOR_OPS = ['add', 'subtract', 'multiply', 'cross', 'normalize'] as const;

export const VectorMath = defineOperator({
  name: 'VectorMath',
  version: 1,
  category: 'value',
  description: 'Vector arithmetic. "multiply" is component-wise; "normalize" ignores b. Also outputs the result length.',
  inputs: [
    { name: 'a', type: 'vector', default: [0, 0, 0] },
    { name: 'b', type: 'vector', default: [0, 0, 0] },
    { name: 'operation', type: 'enum', default: 'add', options: VECTOR_OPS },
  ],
  outputs: [
    { name: 'result', type: 'vector' },
    { name: 'length', type: 'scalar' },
  ],
  evaluate: (i) => {
    const result = vectorOp(i.text('operation'), i.vector('a'), i.vector('b'));
    return { result: vectorValue(result), length: scalarValue(length(result)) };
  },
});

function vectorOp(op: string, a: Vec3, b: Vec3): Vec3 {
  switch (op) {
    case 'add': return add(a, b);
    case 'subtract': return sub(a, b);
    case 'multiply': return [a[0] * b[0], a[1] * b[1], a[2] * b[2]];
    case 'cross': return cross(a, b);
    case 'normalize': return normalize(a);
    default: throw new OperatorError(`Unknown vector operation "${op}"`);
  }
}
