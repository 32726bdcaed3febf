/**
 * Native operator contract and registry.
 *
 * An operator is a named, versioned, pure function from typed inputs to
 * typed outputs. Bump `version` whenever an operator's results change for
 * the same inputs: the version is part of every node fingerprint, so old
 * cache entries stop matching.
 */

import type { Mesh, Vec3 } from '@meshgraph/mesh-kernel';
import { EngineError, OperatorError, UnknownOperatorError } from '../errors.js';
import type { InputSlot, OperatorSchema, OutputSlot, Value } from '../types.js';

export type OperatorCategory = 'primitive' | 'transform' | 'edit' | 'value';

export interface NativeOperator extends OperatorSchema {
  readonly name: string;
  readonly version: number;
  readonly description: string;
  readonly category: OperatorCategory;
  readonly inputs: readonly InputSlot[];
  readonly outputs: readonly OutputSlot[];
  evaluate(inputs: OperatorInputs): Record<string, Value>;
}

export function defineOperator(op: NativeOperator): NativeOperator {
  return op;
}

/** Typed access to resolved input values. A wrong type is an OperatorError. */
export class OperatorInputs {
  constructor(private readonly values: ReadonlyMap<string, Value>) {}

  scalar(name: string): number {
    const v = this.get(name);
    if (v.type !== 'scalar') throw this.mismatch(name, 'scalar', v);
    return v.value;
  }

  vector(name: string): Vec3 {
    const v = this.get(name);
    if (v.type !== 'vector') throw this.mismatch(name, 'vector', v);
    return [v.value[0], v.value[1], v.value[2]];
  }

  /** string, enum and selection inputs. */
  text(name: string): string {
    const v = this.get(name);
    if (v.type !== 'string' && v.type !== 'enum' && v.type !== 'selection') throw this.mismatch(name, 'text', v);
    return v.value;
  }

  mesh(name: string): Mesh {
    const v = this.get(name);
    if (v.type !== 'mesh') throw this.mismatch(name, 'mesh', v);
    return v.value;
  }

  private get(name: string): Value {
    const v = this.values.get(name);
    if (!v) throw new OperatorError(`Input "${name}" was not resolved`);
    return v;
  }

  private mismatch(name: string, expected: string, got: Value): OperatorError {
    return new OperatorError(`Input "${name}" should be ${expected}, got ${got.type}`);
  }
}

export const meshValue = (value: Mesh): Value => ({ type: 'mesh', value });
export const scalarValue = (value: number): Value => ({ type: 'scalar', value });
export const vectorValue = (value: Vec3): Value => ({ type: 'vector', value });

export class OperatorLibrary {
  private readonly operators = new Map<string, NativeOperator>();

  constructor(operators: Iterable<NativeOperator> = []) {
    for (const op of operators) this.register(op);
  }

  register(op: NativeOperator): void {
    if (this.operators.has(op.name)) {
      throw new EngineError('duplicate-operator', `Operator "${op.name}" is already registered`);
    }
    this.operators.set(op.name, op);
  }

  has(name: string): boolean {
    return this.operators.has(name);
  }

  /** Look up an operator or throw UnknownOperatorError. */
  get(name: string): NativeOperator {
    const op = this.operators.get(name);
    if (!op) throw new UnknownOperatorError(name);
    return op;
  }

  list(): NativeOperator[] {
    return [...this.operators.values()];
  }
}
