import type { Mesh, Vec3 } from '@meshgraph/mesh-kernel';

/** Stable node handle: a positive integer, unique within a graph, never reused. */
export type NodeId = number;

export type DataType = 'scalar' | 'vector' | 'string' | 'enum' | 'selection' | 'mesh';

export const DATA_TYPES: readonly DataType[] = ['scalar', 'vector', 'string', 'enum', 'selection', 'mesh'];

/** A value flowing along an edge or resolved from a parameter. */
export type Value =
  | { type: 'scalar'; value: number }
  | { type: 'vector'; value: Vec3 }
  | { type: 'string'; value: string }
  | { type: 'enum'; value: string }
  | { type: 'selection'; value: string }
  | { type: 'mesh'; value: Mesh };

/** Parameter literal stored on an unconnected input. Mesh inputs have none. */
export type Literal = number | string | Vec3;

interface SlotBase {
  name: string;
  description?: string;
}

export type InputSlot =
  | (SlotBase & { type: 'scalar'; default: number; min?: number; max?: number; integer?: boolean })
  | (SlotBase & { type: 'vector'; default: Vec3 })
  | (SlotBase & { type: 'string'; default: string })
  | (SlotBase & { type: 'enum'; default: string; options: readonly string[] })
  | (SlotBase & { type: 'selection'; default: string })
  | (SlotBase & { type: 'mesh' });

export interface OutputSlot extends SlotBase {
  type: DataType;
}

/** Ordered input and output slots of an operator. */
export interface OperatorSchema {
  inputs: readonly InputSlot[];
  outputs: readonly OutputSlot[];
}

/** Which implementation backs a node. */
export type OperatorRef =
  | { kind: 'native'; name: string }
  | { kind: 'scripted'; scriptId: string };

export type Outputs = ReadonlyMap<string, Value>;

export function operatorLabel(ref: OperatorRef): string {
  return ref.kind === 'native' ? ref.name : `script:${ref.scriptId}`;
}
