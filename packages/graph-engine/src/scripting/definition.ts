/**
 * The object a script passes to `defineNode`, as read back from its
 * context. Slots are validated here so a scripted node has the same slot
 * guarantees as a native one.
 */

import { z } from 'zod';
import { defaultLiteral, validateLiteral } from '../slots.js';
import type { InputSlot, OperatorSchema, OutputSlot } from '../types.js';

const finite = z.number().finite();
const slotName = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'slot names are identifiers');
const description = z.string().optional();

const InputSlotSchema = z.discriminatedUnion('type', [
  z.object({
    name: slotName, description, type: z.literal('scalar'),
    default: finite.default(0), min: finite.optional(), max: finite.optional(), integer: z.boolean().optional(),
  }),
  z.object({ name: slotName, description, type: z.literal('vector'), default: z.tuple([finite, finite, finite]).default([0, 0, 0]) }),
  z.object({ name: slotName, description, type: z.literal('string'), default: z.string().default('') }),
  z.object({ name: slotName, description, type: z.literal('enum'), options: z.array(z.string()).min(1), default: z.string().optional() }),
  z.object({ name: slotName, description, type: z.literal('selection'), default: z.string().default('*') }),
  z.object({ name: slotName, description, type: z.literal('mesh') }),
]);

const OutputSlotSchema = z.object({
  name: slotName,
  description,
  type: z.enum(['scalar', 'vector', 'string', 'enum', 'selection', 'mesh']),
});

export const NodeDefinitionSchema = z
  .object({
    name: z.string().min(1).optional(),
    description: z.string().optional(),
    inputs: z.array(InputSlotSchema).default([]),
    outputs: z.array(OutputSlotSchema).min(1, 'a node needs at least one output'),
    runnable: z.literal(true, { errorMap: () => ({ message: 'run must be a function' }) }),
  })
  .superRefine((def, ctx) => {
    const unique = (list: 'inputs' | 'outputs', names: readonly string[]): void => {
      names.forEach((name, i) => {
        if (names.indexOf(name) !== i) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [list, i, 'name'], message: `duplicate slot "${name}"` });
        }
      });
    };
    unique('inputs', def.inputs.map((s) => s.name));
    unique('outputs', def.outputs.map((s) => s.name));
  });

export interface NodeDefinition extends OperatorSchema {
  readonly name: string;
  readonly description?: string;
  readonly inputs: readonly InputSlot[];
  readonly outputs: readonly OutputSlot[];
}

export type DefinitionResult = { ok: true; definition: NodeDefinition } | { ok: false; error: string };

function toInputSlot(slot: z.output<typeof InputSlotSchema>): InputSlot {
  if (slot.type === 'enum') return { ...slot, default: slot.default ?? slot.options[0] };
  return slot;
}

/** Parse and check the raw definition. `fallbackName` names nodes that do not name themselves. */
export function parseDefinition(raw: unknown, fallbackName: string): DefinitionResult {
  const parsed = NodeDefinitionSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      error: parsed.error.issues.map((i) => `${i.path.length > 0 ? `${i.path.join('.')}: ` : ''}${i.message}`).join('; '),
    };
  }
  const inputs = parsed.data.inputs.map(toInputSlot);
  for (const slot of inputs) {
    if (slot.type === 'mesh') continue;
    try {
      validateLiteral(slot, defaultLiteral(slot));
    } catch (err) {
      return { ok: false, error: `default of input "${slot.name}": ${err instanceof Error ? err.message : String(err)}` };
    }
  }
  const definition: NodeDefinition = {
    name: parsed.data.name ?? fallbackName,
    inputs,
    outputs: parsed.data.outputs,
  };
  return { ok: true, definition: parsed.data.description === undefined ? definition : { ...definition, description: parsed.data.description } };
}
