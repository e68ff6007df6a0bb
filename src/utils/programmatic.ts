/**
 * Accessors for the Gateway's programmatic JSON encoding of SBOR values
 *
 * Component outputs come back as a tree of `{ kind, value | fields | elements | entries }`
 * nodes. The helpers here index into that tree and raise a SurgeError with the
 * failing path instead of returning undefined.
 */

import { z } from 'zod';
import { SurgeError } from '../errors.js';

export interface ProgrammaticValue {
  kind: string;
  type_name?: string | null;
  field_name?: string | null;
  value?: string | number | boolean;
  variant_id?: string | number;
  fields?: ProgrammaticValue[];
  elements?: ProgrammaticValue[];
  entries?: ProgrammaticEntry[];
}

export interface ProgrammaticEntry {
  key: ProgrammaticValue;
  value: ProgrammaticValue;
}

export const ProgrammaticValueSchema: z.ZodType<ProgrammaticValue> = z.lazy(() =>
  z.object({
    kind: z.string(),
    type_name: z.string().nullish(),
    field_name: z.string().nullish(),
    value: z.union([z.string(), z.number(), z.boolean()]).optional(),
    variant_id: z.union([z.string(), z.number()]).optional(),
    fields: z.array(ProgrammaticValueSchema).optional(),
    elements: z.array(ProgrammaticValueSchema).optional(),
    entries: z.array(z.object({ key: ProgrammaticValueSchema, value: ProgrammaticValueSchema })).optional(),
  })
);

/**
 * Get the nth field of a tuple or enum
 */
export function field(node: ProgrammaticValue, index: number, path: string): ProgrammaticValue {
  const fields = node.fields;
  if (!fields) {
    throw SurgeError.invalidResponse(path, `expected fields on ${node.kind}`);
  }
  const child = fields[index];
  if (!child) {
    throw SurgeError.invalidResponse(path, `missing field ${index} (has ${fields.length})`);
  }
  return child;
}

/**
 * Get every field of a tuple or enum
 */
export function fieldsOf(node: ProgrammaticValue, path: string): ProgrammaticValue[] {
  if (!node.fields) {
    throw SurgeError.invalidResponse(path, `expected fields on ${node.kind}`);
  }
  return node.fields;
}

/**
 * Get the elements of an array
 */
export function elementsOf(node: ProgrammaticValue, path: string): ProgrammaticValue[] {
  if (!node.elements) {
    throw SurgeError.invalidResponse(path, `expected elements on ${node.kind}`);
  }
  return node.elements;
}

/**
 * Get the entries of a map
 */
export function entriesOf(node: ProgrammaticValue, path: string): ProgrammaticEntry[] {
  if (!node.entries) {
    throw SurgeError.invalidResponse(path, `expected entries on ${node.kind}`);
  }
  return node.entries;
}

/**
 * Read a scalar as a string
 */
export function stringValue(node: ProgrammaticValue, path: string): string {
  if (node.value === undefined) {
    throw SurgeError.invalidResponse(path, `expected a value on ${node.kind}`);
  }
  return String(node.value);
}

/**
 * Read a scalar, unwrapping single-field enums such as request references
 */
export function scalarValue(node: ProgrammaticValue, path: string): string {
  if (node.value !== undefined) {
    return String(node.value);
  }
  const inner = node.fields?.[0];
  if (inner) {
    return scalarValue(inner, path);
  }
  throw SurgeError.invalidResponse(path, `expected a scalar on ${node.kind}`);
}

/**
 * Read a decimal or integer scalar as a number
 */
export function numberValue(node: ProgrammaticValue, path: string): number {
  const raw = stringValue(node, path);
  const parsed = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(parsed)) {
    throw SurgeError.invalidResponse(path, `expected a number, got "${raw}"`);
  }
  return parsed;
}

/**
 * Read a bool scalar
 */
export function boolValue(node: ProgrammaticValue, path: string): boolean {
  if (node.value === true || node.value === 'true') return true;
  if (node.value === false || node.value === 'false') return false;
  throw SurgeError.invalidResponse(path, `expected a bool, got ${String(node.value)}`);
}

/**
 * Read the discriminator of an enum
 */
export function variantId(node: ProgrammaticValue, path: string): number {
  const parsed = Number(node.variant_id);
  if (node.variant_id === undefined || !Number.isInteger(parsed)) {
    throw SurgeError.invalidResponse(path, `expected an enum variant on ${node.kind}`);
  }
  return parsed;
}
