/**
 * Argument validation against a descriptor's parameter list.
 *
 * Parameters are checked in declaration order and the first failure wins.
 * Unknown argument names are rejected after every declared parameter has
 * passed.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import type { ToolDescriptor, TypeTag } from '../types.js';

const TYPE_SCHEMAS: Record<TypeTag, z.ZodTypeAny> = {
  string: z.string(),
  number: z.number(),
  integer: z.number().int(),
  boolean: z.boolean(),
  array: z.array(z.unknown()),
  object: z.record(z.unknown()),
  any: z.unknown(),
};

export type ArgumentValidationResult =
  | { ok: true; arguments: Record<string, unknown> }
  | { ok: false; error: ValidationError };

/**
 * Check whether a value matches a type tag.
 */
export function matchesType(type: TypeTag, value: unknown): boolean {
  return TYPE_SCHEMAS[type].safeParse(value).success;
}

/**
 * Validate arguments and fill in declared defaults for absent optional
 * parameters. An argument whose value is `undefined` counts as absent.
 */
export function validateArguments(
  descriptor: ToolDescriptor,
  args: Record<string, unknown>
): ArgumentValidationResult {
  // Entries rather than assignment, so a parameter named __proto__ stays an own property
  const normalized: Array<[string, unknown]> = [];

  for (const param of descriptor.parameters) {
    const value = Object.hasOwn(args, param.name) ? args[param.name] : undefined;

    if (value === undefined) {
      if (param.required) {
        return { ok: false, error: ValidationError.missingRequired(param.name) };
      }
      if (param.default !== undefined) {
        normalized.push([param.name, structuredClone(param.default)]);
      }
      continue;
    }

    if (!matchesType(param.type, value)) {
      return { ok: false, error: ValidationError.typeMismatch(param.name, param.type, value) };
    }
    normalized.push([param.name, value]);
  }

  const declared = new Set(descriptor.parameters.map((p) => p.name));
  for (const [name, value] of Object.entries(args)) {
    if (!declared.has(name) && value !== undefined) {
      return { ok: false, error: ValidationError.unknownArgument(name) };
    }
  }

  return { ok: true, arguments: Object.fromEntries(normalized) };
}
