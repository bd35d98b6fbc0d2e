/**
 * Zod schemas for tool descriptors.
 *
 * Used when registering descriptors built in code and when reading them
 * from catalog files, so both paths reject the same malformed input.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import { TYPE_TAGS, type JsonValue, type ParameterSpec, type ToolDescriptor } from '../types.js';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

export const ParameterSpecSchema = z
  .object({
    name: z.string().min(1),
    type: z.enum(TYPE_TAGS),
    required: z.boolean(),
    default: JsonValueSchema.optional(),
    description: z.string().optional(),
  })
  .strict();

type ParsedParameter = z.infer<typeof ParameterSpecSchema>;

function checkUniqueParameters(parameters: ParsedParameter[], ctx: z.RefinementCtx): void {
  const seen = new Set<string>();
  parameters.forEach((param, index) => {
    if (seen.has(param.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['parameters', index, 'name'],
        message: `Duplicate parameter name "${param.name}"`,
      });
    }
    seen.add(param.name);
  });
}

const descriptorShape = {
  name: z.string().min(1),
  summary: z.string(),
  parameters: z.array(ParameterSpecSchema),
};

/**
 * Descriptor body as stored in a per-tool catalog file; the category comes
 * from the directory the file lives in.
 */
export const DescriptorBodySchema = z
  .object(descriptorShape)
  .strict()
  .superRefine((descriptor, ctx) => checkUniqueParameters(descriptor.parameters, ctx));

export const ToolDescriptorSchema = z
  .object({ ...descriptorShape, category: z.string().min(1) })
  .strict()
  .superRefine((descriptor, ctx) => checkUniqueParameters(descriptor.parameters, ctx));

export const ToolCatalogSchema = z.array(ToolDescriptorSchema);

function toParameterSpec(param: ParsedParameter): ParameterSpec {
  return {
    name: param.name,
    type: param.type,
    required: param.required,
    ...('default' in param && { default: param.default }),
    ...(param.description !== undefined && { description: param.description }),
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Freeze a freshly parsed descriptor, default values included. Callers pass
 * zod output, which never shares arrays or objects with the raw input.
 */
export function freezeDescriptor(descriptor: ToolDescriptor): ToolDescriptor {
  return deepFreeze({
    ...descriptor,
    parameters: descriptor.parameters.map((param) => ({ ...param })),
  });
}

/**
 * Validate an unknown value as a descriptor and return a deeply frozen copy.
 */
export function parseDescriptor(input: unknown, context?: Record<string, unknown>): ToolDescriptor {
  const result = ToolDescriptorSchema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error, context);
  }
  return freezeDescriptor({
    name: result.data.name,
    summary: result.data.summary,
    category: result.data.category,
    parameters: result.data.parameters.map(toParameterSpec),
  });
}

/**
 * Validate a catalog file body and attach the category it was found under.
 */
export function parseDescriptorBody(
  input: unknown,
  category: string,
  context?: Record<string, unknown>
): ToolDescriptor {
  const result = DescriptorBodySchema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error, context);
  }
  return freezeDescriptor({
    name: result.data.name,
    summary: result.data.summary,
    category,
    parameters: result.data.parameters.map(toParameterSpec),
  });
}
