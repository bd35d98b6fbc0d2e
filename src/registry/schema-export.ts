/**
 * Renders a resolved descriptor for the consumers that need one:
 * an LLM tool-calling API (JSON Schema) or a human/code reader (signature).
 */

import type { ParameterSpec, ToolDescriptor, TypeTag } from '../types.js';

export interface JSONSchemaProperty {
  type?: Exclude<TypeTag, 'any'>;
  description?: string;
  default?: unknown;
}

export interface JSONSchema {
  type: 'object';
  properties: Record<string, JSONSchemaProperty>;
  required?: string[];
}

/**
 * Tool description in the shape LLM tool-calling APIs accept.
 */
export interface ToolDescription {
  name: string;
  description: string;
  input_schema: JSONSchema;
}

function toProperty(param: ParameterSpec): JSONSchemaProperty {
  return {
    ...(param.type !== 'any' && { type: param.type }),
    ...(param.description !== undefined && { description: param.description }),
    ...('default' in param && { default: param.default }),
  };
}

export function toToolDescription(descriptor: ToolDescriptor): ToolDescription {
  const properties: Record<string, JSONSchemaProperty> = {};
  const required: string[] = [];

  for (const param of descriptor.parameters) {
    properties[param.name] = toProperty(param);
    if (param.required) {
      required.push(param.name);
    }
  }

  return {
    name: descriptor.name,
    description: descriptor.summary,
    input_schema: {
      type: 'object',
      properties,
      ...(required.length > 0 && { required }),
    },
  };
}

/**
 * One-line signature, e.g. `list_emails(folder?: string = "inbox", limit?: integer = 50)`.
 */
export function formatSignature(descriptor: ToolDescriptor): string {
  const params = descriptor.parameters.map((param) => {
    const optional = param.required ? '' : '?';
    const fallback = 'default' in param ? ` = ${JSON.stringify(param.default)}` : '';
    return `${param.name}${optional}: ${param.type}${fallback}`;
  });
  return `${descriptor.name}(${params.join(', ')})`;
}
