/**
 * Tool Schema Converter
 *
 * Converts ToolSpec definitions to the JSON Schema object the completion
 * endpoint receives as a tool's input schema.
 */

import type { ToolParameter, ToolSpec } from '../tools/types.js';

/**
 * JSON Schema property definition for one tool parameter.
 */
export interface PropertySchema {
  type: 'string' | 'integer' | 'number' | 'boolean';
  description: string;
  enum?: string[];
  default?: string | number | boolean;
}

/**
 * JSON Schema for a tool's arguments object.
 */
export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, PropertySchema>;
  /** Omitted when empty for provider compatibility */
  required?: string[];
  additionalProperties: false;
}

function mapParameter(param: ToolParameter): PropertySchema {
  const schema: PropertySchema = {
    type: param.type,
    description: param.description,
  };

  if (param.enum && param.enum.length > 0) {
    schema.enum = [...param.enum];
  }

  if (param.default !== undefined) {
    schema.default = param.default;
  }

  return schema;
}

/**
 * Convert a ToolSpec's parameters to a JSON Schema object.
 */
export function toInputSchema(spec: ToolSpec): ToolInputSchema {
  const properties: Record<string, PropertySchema> = {};
  const required: string[] = [];

  for (const [name, param] of Object.entries(spec.parameters)) {
    properties[name] = mapParameter(param);
    if (param.required) {
      required.push(name);
    }
  }

  return {
    type: 'object',
    properties,
    ...(required.length > 0 && { required }),
    additionalProperties: false,
  };
}
