import { Type, type Schema } from '@google/genai';
import type { JsonSchemaNode } from './evaluation.schemas';

const TYPE_MAP: Record<JsonSchemaNode['type'], Type> = {
  object: Type.OBJECT,
  array: Type.ARRAY,
  string: Type.STRING,
  number: Type.NUMBER,
};

/** Converts a validation schema into the response schema Gemini accepts. */
export const toGenaiSchema = (node: JsonSchemaNode): Schema => {
  const schema: Schema = { type: TYPE_MAP[node.type] };

  if (node.description) {
    schema.description = node.description;
  }
  if (node.minimum !== undefined) {
    schema.minimum = node.minimum;
  }
  if (node.maximum !== undefined) {
    schema.maximum = node.maximum;
  }
  if (node.items) {
    schema.items = toGenaiSchema(node.items);
  }
  if (node.properties) {
    const properties: Record<string, Schema> = {};
    for (const [key, child] of Object.entries(node.properties)) {
      properties[key] = toGenaiSchema(child);
    }
    schema.properties = properties;
    schema.propertyOrdering = Object.keys(node.properties);
  }
  if (node.required?.length) {
    schema.required = [...node.required];
  }

  return schema;
};
