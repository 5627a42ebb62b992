import { z } from 'zod';
import { InvalidArgumentError } from '../common/errors';
import { ConfigData } from './FileConfigStore';

const fieldTypeSchema = z.enum(['string', 'integer', 'number', 'boolean', 'array', 'object']);

const propertySchema = z.object({
  type: fieldTypeSchema.optional(),
  description: z.string().optional()
}).passthrough();

const schemaDefinitionSchema = z.object({
  /** Keys that must be present */
  required: z.array(z.string().min(1)).optional(),
  /** Expected type per key; keys not listed are not checked */
  properties: z.record(propertySchema).optional()
}).passthrough();

export type SchemaFieldType = z.infer<typeof fieldTypeSchema>;

/**
 * Minimal JSON-Schema-like description of a configuration document
 */
export type ConfigSchemaDefinition = z.infer<typeof schemaDefinitionSchema>;

export type SchemaValidationResult =
  | { valid: true }
  | { valid: false; errors: string[] };

export function parseSchemaDefinition(value: unknown): ConfigSchemaDefinition {
  const result = schemaDefinitionSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`Invalid configuration schema: ${formatIssues(result.error)[0]}`);
  }
  return result.data;
}

/**
 * Turn a schema definition into a zod validator. Unlisted keys pass through.
 */
export function compileSchema(definition: ConfigSchemaDefinition): z.ZodTypeAny {
  const required = new Set(definition.required ?? []);
  // Field names are caller-supplied; a Map keeps them off the prototype chain
  const shape = new Map<string, z.ZodTypeAny>();

  for (const [field, property] of Object.entries(definition.properties ?? {})) {
    const base = property.type ? schemaForType(property.type) : presentValue();
    shape.set(field, required.has(field) ? base : base.optional());
  }
  for (const field of required) {
    if (!shape.has(field)) {
      shape.set(field, presentValue());
    }
  }

  return z.object(Object.fromEntries(shape)).passthrough();
}

export function validateConfigData(data: ConfigData, definition: ConfigSchemaDefinition): SchemaValidationResult {
  const result = compileSchema(definition).safeParse(data);
  return result.success ? { valid: true } : { valid: false, errors: formatIssues(result.error) };
}

function schemaForType(type: SchemaFieldType): z.ZodTypeAny {
  switch (type) {
    case 'string':
      return z.string();
    case 'integer':
      return z.number().int();
    case 'number':
      return z.number();
    case 'boolean':
      return z.boolean();
    case 'array':
      return z.array(z.unknown());
    case 'object':
      return z.record(z.unknown());
  }
}

function presentValue(): z.ZodTypeAny {
  return z.unknown().refine(value => value !== undefined, { message: 'Required' });
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
}
