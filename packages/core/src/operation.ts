/**
 * Operation Contract
 *
 * An operation is a named, stateless transformation from one Dataset (plus a
 * validated parameter set) to another. Parameter schemas are zod objects: the
 * declaration order of their keys is the parameter order, `.default()` gives a
 * parameter its default, `.optional()` makes it optional.
 */

import { z } from 'zod';
import { DatasetSchema, type Dataset } from './dataset.js';

export type ParameterSchema = z.AnyZodObject;

export type ParamsOf<TSchema extends ParameterSchema> = z.output<TSchema>;

export interface Operation<TParams = Record<string, unknown>> {
  readonly description?: string;
  apply(dataset: Dataset, params: TParams): Dataset;
}

/**
 * An operation bundled with its name and parameter schema, ready to register
 */
export interface OperationDefinition<TSchema extends ParameterSchema = ParameterSchema>
  extends Operation<ParamsOf<TSchema>> {
  readonly name: string;
  readonly description: string;
  readonly schema: TSchema;
}

export function defineOperation<TSchema extends ParameterSchema>(
  definition: OperationDefinition<TSchema>
): OperationDefinition<TSchema> {
  return definition;
}

export interface ParameterDescriptor {
  name: string;
  type: string;
  required: boolean;
  default?: unknown;
  description?: string;
}

export interface OperationDescriptor {
  name: string;
  description: string;
  parameters: ParameterDescriptor[];
}

/**
 * Human-readable type of a zod schema, for listings and help output
 */
export function describeType(schema: z.ZodTypeAny): string {
  if (schema === DatasetSchema) return 'Dataset';
  if (schema instanceof z.ZodString) return 'string';
  if (schema instanceof z.ZodNumber) return schema.isInt ? 'integer' : 'number';
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodNull) return 'null';
  if (schema instanceof z.ZodLiteral) return JSON.stringify(schema.value);
  if (schema instanceof z.ZodEnum) {
    return schema.options.map((option: string) => JSON.stringify(option)).join(' | ');
  }
  if (schema instanceof z.ZodArray) {
    const element = describeType(schema.element);
    return element.includes(' ') ? `Array<${element}>` : `${element}[]`;
  }
  if (schema instanceof z.ZodTuple) {
    return `[${schema.items.map((item: z.ZodTypeAny) => describeType(item)).join(', ')}]`;
  }
  if (schema instanceof z.ZodRecord) {
    return `Record<string, ${describeType(schema.valueSchema)}>`;
  }
  if (schema instanceof z.ZodUnion) {
    return schema.options.map((option: z.ZodTypeAny) => describeType(option)).join(' | ');
  }
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    const inner = describeType(schema.unwrap());
    return schema instanceof z.ZodNullable ? `${inner} | null` : inner;
  }
  if (schema instanceof z.ZodDefault) return describeType(schema.removeDefault());
  if (schema instanceof z.ZodEffects) return describeType(schema.innerType());
  if (schema instanceof z.ZodObject) return 'object';
  return 'unknown';
}

/**
 * Ordered parameter list of a schema
 */
export function describeParameters(schema: ParameterSchema): ParameterDescriptor[] {
  return Object.entries(schema.shape).flatMap(([name, field]): ParameterDescriptor[] => {
    if (!(field instanceof z.ZodType)) return [];
    const descriptor: ParameterDescriptor = {
      name,
      type: describeType(field),
      required: !field.isOptional(),
    };
    if (field instanceof z.ZodDefault) {
      descriptor.default = field._def.defaultValue();
    }
    if (field.description) {
      descriptor.description = field.description;
    }
    return [descriptor];
  });
}
