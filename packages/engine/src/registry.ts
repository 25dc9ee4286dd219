/**
 * Operation Registry
 *
 * Name -> (operation, parameter schema). Populated at startup and extensible at
 * runtime; the engine only ever talks to operations through this table.
 */

import { z } from 'zod';
import {
  DuplicateOperationError,
  ParameterValidationError,
  UnknownOperationError,
  describeParameters,
  type Dataset,
  type Operation,
  type OperationDefinition,
  type OperationDescriptor,
  type ParameterIssue,
  type ParameterSchema,
  type ParamsOf,
} from '@tabflow/core';
import { ValidationError } from '@tabflow/utils';

export interface RegisterOptions {
  /** Replace an existing registration instead of failing */
  override?: boolean;
  /** Listing text; falls back to the operation's own description */
  description?: string;
}

/**
 * An operation with its parameters validated, ready to run
 */
export interface BoundOperation {
  readonly name: string;
  readonly params: Readonly<Record<string, unknown>>;
  /** Result is unchecked: callers must verify it is a Dataset */
  apply(dataset: Dataset): unknown;
}

export interface RegisteredOperation {
  readonly name: string;
  readonly description: string;
  readonly schema: ParameterSchema;
  /**
   * Validate raw parameters against the schema. Unknown keys are rejected and
   * defaults are filled in.
   *
   * @throws ParameterValidationError
   */
  bind(params: Readonly<Record<string, unknown>>): BoundOperation;
}

function toIssues(error: z.ZodError): ParameterIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

export class OperationRegistry {
  private operations: Map<string, RegisteredOperation> = new Map();

  /**
   * Register an operation under a name
   *
   * @throws DuplicateOperationError if the name is taken and `override` is not set
   */
  register<TSchema extends ParameterSchema>(
    name: string,
    operation: Operation<ParamsOf<TSchema>>,
    schema: TSchema,
    options: RegisterOptions = {}
  ): this {
    if (typeof name !== 'string' || name.trim().length === 0) {
      throw new ValidationError('Operation name must be a non-empty string', { name });
    }
    if (typeof operation?.apply !== 'function') {
      throw new ValidationError('Operation must have an apply function', { operation: name });
    }
    if (!(schema instanceof z.ZodObject)) {
      throw new ValidationError('Operation must have a Zod object schema', { operation: name });
    }
    if (this.operations.has(name) && !options.override) {
      throw new DuplicateOperationError(name);
    }

    const validator: z.ZodTypeAny = schema.strict();

    this.operations.set(name, {
      name,
      description: options.description ?? operation.description ?? '',
      schema,
      bind: (raw) => {
        const parsed = validator.safeParse(raw);
        if (!parsed.success) {
          throw new ParameterValidationError(name, toIssues(parsed.error));
        }
        const params: ParamsOf<TSchema> = parsed.data;
        return {
          name,
          params: parsed.data,
          apply: (dataset) => operation.apply(dataset, params),
        };
      },
    });
    return this;
  }

  /**
   * Register a self-describing operation under its own name
   */
  registerDefinition<TSchema extends ParameterSchema>(
    definition: OperationDefinition<TSchema>,
    options: Omit<RegisterOptions, 'description'> = {}
  ): this {
    return this.register(definition.name, definition, definition.schema, {
      ...options,
      description: definition.description,
    });
  }

  /**
   * @throws UnknownOperationError listing the registered names
   */
  resolve(name: string): RegisteredOperation {
    const entry = this.operations.get(name);
    if (!entry) {
      throw new UnknownOperationError(name, this.listNames());
    }
    return entry;
  }

  has(name: string): boolean {
    return this.operations.has(name);
  }

  unregister(name: string): boolean {
    return this.operations.delete(name);
  }

  /**
   * Registered names, sorted
   */
  listNames(): string[] {
    return [...this.operations.keys()].sort();
  }

  describe(name: string): OperationDescriptor {
    const entry = this.resolve(name);
    return {
      name: entry.name,
      description: entry.description,
      parameters: describeParameters(entry.schema),
    };
  }

  describeAll(): OperationDescriptor[] {
    return this.listNames().map((name) => this.describe(name));
  }
}
