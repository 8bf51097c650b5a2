import { z } from 'zod';
import type { ActionInvocation } from '../types/agent.js';
import { ConfigError, ValidationError } from '../exception/errors.js';
import type { ActionDefinition, ParsedAction, RegisteredAction } from './action-types.js';

/**
 * Bind a handler to its parameter schema. The returned entry parses raw
 * parameters once and hands the handler the typed record.
 */
export function defineAction<S extends z.ZodTypeAny>(definition: ActionDefinition<S>): RegisteredAction {
  const { name, description, schema, handler } = definition;
  return {
    name,
    description,
    signature: `${name}: ${describeParams(schema)}`,
    parse(params: unknown): ParsedAction {
      const parsed = schema.safeParse(params ?? {});
      if (!parsed.success) {
        const issues = parsed.error.issues.map(
          (issue) => `${issue.path.join('.') || '(params)'}: ${issue.message}`,
        );
        throw new ValidationError(`Invalid parameters for action "${name}": ${issues.join('; ')}`, issues);
      }
      const data: z.output<S> = parsed.data;
      return {
        name,
        params: data,
        index: targetIndexOf(data),
        run: (ctx) => handler(data, ctx),
      };
    },
  };
}

/**
 * Table of the actions a run may use. Built before the run starts; the
 * dispatcher only reads it.
 */
export class ActionRegistry {
  private actions = new Map<string, RegisteredAction>();

  /**
   * Register an action. Throws if an action with the same name already exists.
   */
  register(action: RegisteredAction): void {
    if (this.actions.has(action.name)) {
      throw new ConfigError(`Action "${action.name}" is already registered`);
    }
    this.actions.set(action.name, action);
  }

  /** Remove the named actions; unknown names are ignored. */
  exclude(names: readonly string[]): void {
    for (const name of names) {
      this.actions.delete(name);
    }
  }

  get(name: string): RegisteredAction | undefined {
    return this.actions.get(name);
  }

  has(name: string): boolean {
    return this.actions.has(name);
  }

  names(): string[] {
    return Array.from(this.actions.keys());
  }

  list(): RegisteredAction[] {
    return Array.from(this.actions.values());
  }

  /** One line per action for the system prompt. */
  describe(): string {
    return this.list()
      .map((action) => `- ${action.signature} - ${action.description}`)
      .join('\n');
  }

  /**
   * Resolve an invocation to its action and validate the parameters.
   * Unknown names and malformed parameters throw ValidationError.
   */
  parse(invocation: ActionInvocation): ParsedAction {
    const action = this.actions.get(invocation.name);
    if (!action) {
      throw new ValidationError(
        `Unknown action "${invocation.name}". Available actions: ${this.names().join(', ')}`,
        [`${invocation.name}: not a registered action`],
      );
    }
    return action.parse(invocation.params);
  }
}

function targetIndexOf(params: unknown): number | undefined {
  if (params !== null && typeof params === 'object' && 'index' in params && typeof params.index === 'number') {
    return params.index;
  }
  return undefined;
}

/** `{query: string, amount?: number}` */
function describeParams(schema: z.ZodTypeAny): string {
  if (!(schema instanceof z.ZodObject)) {
    return typeLabel(schema);
  }
  const shape: Record<string, z.ZodTypeAny> = schema.shape;
  const fields = Object.entries(shape).map(([key, field]) => {
    const optional = field.isOptional();
    return `${key}${optional ? '?' : ''}: ${typeLabel(field)}`;
  });
  return `{${fields.join(', ')}}`;
}

function typeLabel(schema: z.ZodTypeAny): string {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return typeLabel(schema.unwrap());
  }
  if (schema instanceof z.ZodDefault) {
    return typeLabel(schema.removeDefault());
  }
  if (schema instanceof z.ZodString) return 'string';
  if (schema instanceof z.ZodNumber) return schema.isInt ? 'integer' : 'number';
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodEnum) return schema.options.map((option: string) => JSON.stringify(option)).join(' | ');
  if (schema instanceof z.ZodArray) return `${typeLabel(schema.element)}[]`;
  if (schema instanceof z.ZodObject) return describeParams(schema);
  return 'value';
}
