/**
 * Output contracts
 *
 * A contract is a named, closed set of typed fields. Each field carries a
 * semantic description (zod `.describe()`), which is rendered into the
 * instructions sent to the generation service; the same schema validates the
 * service's output.
 */

import { z } from "zod";

export interface OutputContract<T extends z.AnyZodObject = z.AnyZodObject> {
  readonly name: string;
  readonly description?: string;
  readonly schema: T;
}

export class ContractDefinitionError extends Error {
  readonly name = "ContractDefinitionError";
}

/**
 * Declare an output contract. Contracts must have at least one field.
 */
export function defineContract<T extends z.AnyZodObject>(
  name: string,
  schema: T,
  description?: string,
): OutputContract<T> {
  if (!name.trim()) {
    throw new ContractDefinitionError("contract name must not be empty");
  }
  if (contractFieldNames(schema).length === 0) {
    throw new ContractDefinitionError(`contract "${name}" declares no fields`);
  }
  return Object.freeze({ name, description, schema });
}

export function contractFieldNames(schema: z.AnyZodObject): string[] {
  const shape: z.ZodRawShape = schema.shape;
  return Object.keys(shape);
}

/**
 * Human-readable type of a schema node, e.g. `string[]` or `"new_event" | "other"`.
 */
export function describeType(type: z.ZodTypeAny): string {
  if (type instanceof z.ZodOptional) {
    return `${describeType(type.unwrap())} (optional)`;
  }
  if (type instanceof z.ZodNullable) {
    return `${describeType(type.unwrap())} | null`;
  }
  if (type instanceof z.ZodDefault) {
    return describeType(type.removeDefault());
  }
  if (type instanceof z.ZodString) return "string";
  if (type instanceof z.ZodNumber) return "number";
  if (type instanceof z.ZodBoolean) return "boolean";
  if (type instanceof z.ZodEnum) {
    const options: readonly string[] = type.options;
    return options.map((o) => JSON.stringify(o)).join(" | ");
  }
  if (type instanceof z.ZodLiteral) {
    return JSON.stringify(type.value);
  }
  if (type instanceof z.ZodArray) {
    return `${describeType(type.element)}[]`;
  }
  if (type instanceof z.ZodObject) {
    const shape: z.ZodRawShape = type.shape;
    const fields = Object.entries(shape).map(([key, child]) => `${key}: ${describeType(child)}`);
    return `{ ${fields.join("; ")} }`;
  }
  return "any JSON value";
}

function describeField(type: z.ZodTypeAny): string | undefined {
  if (type.description) return type.description;
  if (type instanceof z.ZodOptional || type instanceof z.ZodNullable) {
    return describeField(type.unwrap());
  }
  if (type instanceof z.ZodDefault) {
    return describeField(type.removeDefault());
  }
  return undefined;
}

/**
 * Render the output instructions for a contract.
 *
 * @example
 * Respond with a single JSON object ("event_extraction") with exactly these fields:
 * - description (string): Raw description of the event
 * - is_calendar_event (boolean): Whether this text describes a calendar event
 */
export function renderContractInstructions(contract: OutputContract): string {
  const shape: z.ZodRawShape = contract.schema.shape;
  const lines = Object.entries(shape).map(([key, type]) => {
    const description = describeField(type);
    return description
      ? `- ${key} (${describeType(type)}): ${description}`
      : `- ${key} (${describeType(type)})`;
  });

  return [
    `Respond with a single JSON object ("${contract.name}") with exactly these fields:`,
    ...lines,
    ...(contract.description ? [`Purpose: ${contract.description}`] : []),
    "Return ONLY the JSON object, with no prose and no markdown fences.",
  ].join("\n");
}
