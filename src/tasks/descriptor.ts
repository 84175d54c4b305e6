import * as z from "zod/v4";
import { InvalidTaskError } from "../core/errors.js";
import type { JsonObject, JsonValue } from "../core/json.js";

export const zJsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(zJsonValue), z.record(z.string(), zJsonValue)])
);

export const zTaskName = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z_][A-Za-z0-9_.:-]*$/, "invalid task name");

export const zTaskDescriptor = z.object({
  task: zTaskName,
  args: z.array(zJsonValue).default([]),
  kwargs: z.record(z.string(), zJsonValue).default({}),
  requires: z.array(z.string().min(1)).default([])
});

/**
 * A unit of work by reference: `task` names an entry of the registry module
 * the executor loads on the compute node, and the rest is plain JSON.
 */
export interface TaskDescriptor {
  task: string;
  args: JsonValue[];
  kwargs: JsonObject;
  requires: string[];
}

export type TaskDescriptorInput = z.input<typeof zTaskDescriptor>;

export function parseTaskDescriptor(input: unknown): TaskDescriptor {
  const parsed = zTaskDescriptor.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new InvalidTaskError(`invalid task descriptor: ${detail}`);
  }
  return parsed.data;
}

/** One descriptor per input, each calling `task` with `[input]` and the shared kwargs. */
export function tasksFor(
  task: string,
  inputs: readonly JsonValue[],
  options: { kwargs?: JsonObject; requires?: string[] } = {}
): TaskDescriptor[] {
  return inputs.map((input) =>
    parseTaskDescriptor({ task, args: [input], kwargs: options.kwargs ?? {}, requires: options.requires ?? [] })
  );
}

export type TaskFunction = (input: { args: JsonValue[]; kwargs: JsonObject }) => unknown;

/** Typed helper for the registry module the executor imports (`export const tasks = defineTaskRegistry({...})`). */
export function defineTaskRegistry<T extends Record<string, TaskFunction>>(tasks: T): T {
  for (const name of Object.keys(tasks)) zTaskName.parse(name);
  return tasks;
}
