import { z } from "zod";
import type { SetStateRequest } from "../types";
import { RequestValidationError } from "./errors";

export const ListInstancesQuerySchema = z.object({
  project_id: z.string().min(1),
});

export const SetStatePayloadSchema = z.object({
  project_id: z.string().min(1),
  zones: z.array(z.string()),
  instances_names: z.array(z.string()),
});

function parse<T>(schema: z.ZodType<T>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new RequestValidationError(
      result.error.issues.map((issue) => ({
        path: issue.path.join(".") || "(root)",
        message: issue.message,
      }))
    );
  }
  return result.data;
}

export function parseListInstancesQuery(query: unknown): string {
  return parse(ListInstancesQuerySchema, query).project_id;
}

export function parseSetStatePayload(body: unknown): SetStateRequest {
  const payload = parse(SetStatePayloadSchema, body);
  return {
    projectId: payload.project_id,
    zones: payload.zones,
    instanceNames: payload.instances_names,
  };
}

/**
 * JSON with object keys sorted at every level, indented by two spaces.
 */
export function toSortedJson(value: unknown): string {
  return JSON.stringify(
    value,
    (_key, item: unknown) => {
      if (item === null || typeof item !== "object" || Array.isArray(item)) {
        return item;
      }
      return Object.fromEntries(
        Object.entries(item).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      );
    },
    2
  );
}
