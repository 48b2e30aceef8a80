import { z } from "zod";

import { ITodo } from "../structures/ITodo";

export namespace TodoSchemas {
  export const create = z.object({
    title: z.string(),
    description: z.string(),
  }) satisfies z.ZodType<ITodo.ICreate>;

  export const update = z.object({
    title: z.string(),
    description: z.string(),
  }) satisfies z.ZodType<ITodo.IUpdate>;

  /**
   * Query strings arrive as text, so numbers are coerced here and held to
   * the safe integer range. Range policy (clamping the page, rejecting
   * non-positive limits) belongs to the provider.
   */
  export const request = z.object({
    page: z.coerce.number().int().max(Number.MAX_SAFE_INTEGER).optional(),
    limit: z.coerce.number().int().max(Number.MAX_SAFE_INTEGER).optional(),
  }) satisfies z.ZodType<ITodo.IRequest>;
}
