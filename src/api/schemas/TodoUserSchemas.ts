import { z } from "zod";

import { ITodoUser } from "../structures/ITodoUser";
import { ITodoUserLogin } from "../structures/ITodoUserLogin";

export namespace TodoUserSchemas {
  export const create = z.object({
    name: z.string(),
    email: z.string().trim().email(),
    password: z.string(),
  }) satisfies z.ZodType<ITodoUser.ICreate>;

  export const login = z.object({
    email: z.string().trim().email(),
    password: z.string(),
  }) satisfies z.ZodType<ITodoUserLogin.IRequest>;
}
