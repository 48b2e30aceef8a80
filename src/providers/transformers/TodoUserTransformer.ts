import { ITodoUser } from "../../api/structures/ITodoUser";
import { TodoUserEntity } from "../../models";

export namespace TodoUserTransformer {
  /** Drops the password hash. */
  export const toPublic = (user: TodoUserEntity): ITodoUser => ({
    id: user.id,
    name: user.name,
    email: user.email,
  });

  export const normalizeEmail = (email: string): string =>
    email.trim().toLowerCase();
}
