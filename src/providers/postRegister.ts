import { Logger } from "@nestjs/common";
import { QueryFailedError } from "typeorm";

import { MyContext } from "../MyContext";
import { ITodoUser } from "../api/structures/ITodoUser";
import { TodoUserEntity } from "../models";
import { ProviderResult } from "./ProviderResult";
import { TodoUserTransformer } from "./transformers/TodoUserTransformer";

const logger = new Logger("postRegister");

/**
 * Register a new member.
 *
 * Emails are normalized before the uniqueness check, so addresses differing
 * only by case collide. A duplicate is reported as a conflict without any
 * write. The response never carries the password or its hash.
 *
 * @param props.body - Name, email and plain-text password
 * @returns The created member with its assigned id
 */
export async function postRegister(
  context: MyContext,
  props: {
    body: ITodoUser.ICreate;
  },
): Promise<ProviderResult<ITodoUser>> {
  const email: string = TodoUserTransformer.normalizeEmail(props.body.email);

  // 1) Enforce unique email pre-check
  const existing: TodoUserEntity | null = await context.users.findOne({
    where: { email },
    select: { id: true },
  });
  if (existing !== null) return conflict();

  // 2) Hash password, then insert
  const password_hash: string = await context.password.hash(
    props.body.password,
  );
  try {
    const created: TodoUserEntity = await context.users.save(
      context.users.create({
        email,
        name: props.body.name,
        password_hash,
      }),
    );
    logger.debug(`registered member #${created.id}`);
    return ProviderResult.ok(TodoUserTransformer.toPublic(created));
  } catch (error) {
    // a concurrent registration won the unique index
    if (isUniqueViolation(error)) return conflict();
    throw error;
  }
}

const conflict = (): ProviderResult.IFailure =>
  ProviderResult.fail({
    kind: "conflict",
    message: "Email already registered",
  });

const isUniqueViolation = (error: unknown): boolean => {
  if (!(error instanceof QueryFailedError)) return false;
  const driverError: unknown = error.driverError;
  if (
    typeof driverError !== "object" ||
    driverError === null ||
    !("code" in driverError)
  )
    return false;
  return (
    driverError.code === "23505" || // PostgreSQL unique_violation
    driverError.code === "SQLITE_CONSTRAINT_UNIQUE"
  );
};
