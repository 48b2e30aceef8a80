export * from "./TodoEntity";
export * from "./TodoUserEntity";

import { TodoEntity } from "./TodoEntity";
import { TodoUserEntity } from "./TodoUserEntity";

/** Every entity the data source must register. */
export const ENTITIES = [TodoUserEntity, TodoEntity];
