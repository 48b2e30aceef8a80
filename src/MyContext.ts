import { DataSource, Repository } from "typeorm";

import { MyConfiguration } from "./MyConfiguration";
import { TodoEntity, TodoUserEntity } from "./models";
import { JwtTokenService } from "./utils/JwtTokenService";
import { PasswordUtil } from "./utils/PasswordUtil";

/**
 * Everything a provider may touch, built once at startup and handed to each
 * call explicitly.
 */
export interface MyContext {
  env: MyConfiguration.IEnvironments;
  users: Repository<TodoUserEntity>;
  todos: Repository<TodoEntity>;
  tokens: JwtTokenService;
  password: MyContext.IPasswordHasher;
}
export namespace MyContext {
  /** Injection token of the context inside the NestJS module. */
  export const TOKEN = "MyContext";

  export interface IPasswordHasher {
    hash(password: string): Promise<string>;
    verify(password: string, hashed: string): Promise<boolean>;
  }

  export interface IProps {
    env: MyConfiguration.IEnvironments;
    dataSource: DataSource;

    /** Clock of the token service, epoch milliseconds. */
    clock?: () => number;
  }

  export function create(props: IProps): MyContext {
    return {
      env: props.env,
      users: props.dataSource.getRepository(TodoUserEntity),
      todos: props.dataSource.getRepository(TodoEntity),
      tokens: new JwtTokenService({
        secret: props.env.JWT_SECRET_KEY,
        ttlSeconds: props.env.JWT_ACCESS_TTL_SECONDS,
        clock: props.clock,
      }),
      password: PasswordUtil,
    };
  }
}
