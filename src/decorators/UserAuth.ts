import {
  ExecutionContext,
  HttpException,
  HttpStatus,
  UseGuards,
  applyDecorators,
  createParamDecorator,
} from "@nestjs/common";
import { Singleton } from "tstl";

import { UserAuthGuard } from "../guards/UserAuthGuard";
import { ResultUtil } from "../utils/ResultUtil";

/**
 * UserAuth decorator
 *
 * Injects the member resolved by {@link UserAuthGuard} into a controller
 * handler parameter. The handler's class or method must be guarded with
 * {@link UserAuthenticated}.
 */
export const UserAuth =
  (): ParameterDecorator =>
  (
    target: object,
    propertyKey: string | symbol | undefined,
    parameterIndex: number,
  ): void =>
    singleton.get()(target, propertyKey, parameterIndex);

/** Requires a valid bearer token on every route of the decorated target. */
export const UserAuthenticated = () => applyDecorators(UseGuards(UserAuthGuard));

const singleton = new Singleton(() =>
  createParamDecorator((_data: unknown, ctx: ExecutionContext) => {
    const request = ctx.switchToHttp().getRequest<UserAuthGuard.IRequest>();
    if (request.user === undefined)
      throw new HttpException(ResultUtil.TOKEN_MESSAGE, HttpStatus.UNAUTHORIZED);
    return request.user;
  })(),
);
