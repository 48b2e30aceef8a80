import { CanActivate, ExecutionContext, Inject, Injectable } from "@nestjs/common";

import { MyContext } from "../MyContext";
import { ITodoUser } from "../api/structures/ITodoUser";
import { ProviderResult } from "../providers/ProviderResult";
import { userAuthorize } from "../providers/authorize/userAuthorize";
import { ResultUtil } from "../utils/ResultUtil";

/**
 * Resolve the caller once per request and keep it on the request for the
 * {@link UserAuth} parameter decorator.
 */
@Injectable()
export class UserAuthGuard implements CanActivate {
  public constructor(
    @Inject(MyContext.TOKEN) private readonly context: MyContext,
  ) {}

  public async canActivate(ctx: ExecutionContext): Promise<boolean> {
    const request = ctx.switchToHttp().getRequest<UserAuthGuard.IRequest>();
    const result: ProviderResult<ITodoUser> = await userAuthorize(
      this.context,
      request.headers.authorization,
    );
    request.user = ResultUtil.unwrap(result);
    return true;
  }
}
export namespace UserAuthGuard {
  export interface IRequest {
    headers: {
      authorization?: string;
    };
    user?: ITodoUser;
  }
}
