import { Body, Controller, HttpCode, HttpStatus, Inject, Post } from "@nestjs/common";

import { MyContext } from "../../MyContext";
import { TodoUserSchemas } from "../../api/schemas/TodoUserSchemas";
import { IAuthorizationToken } from "../../api/structures/IAuthorizationToken";
import { ITodoUser } from "../../api/structures/ITodoUser";
import { ITodoUserLogin } from "../../api/structures/ITodoUserLogin";
import { ZodValidationPipe } from "../../pipes/ZodValidationPipe";
import { postLogin } from "../../providers/postLogin";
import { postRegister } from "../../providers/postRegister";
import { ResultUtil } from "../../utils/ResultUtil";

@Controller()
export class AuthUserController {
  public constructor(
    @Inject(MyContext.TOKEN) private readonly context: MyContext,
  ) {}

  /**
   * Register a new member.
   *
   * @param body Name, email and password of the new member
   * @returns The created member, without any password material
   */
  @Post("register")
  public async register(
    @Body(new ZodValidationPipe(TodoUserSchemas.create))
    body: ITodoUser.ICreate,
  ): Promise<ITodoUser> {
    return ResultUtil.unwrap(await postRegister(this.context, { body }));
  }

  /**
   * Log in with email and password.
   *
   * @param body Credentials of the member
   * @returns Bearer token for the authenticated routes
   */
  @Post("login")
  @HttpCode(HttpStatus.OK)
  public async login(
    @Body(new ZodValidationPipe(TodoUserSchemas.login))
    body: ITodoUserLogin.IRequest,
  ): Promise<IAuthorizationToken> {
    return ResultUtil.unwrap(await postLogin(this.context, { body }));
  }
}
