import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
} from "@nestjs/common";

import { MyContext } from "../../MyContext";
import { TodoSchemas } from "../../api/schemas/TodoSchemas";
import { IPageITodo } from "../../api/structures/IPageITodo";
import { ITodo } from "../../api/structures/ITodo";
import { ITodoUser } from "../../api/structures/ITodoUser";
import { UserAuth, UserAuthenticated } from "../../decorators/UserAuth";
import { ZodValidationPipe } from "../../pipes/ZodValidationPipe";
import { deleteTodosId } from "../../providers/deleteTodosId";
import { getTodos } from "../../providers/getTodos";
import { postTodos } from "../../providers/postTodos";
import { putTodosId } from "../../providers/putTodosId";
import { ResultUtil } from "../../utils/ResultUtil";

@Controller("todos")
@UserAuthenticated()
export class TodosController {
  public constructor(
    @Inject(MyContext.TOKEN) private readonly context: MyContext,
  ) {}

  /**
   * Create a todo owned by the authenticated member.
   *
   * @param body Title and description
   * @returns The persisted todo with its assigned id
   */
  @Post()
  public async create(
    @UserAuth() user: ITodoUser,
    @Body(new ZodValidationPipe(TodoSchemas.create)) body: ITodo.ICreate,
  ): Promise<ITodo> {
    return ResultUtil.unwrap(await postTodos(this.context, { user, body }));
  }

  /**
   * List the authenticated member's todos.
   *
   * @param query Page (from 1) and limit (from 1)
   * @returns One page of todos with the member's total count
   */
  @Get()
  public async index(
    @UserAuth() user: ITodoUser,
    @Query(new ZodValidationPipe(TodoSchemas.request)) query: ITodo.IRequest,
  ): Promise<IPageITodo> {
    return ResultUtil.unwrap(await getTodos(this.context, { user, query }));
  }

  /**
   * Replace the title and description of a todo.
   *
   * @param id Target todo's id
   * @param body New title and description
   * @returns The updated todo
   */
  @Put(":id")
  public async update(
    @UserAuth() user: ITodoUser,
    @Param("id", ParseIntPipe) id: number,
    @Body(new ZodValidationPipe(TodoSchemas.update)) body: ITodo.IUpdate,
  ): Promise<ITodo> {
    return ResultUtil.unwrap(
      await putTodosId(this.context, { user, id, body }),
    );
  }

  /**
   * Permanently delete a todo.
   *
   * @param id Target todo's id
   */
  @Delete(":id")
  @HttpCode(HttpStatus.NO_CONTENT)
  public async erase(
    @UserAuth() user: ITodoUser,
    @Param("id", ParseIntPipe) id: number,
  ): Promise<void> {
    ResultUtil.unwrap(await deleteTodosId(this.context, { user, id }));
  }
}
