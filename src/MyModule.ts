import { DynamicModule, Module } from "@nestjs/common";

import { MyContext } from "./MyContext";
import { MonitorController } from "./controllers/MonitorController";
import { AuthUserController } from "./controllers/auth/AuthUserController";
import { TodosController } from "./controllers/todos/TodosController";
import { UserAuthGuard } from "./guards/UserAuthGuard";

@Module({})
export class MyModule {
  /** Bind the controllers to an already built context. */
  public static forContext(context: MyContext): DynamicModule {
    return {
      module: MyModule,
      controllers: [MonitorController, AuthUserController, TodosController],
      providers: [
        {
          provide: MyContext.TOKEN,
          useValue: context,
        },
        UserAuthGuard,
      ],
    };
  }
}
