import { DataSource } from "typeorm";

import { MyConfiguration } from "./MyConfiguration";
import { ENTITIES } from "./models";

export namespace MyDataSource {
  /** Connect to the PostgreSQL database named by `DATABASE_URL`. */
  export async function connect(
    env: MyConfiguration.IEnvironments,
  ): Promise<DataSource> {
    const dataSource = new DataSource({
      type: "postgres",
      url: env.DATABASE_URL,
      entities: ENTITIES,
      synchronize: env.DATABASE_SYNCHRONIZE,
    });
    return dataSource.initialize();
  }
}
