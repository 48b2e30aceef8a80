import "reflect-metadata";

import { Logger } from "@nestjs/common";
import { DataSource } from "typeorm";

import { MyBackend } from "../MyBackend";
import { MyConfiguration } from "../MyConfiguration";
import { MyContext } from "../MyContext";
import { MyDataSource } from "../MyDataSource";

const logger = new Logger("server");

const main = async (): Promise<void> => {
  const env: MyConfiguration.IEnvironments = MyConfiguration.load();
  const dataSource: DataSource = await MyDataSource.connect(env);
  const backend: MyBackend = new MyBackend(
    MyContext.create({ env, dataSource }),
  );
  await backend.open({ port: env.API_PORT, host: "0.0.0.0" });

  const shutdown = async (): Promise<void> => {
    await backend.close();
    await dataSource.destroy();
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const)
    process.once(signal, () => {
      shutdown().catch((error: unknown) => {
        logger.error("failed to shut down", error);
        process.exitCode = 1;
      });
    });
};
main().catch((error: unknown) => {
  logger.error("failed to start", error);
  process.exit(-1);
});
