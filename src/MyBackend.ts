import { INestApplication, Logger, LoggerService, LogLevel } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";

import { MyContext } from "./MyContext";
import { MyModule } from "./MyModule";

export class MyBackend {
  private readonly logger_ = new Logger(MyBackend.name);
  private application_: INestApplication | null = null;

  public constructor(private readonly context: MyContext) {}

  /** Start listening. Resolves with the base URL of the server. */
  public async open(props: MyBackend.IOpenProps): Promise<string> {
    if (this.application_ !== null)
      throw new Error("Error on MyBackend.open(): already opened.");

    const application: INestApplication = await NestFactory.create(
      MyModule.forContext(this.context),
      { logger: props.logger },
    );
    application.enableCors({ origin: this.context.env.CORS_ORIGIN });
    await application.listen(props.port, props.host);
    this.application_ = application;

    const url: string = await application.getUrl();
    this.logger_.log(`listening on ${url}`);
    return url;
  }

  public async close(): Promise<void> {
    if (this.application_ === null) return;

    const application: INestApplication = this.application_;
    this.application_ = null;
    await application.close();
    this.logger_.log("closed");
  }
}
export namespace MyBackend {
  export interface IOpenProps {
    port: number;
    host: string;

    /** Forwarded to NestFactory. `false` silences every Logger. */
    logger?: LoggerService | LogLevel[] | false;
  }
}
