import { Controller, Get } from "@nestjs/common";

import { IMonitor } from "../api/structures/IMonitor";

@Controller()
export class MonitorController {
  /** Unauthenticated liveness check. */
  @Get()
  public health(): IMonitor.IHealth {
    return { message: "Hello world" };
  }
}
