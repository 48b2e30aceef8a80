export namespace IMonitor {
  /** Liveness answer of the root endpoint. */
  export type IHealth = {
    message: string;
  };
}
