import dotenv from "dotenv";
import { z } from "zod";

export namespace MyConfiguration {
  export const schema = z.object({
    API_PORT: z.coerce.number().int().min(0).max(65535).default(8000),
    DATABASE_URL: z.string().min(1),
    DATABASE_SYNCHRONIZE: z
      .enum(["true", "false"])
      .default("true")
      .transform((value) => value === "true"),
    JWT_SECRET_KEY: z.string().min(1),
    JWT_ACCESS_TTL_SECONDS: z.coerce.number().int().positive().default(30 * 60),
    CORS_ORIGIN: z.string().min(1).default("*"),
  });

  export type IEnvironments = z.output<typeof schema>;

  /**
   * Read the environment once at startup.
   *
   * Variables already present in `source` win over the `.env` file.
   */
  export function load(
    source: Record<string, string | undefined> = process.env,
  ): IEnvironments {
    if (source === process.env) dotenv.config();

    const parsed = schema.safeParse(source);
    if (parsed.success === true) return parsed.data;

    const issues: string = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new Error(`Invalid environment variables: ${issues}`);
  }
}
