import { HttpException, HttpStatus, PipeTransform } from "@nestjs/common";
import { z } from "zod";

/**
 * Validate and coerce a request body or query against a zod schema.
 *
 * Rejects with 400 naming the first offending field.
 */
export class ZodValidationPipe<Schema extends z.ZodTypeAny>
  implements PipeTransform<unknown, z.output<Schema>>
{
  public constructor(private readonly schema: Schema) {}

  public transform(value: unknown): z.output<Schema> {
    const parsed = this.schema.safeParse(value);
    if (parsed.success === true) return parsed.data;

    const issue: z.ZodIssue | undefined = parsed.error.issues[0];
    const field: string =
      issue !== undefined && issue.path.length !== 0
        ? issue.path.join(".")
        : "body";
    throw new HttpException(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        message: `Bad Request: ${field}: ${issue?.message ?? "invalid value"}`,
        field,
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}
