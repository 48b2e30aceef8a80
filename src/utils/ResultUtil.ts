import { HttpException, HttpStatus } from "@nestjs/common";

import { IProviderFailure, ProviderResult } from "../providers/ProviderResult";

export namespace ResultUtil {
  export const CREDENTIALS_MESSAGE = "Unauthorized: Invalid email or password";
  export const TOKEN_MESSAGE = "Unauthorized: Invalid or missing credentials";

  export function unwrap<T>(result: ProviderResult<T>): T {
    if (result.success === true) return result.data;
    throw toHttpException(result.failure);
  }

  export function toHttpException(failure: IProviderFailure): HttpException {
    switch (failure.kind) {
      case "validation":
        return new HttpException(
          {
            statusCode: HttpStatus.BAD_REQUEST,
            message: `Bad Request: ${failure.message}`,
            field: failure.field,
          },
          HttpStatus.BAD_REQUEST,
        );
      case "conflict":
        return new HttpException(
          `Bad Request: ${failure.message}`,
          HttpStatus.BAD_REQUEST,
        );
      case "unauthorized":
        return new HttpException(
          failure.reason === "bad_credentials"
            ? CREDENTIALS_MESSAGE
            : TOKEN_MESSAGE,
          HttpStatus.UNAUTHORIZED,
        );
      case "forbidden":
        return new HttpException(
          `Forbidden: ${failure.message}`,
          HttpStatus.FORBIDDEN,
        );
      case "not_found":
        return new HttpException(
          `Not Found: ${failure.message}`,
          HttpStatus.NOT_FOUND,
        );
    }
  }
}
