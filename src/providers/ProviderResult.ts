/**
 * Outcome of a provider call.
 *
 * Providers never throw for expected failures (bad input, duplicates, bad
 * credentials, foreign or missing records); they return one of the
 * {@link IProviderFailure} kinds and the controller decides the HTTP status.
 * Only storage faults travel as exceptions.
 */
export type ProviderResult<T> =
  | ProviderResult.ISuccess<T>
  | ProviderResult.IFailure;
export namespace ProviderResult {
  export interface ISuccess<T> {
    success: true;
    data: T;
  }
  export interface IFailure {
    success: false;
    failure: IProviderFailure;
  }

  export const ok = <T>(data: T): ISuccess<T> => ({
    success: true,
    data,
  });

  export const fail = (failure: IProviderFailure): IFailure => ({
    success: false,
    failure,
  });
}

export type IProviderFailure =
  | IProviderFailure.IValidation
  | IProviderFailure.IConflict
  | IProviderFailure.IUnauthorized
  | IProviderFailure.IForbidden
  | IProviderFailure.INotFound;
export namespace IProviderFailure {
  export interface IValidation {
    kind: "validation";
    field: string;
    message: string;
  }
  export interface IConflict {
    kind: "conflict";
    message: string;
  }

  /**
   * The reason is for logs and tests only. Over HTTP every reason collapses
   * to the same 401 answer.
   */
  export interface IUnauthorized {
    kind: "unauthorized";
    reason: IUnauthorizedReason;
  }
  export interface IForbidden {
    kind: "forbidden";
    message: string;
  }
  export interface INotFound {
    kind: "not_found";
    message: string;
  }

  export type IUnauthorizedReason =
    | "bad_credentials"
    | "missing_header"
    | "malformed_header"
    | "malformed"
    | "bad_signature"
    | "expired"
    | "missing_subject"
    | "unknown_user";
}
