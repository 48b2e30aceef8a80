export namespace ITodoUserLogin {
  /**
   * Login request payload.
   *
   * Unknown emails and wrong passwords are rejected with the same response,
   * so the payload cannot be used to probe which accounts exist.
   */
  export type IRequest = {
    email: string;
    password: string;
  };
}
