/** Task record owned by exactly one member. */
export type ITodo = {
  /** Primary key assigned by storage. */
  id: number;

  title: string;

  description: string;
};
export namespace ITodo {
  /** Creation payload. The owner is always the authenticated member. */
  export type ICreate = {
    title: string;
    description: string;
  };

  /** Replacement payload. Both fields are overwritten. */
  export type IUpdate = {
    title: string;
    description: string;
  };

  /**
   * Pagination request for the owner's todos.
   *
   * A missing `page` means the first page and a page below 1 is treated as 1.
   * A missing `limit` means 10; a limit below 1 is rejected.
   */
  export type IRequest = {
    page?: number | undefined;
    limit?: number | undefined;
  };
}
