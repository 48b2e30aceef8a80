import { ITodo } from "./ITodo";

/**
 * A page of the authenticated member's todos, ordered by ascending id.
 */
export type IPageITodo = {
  /** List of records. */
  data: ITodo[];

  /** Current page number, starting from 1. */
  page: number;

  /** Maximum number of records per page. */
  limit: number;

  /** Number of todos the member owns, regardless of pagination. */
  total: number;
};
