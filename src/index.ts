export { TodoItem, TodoList, type TodoItemInit } from "./todo/index.js";
export {
  DueDateSchema,
  PrioritySchema,
  TodoRecordSchema,
  TodoStoreSchema,
  PRIORITY_LABELS,
  DEFAULT_PRIORITY,
  type Priority,
  type PriorityLabel,
  type TodoRecord,
  type TodoRecordInput,
  type TodoStore,
} from "./types/index.js";
export { TODO_FILE } from "./config.js";
