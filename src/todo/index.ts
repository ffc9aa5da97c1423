export { TodoItem, type TodoItemInit } from "./item.js";
export { TodoList } from "./list.js";
