import { existsSync, readFileSync, writeFileSync } from "node:fs";
import {
  DEFAULT_PRIORITY,
  TodoStoreSchema,
  type Priority,
  type TodoStore,
} from "../types/index.js";
import { debug } from "../utils/log.js";
import { TodoItem } from "./item.js";

/**
 * Ordered collection of todo items backed by a JSON file.
 *
 * The file is read once at construction and rewritten in full after
 * every mutation. Ids are handed out from a counter that never goes
 * backwards, so removed ids are not reused.
 */
export class TodoList {
  private items: TodoItem[] = [];
  private counter = 1;
  private storePath: string;

  constructor(storePath: string) {
    this.storePath = storePath;
    this.load();
  }

  /** The id the next added item will receive */
  get nextId(): number {
    return this.counter;
  }

  add(
    title: string,
    description = "",
    dueDate?: string,
    priority: Priority = DEFAULT_PRIORITY
  ): TodoItem {
    const item = new TodoItem({
      id: this.counter,
      title,
      description,
      dueDate,
      priority,
    });
    this.items.push(item);
    this.counter += 1;
    this.save();
    return item;
  }

  /**
   * Delete an item. Returns false, without touching the store, when no
   * item has the id.
   */
  remove(id: number): boolean {
    const index = this.items.findIndex((item) => item.id === id);
    if (index === -1) return false;

    this.items.splice(index, 1);
    this.save();
    return true;
  }

  /**
   * Mark an item completed. Completing an already completed item still
   * returns true.
   */
  complete(id: number): boolean {
    const item = this.get(id);
    if (!item) return false;

    item.markCompleted();
    this.save();
    return true;
  }

  get(id: number): TodoItem | undefined {
    return this.items.find((item) => item.id === id);
  }

  /**
   * Items in insertion order. Completed items are left out unless
   * `showCompleted` is set.
   */
  list(showCompleted = false): readonly TodoItem[] {
    if (showCompleted) return this.items;
    return this.items.filter((item) => !item.completed);
  }

  /**
   * Read the store. A missing, unparseable or malformed file leaves the
   * list empty; read errors other than a missing file are thrown.
   */
  private load(): void {
    this.items = [];
    this.counter = 1;

    if (!existsSync(this.storePath)) {
      return;
    }

    const content = readFileSync(this.storePath, "utf-8");

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (err) {
      debug(`Ignoring unreadable store ${this.storePath}: ${err instanceof Error ? err.message : String(err)}`);
      return;
    }

    const result = TodoStoreSchema.safeParse(data);
    if (!result.success) {
      debug(`Ignoring malformed store ${this.storePath}: ${result.error.message}`);
      return;
    }

    const ids = new Set(result.data.todos.map((record) => record.id));
    if (ids.size !== result.data.todos.length) {
      debug(`Ignoring store ${this.storePath}: duplicate item ids`);
      return;
    }

    this.items = result.data.todos.map((record) => TodoItem.fromRecord(record));
    // A hand-edited next_id must still clear every stored id
    const highestId = Math.max(0, ...ids);
    this.counter = Math.max(result.data.next_id, highestId + 1);
  }

  private save(): void {
    const data: TodoStore = {
      todos: this.items.map((item) => item.toRecord()),
      next_id: this.counter,
    };
    writeFileSync(this.storePath, JSON.stringify(data, null, 2));
  }
}
