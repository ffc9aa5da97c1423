import {
  DEFAULT_PRIORITY,
  PRIORITY_LABELS,
  TodoRecordSchema,
  type Priority,
  type PriorityLabel,
  type TodoRecord,
  type TodoRecordInput,
} from "../types/index.js";

/** Fields accepted when constructing an item */
export interface TodoItemInit {
  id: number;
  title: string;
  description?: string;
  dueDate?: string;
  priority?: Priority;
  completed?: boolean;
}

/**
 * A single todo entry. Only the owning TodoList creates, completes or
 * removes items.
 */
export class TodoItem {
  readonly id: number;
  readonly title: string;
  readonly description: string;
  readonly dueDate: string | undefined;
  readonly priority: Priority;
  private done: boolean;

  constructor(init: TodoItemInit) {
    this.id = init.id;
    this.title = init.title;
    this.description = init.description ?? "";
    this.dueDate = init.dueDate;
    this.priority = init.priority ?? DEFAULT_PRIORITY;
    this.done = init.completed ?? false;
  }

  get completed(): boolean {
    return this.done;
  }

  /** One-way transition; there is no way back to incomplete. */
  markCompleted(): void {
    this.done = true;
  }

  toRecord(): TodoRecord {
    return {
      id: this.id,
      title: this.title,
      description: this.description,
      due_date: this.dueDate ?? null,
      priority: this.priority,
      completed: this.done,
    };
  }

  /**
   * Build an item from a stored record, filling in defaults for
   * missing optional fields. Throws if the record lacks an id or title.
   */
  static fromRecord(data: TodoRecordInput): TodoItem {
    const record = TodoRecordSchema.parse(data);
    return new TodoItem({
      id: record.id,
      title: record.title,
      description: record.description,
      dueDate: record.due_date ?? undefined,
      priority: record.priority,
      completed: record.completed,
    });
  }

  get priorityLabel(): PriorityLabel {
    return PRIORITY_LABELS[this.priority];
  }

  toString(): string {
    const status = this.done ? "✓" : "✗";
    const due = this.dueDate ? ` | Due: ${this.dueDate}` : "";
    return (
      `${this.id}. [${status}] ${this.title}` +
      `${due} | Priority: ${this.priorityLabel}` +
      `\n   ${this.description}`
    );
  }
}
