/** Store file, resolved against the working directory */
export const TODO_FILE = "todo_data.json";

/** Width of the `=` rule printed around listings */
export const RULE_WIDTH = 50;
