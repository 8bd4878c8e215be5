/**
 * Interactive task editor
 *
 * A passkey-gated menu loop over the pending tasks. Every operation is a
 * plain function of the editor context, so tests drive it with a scripted
 * prompter and a fixed clock.
 */

import chalk from "chalk";
import { type PasskeyStore, validateNewPasskey } from "../services/auth/mod.js";
import { deliver, NOTIFICATION_TITLE } from "../services/notifier/mod.js";
import type { Logger } from "../types/logger.js";
import type { Notifier } from "../types/notifier.js";
import { isPriority, type Task } from "../types/task.js";
import { ACCEPTED_FORMATS, parseFutureTime, toCanonicalString } from "../utils/time.js";
import type { Prompter } from "./prompter.js";
import { formatPriority, renderMenu, renderTaskTable } from "./render.js";
import type { EditorSession } from "./session.js";

const PASSKEY_ATTEMPTS = 3;
const TASK_ATTEMPTS = 3;
const TIME_ATTEMPTS = 5;
const OPTION_ATTEMPTS = 7;

const SAVE_ERROR = "Error:\nUnable to save tasks. Check file permissions and try again.";
const NO_TASKS = "No tasks available.";

function noLongerPending(name: string): string {
  return `Task '${name}' is no longer pending.`;
}

export interface EditorContext {
  session: EditorSession;
  passkeys: PasskeyStore;
  notifier: Notifier;
  logger: Logger;
  prompter: Prompter;
  print: (text: string) => void;
  now: () => Date;
}

/**
 * Ends the editor with a process exit status
 */
export class EditorExitError extends Error {
  constructor(readonly exitCode: number, message: string) {
    super(message);
    this.name = "EditorExitError";
  }
}

type Operation = (ctx: EditorContext) => Promise<unknown>;

interface MenuOption {
  key: number;
  label: string;
  run?: Operation;
}

export const MENU_OPTIONS: readonly MenuOption[] = [
  { key: 1, label: "Add Task", run: addTask },
  { key: 2, label: "Delete Task", run: deleteTask },
  { key: 3, label: "Preview Tasks", run: previewTasks },
  { key: 4, label: "Update Task", run: updateTask },
  { key: 5, label: "Change Passkey", run: changePasskey },
  { key: 6, label: "Exit" },
  { key: 7, label: "View Tasks History", run: viewHistory },
];

function notify(ctx: EditorContext, body: string): Promise<boolean> {
  return deliver(ctx.notifier, ctx.logger, NOTIFICATION_TITLE, body);
}

async function ask(ctx: EditorContext, message: string): Promise<string> {
  return (await ctx.prompter.input(message)).trim();
}

/**
 * "1".."3" -> 1..3, anything else null
 */
export function parsePriorityInput(input: string): number | null {
  const value = input.trim();
  if (!/^\d+$/.test(value)) return null;
  const priority = Number(value);
  return isPriority(priority) ? priority : null;
}

async function persist(ctx: EditorContext): Promise<boolean> {
  const result = await ctx.session.persist();
  if (!result.success) {
    ctx.print(chalk.red(SAVE_ERROR));
    await notify(ctx, SAVE_ERROR);
  }
  return result.success;
}

// === Passkey ===

/**
 * Ask for the passkey. After a login with the default passkey a new one
 * must be set before the menu opens.
 * @throws EditorExitError after three wrong passkeys
 */
export async function authenticate(ctx: EditorContext): Promise<void> {
  const { isDefault } = await ctx.passkeys.load();

  for (let attempt = 1; attempt <= PASSKEY_ATTEMPTS; attempt++) {
    const candidate = await ctx.prompter.secret("Enter Passkey");
    if (await ctx.passkeys.verify(candidate)) {
      ctx.logger.info("editor login");
      if (isDefault) {
        ctx.print(chalk.yellow("The default passkey is in use. Set a new passkey to continue."));
        await setNewPasskey(ctx);
      }
      return;
    }

    ctx.logger.warn("passkey authentication failed", { attempt });
    ctx.print(chalk.red("Incorrect Passkey"));
    await notify(ctx, "Passkey Authentication Failed!");
  }

  await notify(ctx, "Passkey; Access Denied!");
  ctx.print(chalk.red.bold("Access Denied"));
  throw new EditorExitError(1, "Access denied");
}

/**
 * Menu 5: verify the current passkey, then set a new one
 * @throws EditorExitError when either step runs out of attempts
 */
export async function changePasskey(ctx: EditorContext): Promise<void> {
  for (let attempt = 1; attempt <= PASSKEY_ATTEMPTS; attempt++) {
    const current = await ctx.prompter.secret("Enter the current passkey");
    if (await ctx.passkeys.verify(current)) {
      await setNewPasskey(ctx);
      return;
    }
    ctx.print(chalk.red("Incorrect passkey! Try again."));
  }

  await notify(ctx, "Passkey update failed! Incorrect passkey.");
  ctx.print(chalk.red("Passkey update failed."));
  throw new EditorExitError(1, "Passkey update failed");
}

async function setNewPasskey(ctx: EditorContext): Promise<void> {
  for (let attempt = 1; attempt <= PASSKEY_ATTEMPTS; attempt++) {
    const passkey = await ctx.prompter.secret("Enter a new passkey");
    const problem = validateNewPasskey(passkey);
    if (problem) {
      ctx.print(chalk.red(problem));
      continue;
    }

    const result = await ctx.passkeys.save(passkey);
    if (!result.success) {
      ctx.print(chalk.red(`Unable to save passkey: ${result.error}`));
      await notify(ctx, "Error:\nUnable to save passkey. Check file permissions and try again.");
      throw new EditorExitError(1, "Unable to save passkey");
    }

    ctx.print(chalk.green("Passkey updated successfully!"));
    await notify(ctx, "Passkey Updated successfully!");
    return;
  }

  await notify(ctx, "Invalid new passkey. Passkey Update failed!");
  ctx.print(chalk.red("Passkey update failed."));
  throw new EditorExitError(1, "Invalid new passkey");
}

// === Tasks ===

/**
 * Menu 1
 * @returns true when a task was added and saved
 */
export async function addTask(ctx: EditorContext): Promise<boolean> {
  ctx.print(chalk.bold.magenta("Schedule Task"));
  ctx.print(chalk.dim(`Time formats: ${ACCEPTED_FORMATS.join(", ")}`));
  ctx.print(chalk.dim("Prefix a task with -e or --execute to run it as a command when due."));

  for (let attempt = 1; attempt <= TASK_ATTEMPTS; attempt++) {
    const name = await ask(ctx, "Input Task");
    const timeInput = await ask(ctx, "Task Time");
    const priorityInput = await ask(ctx, "Task Priority (1 for High, 2 for Medium, 3 for Low)");

    if (!name || !priorityInput) {
      ctx.print(chalk.red("Task and Priority fields cannot be empty."));
      continue;
    }
    const priority = parsePriorityInput(priorityInput);
    if (priority === null) {
      ctx.print(chalk.red("Invalid priority level. Choose 1 for High, 2 for Medium, or 3 for Low."));
      continue;
    }
    const time = parseFutureTime(timeInput, ctx.now());
    if (!time) {
      ctx.print(chalk.red(
        `Invalid time (${timeInput}). Make sure it is in the future and in a supported format.`,
      ));
      continue;
    }

    const canonical = toCanonicalString(time);
    ctx.print(`Your Task: ${name}\nYour Task Time: ${canonical}\nPriority Level: ${formatPriority(priority)}`);
    if (!(await ctx.prompter.confirm("Confirm to add task?", true))) {
      continue;
    }

    // pick up anything the daemon changed while the prompts were open
    await ctx.session.refresh();
    ctx.session.add({ name, time, priority });
    if (!(await persist(ctx))) return false;

    ctx.logger.info("task added", { name, time: canonical, priority });
    ctx.print(chalk.green(`Task: ${name} added successfully!`));
    await notify(ctx, `New Task Added!\nTask: ${name}\nTime: ${canonical}\nPriority Level: ${priority}`);
    return true;
  }

  ctx.print(chalk.yellow("No task added."));
  return false;
}

/**
 * Menu 2: by index removes that task, by name removes every task with it
 */
export async function deleteTask(ctx: EditorContext): Promise<boolean> {
  if (ctx.session.isEmpty) {
    ctx.print(NO_TASKS);
    return false;
  }
  ctx.print(renderTaskTable("Current Tasks", ctx.session.list, NO_TASKS));

  for (let attempt = 1; attempt <= TASK_ATTEMPTS; attempt++) {
    const selected = ctx.session.select(await ask(ctx, "Enter the index or name of the task to delete"));
    if (!selected.ok) {
      ctx.print(chalk.red(selected.reason));
      continue;
    }

    const { selection } = selected;
    const label = selection.task.name;
    if (!(await ctx.prompter.confirm(`Confirm to delete task '${label}'?`, false))) {
      ctx.print("Deletion canceled.");
      return false;
    }

    // the daemon may have fired tasks while the prompts were open
    await ctx.session.refresh();
    const current = ctx.session.findSame(selection.task);
    if (selection.kind === "index" && current) {
      ctx.session.remove(current);
    } else if (selection.kind === "index" || ctx.session.removeByName(selection.name) === 0) {
      ctx.print(chalk.yellow(noLongerPending(label)));
      return false;
    }
    if (!(await persist(ctx))) return false;

    ctx.logger.info("task deleted", { name: label, by: selection.kind });
    ctx.print(chalk.green(`Task '${label}' deleted.`));
    await notify(ctx, `Task: '${label}' deleted!`);
    return true;
  }

  return false;
}

/** Menu 3 */
export function previewTasks(ctx: EditorContext): Promise<void> {
  ctx.print(renderTaskTable("Task Preview", ctx.session.list, NO_TASKS));
  return Promise.resolve();
}

/**
 * Menu 4: pick a task, then edit it with `updateTaskDetails`
 */
export async function updateTask(ctx: EditorContext): Promise<boolean> {
  if (ctx.session.isEmpty) {
    ctx.print(NO_TASKS);
    return false;
  }
  ctx.print(renderTaskTable("Current Tasks", ctx.session.list, NO_TASKS));

  for (let attempt = 1; attempt <= TASK_ATTEMPTS; attempt++) {
    const selected = ctx.session.select(await ask(ctx, "Enter the index or name of the task to update"));
    if (!selected.ok) {
      ctx.print(chalk.red(selected.reason));
      continue;
    }
    ctx.print(chalk.dim(`Updating '${selected.selection.task.name}'...`));
    return updateTaskDetails(ctx, selected.selection.task);
  }

  ctx.print(chalk.yellow("No task selected."));
  return false;
}

/**
 * Edit one task in place. A blank answer keeps the current value; a time
 * that stays invalid after five tries also keeps it.
 */
export async function updateTaskDetails(ctx: EditorContext, task: Task): Promise<boolean> {
  const name = (await ask(ctx, "Updated task name (Enter to keep)")) || task.name;

  let time = task.time;
  for (let attempt = 1; attempt <= TIME_ATTEMPTS; attempt++) {
    const input = await ask(ctx, "Updated task time (Enter to keep)");
    if (!input) break;
    const parsed = parseFutureTime(input, ctx.now());
    if (parsed) {
      time = parsed;
      break;
    }
    ctx.print(chalk.red("Invalid time. Make sure it is in the future and in a supported format."));
  }

  let priority = task.priority;
  for (let attempt = 1; attempt <= TASK_ATTEMPTS; attempt++) {
    const input = await ask(ctx, "Updated priority 1-3 (Enter to keep)");
    if (!input) break;
    const parsed = parsePriorityInput(input);
    if (parsed !== null) {
      priority = parsed;
      break;
    }
    ctx.print(chalk.red("Invalid priority level. Choose 1 for High, 2 for Medium, or 3 for Low."));
  }

  if (!(await ctx.prompter.confirm(`Confirm to update task '${task.name}'?`, true))) {
    ctx.print("Task update canceled.");
    return false;
  }

  await ctx.session.refresh();
  const current = ctx.session.findSame(task);
  if (!current) {
    ctx.print(chalk.yellow(noLongerPending(task.name)));
    return false;
  }
  ctx.session.replace(current, { name, time, priority });
  if (!(await persist(ctx))) return false;

  ctx.logger.info("task updated", { name: task.name, newName: name, time: toCanonicalString(time), priority });
  ctx.print(chalk.green(`Task '${task.name}' updated.`));
  await notify(ctx, `Task: ${task.name} updated!`);
  return true;
}

/** Menu 7 */
export async function viewHistory(ctx: EditorContext): Promise<void> {
  const completed = await ctx.session.loadHistory();
  ctx.print(renderTaskTable("Completed Tasks", completed, "Tasks History is empty."));
}

// === Menu loop ===

/**
 * @throws EditorExitError after seven non-numeric answers in a row
 */
async function readOption(ctx: EditorContext): Promise<number> {
  for (let attempt = 1; attempt <= OPTION_ATTEMPTS; attempt++) {
    const input = await ask(ctx, "Select Option");
    if (/^\d+$/.test(input)) return Number(input);
    ctx.print(chalk.red("Invalid Option, Try again"));
  }
  ctx.print(chalk.red("Too many invalid attempts. Exiting..."));
  throw new EditorExitError(1, "Too many invalid options");
}

async function chooseOption(ctx: EditorContext): Promise<MenuOption | undefined> {
  for (let attempt = 1; attempt <= TASK_ATTEMPTS; attempt++) {
    const key = await readOption(ctx);
    const option = MENU_OPTIONS.find((o) => o.key === key);
    if (option) return option;
    ctx.print(chalk.red("Invalid option. Please choose a valid option."));
  }
  return undefined;
}

/**
 * Authenticate, then run menu operations until Exit.
 * @returns the exit status (0); failures end with EditorExitError
 */
export async function runEditor(ctx: EditorContext): Promise<number> {
  await authenticate(ctx);

  while (true) {
    ctx.print(renderMenu(MENU_OPTIONS));
    const option = await chooseOption(ctx);
    if (!option) continue;

    if (!option.run) {
      ctx.print("Exiting program....");
      ctx.logger.info("editor exit");
      return 0;
    }

    ctx.print(chalk.dim(`Executing: ${option.label}....`));
    await ctx.session.refresh();
    await option.run(ctx);
  }
}
