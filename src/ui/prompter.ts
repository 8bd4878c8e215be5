/**
 * Prompt abstraction for the interactive editor
 */

import { confirm, input, password } from "@inquirer/prompts";

export interface Prompter {
  input(message: string): Promise<string>;
  /** Masked input for passkeys */
  secret(message: string): Promise<string>;
  confirm(message: string, defaultValue: boolean): Promise<boolean>;
}

/**
 * Terminal prompts backed by @inquirer/prompts
 */
export class InquirerPrompter implements Prompter {
  input(message: string): Promise<string> {
    return input({ message });
  }

  secret(message: string): Promise<string> {
    return password({ message, mask: "*" });
  }

  confirm(message: string, defaultValue: boolean): Promise<boolean> {
    return confirm({ message, default: defaultValue });
  }
}

/**
 * True for the error @inquirer/prompts raises on Ctrl+C
 */
export function isPromptExit(error: unknown): boolean {
  return error instanceof Error && error.name === "ExitPromptError";
}
