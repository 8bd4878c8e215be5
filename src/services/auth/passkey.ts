/**
 * Passkey store - the hashed secret gating the editor.
 *
 * The file holds one SHA-256 hex digest. Without a file the well-known
 * default passkey applies; the editor forces a change after logging in
 * with it.
 */

import { createHash, timingSafeEqual } from "node:crypto";
import { readFile, writeFile } from "node:fs/promises";
import type { Logger } from "../../types/logger.js";
import type { SaveResult } from "../../types/task.js";

export const DEFAULT_PASSKEY = "tickler";
export const MIN_PASSKEY_LENGTH = 5;

export interface StoredPasskey {
  hash: string;
  /** True when no passkey has been set and the default applies */
  isDefault: boolean;
}

export function hashPasskey(passkey: string): string {
  return createHash("sha256").update(passkey, "utf-8").digest("hex");
}

/**
 * @returns an error message, or null when the passkey is acceptable
 */
export function validateNewPasskey(passkey: string): string | null {
  if (passkey.length < MIN_PASSKEY_LENGTH) {
    return `Passkey must be at least ${MIN_PASSKEY_LENGTH} characters long.`;
  }
  if (passkey === DEFAULT_PASSKEY) {
    return "Choose a passkey other than the default.";
  }
  return null;
}

export class PasskeyStore {
  constructor(readonly path: string, private readonly logger?: Logger) {}

  /**
   * Read the stored hash. A missing or empty file means the default passkey.
   * Other read errors propagate: falling back to the default would open access.
   */
  async load(): Promise<StoredPasskey> {
    let content: string;
    try {
      content = await readFile(this.path, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return { hash: hashPasskey(DEFAULT_PASSKEY), isDefault: true };
      }
      throw error;
    }

    const hash = content.trim();
    if (!hash) {
      this.logger?.warn("passkey file is empty; using the default passkey", { path: this.path });
      return { hash: hashPasskey(DEFAULT_PASSKEY), isDefault: true };
    }
    return { hash, isDefault: false };
  }

  async verify(candidate: string): Promise<boolean> {
    const { hash } = await this.load();
    const expected = Buffer.from(hash, "utf-8");
    const actual = Buffer.from(hashPasskey(candidate), "utf-8");
    return expected.length === actual.length && timingSafeEqual(expected, actual);
  }

  /**
   * Hash and store a new passkey (file mode 0600)
   */
  async save(passkey: string): Promise<SaveResult> {
    const problem = validateNewPasskey(passkey);
    if (problem) {
      return { success: false, error: problem };
    }

    try {
      await writeFile(this.path, hashPasskey(passkey) + "\n", { encoding: "utf-8", mode: 0o600 });
      this.logger?.info("passkey updated", { path: this.path });
      return { success: true };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger?.error("failed to save passkey", { path: this.path, error: message });
      return { success: false, error: message };
    }
  }
}
