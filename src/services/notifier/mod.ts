/**
 * Notifier module
 *
 * The scanner and the editor only ever call `deliver`, which makes one
 * attempt through whatever transports are configured and logs failures.
 *
 * @example
 * ```typescript
 * import { createNotifier, deliver } from "./services/notifier/mod.js";
 *
 * const notifier = createNotifier(config);
 * await deliver(notifier, logger, "Tickler", "Task Due\nTask: stand-up");
 * ```
 */

import type { Config } from "../../config/config.js";
import type { Logger } from "../../types/logger.js";
import type { Notifier, NotifyResult } from "../../types/notifier.js";
import { PushbulletNotifier } from "./pushbullet.js";
import { SMTPNotifier } from "./smtp.js";

export { PUSHBULLET_PUSHES_URL, PushbulletNotifier } from "./pushbullet.js";
export { SMTPNotifier } from "./smtp.js";

export const NOTIFICATION_TITLE = "Tickler";

/**
 * Sends through every transport; succeeds when at least one does
 */
export class MultiNotifier implements Notifier {
  readonly name: string;

  constructor(private readonly notifiers: Notifier[]) {
    this.name = notifiers.map((n) => n.name).join("+");
  }

  async notify(title: string, body: string): Promise<NotifyResult> {
    const results = await Promise.all(
      this.notifiers.map((n) => n.notify(title, body)),
    );
    if (results.some((r) => r.success)) {
      return { success: true };
    }
    return {
      success: false,
      error: results
        .map((r, i) => `${this.notifiers[i]?.name}: ${r.error ?? "failed"}`)
        .join("; "),
    };
  }

  close(): void {
    for (const notifier of this.notifiers) {
      notifier.close?.();
    }
  }
}

/**
 * Stand-in used when no transport is configured
 */
export class UnconfiguredNotifier implements Notifier {
  readonly name = "none";

  notify(): Promise<NotifyResult> {
    return Promise.resolve({
      success: false,
      error: "No notification transport configured",
    });
  }
}

/**
 * Build the notifier for the transports present in config
 */
export function createNotifier(config: Pick<Config, "pushbulletToken" | "smtp">): Notifier {
  const notifiers: Notifier[] = [];
  if (config.pushbulletToken) {
    notifiers.push(new PushbulletNotifier(config.pushbulletToken));
  }
  if (config.smtp) {
    notifiers.push(new SMTPNotifier(config.smtp));
  }

  const [only] = notifiers;
  if (notifiers.length === 1 && only) return only;
  if (notifiers.length === 0) return new UnconfiguredNotifier();
  return new MultiNotifier(notifiers);
}

/**
 * Make one delivery attempt. Failures, including thrown errors, are
 * logged as warnings and reported as `false`; they never propagate.
 */
export async function deliver(
  notifier: Notifier,
  logger: Logger,
  title: string,
  body: string,
): Promise<boolean> {
  try {
    const result = await notifier.notify(title, body);
    if (!result.success) {
      logger.warn("notification not delivered", {
        transport: notifier.name,
        title,
        error: result.error,
      });
    }
    return result.success;
  } catch (error) {
    logger.warn("notification transport failed", {
      transport: notifier.name,
      title,
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}
