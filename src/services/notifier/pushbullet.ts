/**
 * Pushbullet push-note transport
 */

import { z } from "zod";
import type { Notifier, NotifyResult } from "../../types/notifier.js";

export const PUSHBULLET_PUSHES_URL = "https://api.pushbullet.com/v2/pushes";
const REQUEST_TIMEOUT_MS = 10_000;

const errorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

export class PushbulletNotifier implements Notifier {
  readonly name = "pushbullet";

  constructor(
    private readonly accessToken: string | undefined,
    private readonly endpoint: string = PUSHBULLET_PUSHES_URL,
  ) {}

  async notify(title: string, body: string): Promise<NotifyResult> {
    if (!this.accessToken) {
      return { success: false, error: "Pushbullet access token not configured" };
    }

    try {
      const response = await fetch(this.endpoint, {
        method: "POST",
        headers: {
          "Access-Token": this.accessToken,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ type: "note", title, body }),
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });

      if (!response.ok) {
        const detail = describeError(await response.text());
        return {
          success: false,
          error: `Pushbullet responded ${response.status}${detail ? `: ${detail}` : ""}`,
        };
      }

      return { success: true };
    } catch (error) {
      return {
        success: false,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}

function describeError(text: string): string {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return text.slice(0, 200);
  }
  const parsed = errorBodySchema.safeParse(body);
  return parsed.success ? parsed.data.error.message : text.slice(0, 200);
}
