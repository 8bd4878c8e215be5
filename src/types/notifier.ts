/**
 * Notification transport boundary
 */

export interface NotifyResult {
  success: boolean;
  error?: string;
}

/**
 * A single best-effort delivery capability.
 * Implementations report failures in the result instead of throwing.
 */
export interface Notifier {
  readonly name: string;
  notify(title: string, body: string): Promise<NotifyResult>;
  /** Release pooled connections, if the transport holds any */
  close?(): void;
}

/**
 * SMTP configuration for mail delivery
 */
export interface SMTPConfig {
  host: string;
  port: number;
  user: string;
  pass: string;
  from: string;
  /** true for SSL (port 465), false for STARTTLS (port 587) */
  secure: boolean;
  recipients: string[];
}
