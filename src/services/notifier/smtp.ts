/**
 * SMTP mail transport
 *
 * Uses nodemailer; supports SSL (port 465) and STARTTLS (port 587).
 */

import nodemailer from "nodemailer";
import type { Transporter } from "nodemailer";
import type { Notifier, NotifyResult, SMTPConfig } from "../../types/notifier.js";

export class SMTPNotifier implements Notifier {
  readonly name = "smtp";
  private transporter: Transporter;
  private config: SMTPConfig;

  constructor(config: SMTPConfig, transporter?: Transporter) {
    this.config = config;
    this.transporter = transporter ?? nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: config.secure, // true for 465, false for other ports
      auth: config.user ? { user: config.user, pass: config.pass } : undefined,
    });
  }

  async notify(title: string, body: string): Promise<NotifyResult> {
    try {
      await this.transporter.sendMail({
        from: this.config.from,
        to: this.config.recipients.join(", "),
        subject: title,
        text: body,
      });
      return { success: true };
    } catch (error) {
      return {
        success: false,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  /**
   * Close the transporter connection
   */
  close(): void {
    this.transporter.close();
  }
}
