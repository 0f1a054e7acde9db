/**
 * SMTP delivery of the HTML report via nodemailer.
 *
 * Sending never throws: a failed delivery must not stop persistence.
 */

import path from "path";
import nodemailer from "nodemailer";
import type { Transporter } from "nodemailer";
import type { Config, Env } from "../config/index.js";
import { resolveEmailCredentials } from "../config/index.js";
import type { MailMessage, ReportMailer, SendResult } from "../types/collaborators.js";
import { CHART_CID } from "../render/email-report.js";
import { errorMessage } from "../utils/errors.js";
import { componentLogger } from "../utils/logger.js";

const log = componentLogger("mailer");

export interface MailerOptions {
  from: string;
  to: string;
  transport: Transporter;
}

export class SmtpMailer implements ReportMailer {
  readonly configured = true;

  constructor(private readonly options: MailerOptions) {}

  async send(message: MailMessage): Promise<SendResult> {
    try {
      const info = await this.options.transport.sendMail({
        from: this.options.from,
        to: this.options.to,
        subject: message.subject,
        html: message.html,
        attachments: message.attachmentPath
          ? [
              {
                filename: path.basename(message.attachmentPath),
                path: message.attachmentPath,
                cid: CHART_CID,
                contentDisposition: "inline",
              },
            ]
          : [],
      });
      log.info(`Email report sent to ${this.options.to}`);
      return { sent: true, messageId: String(info.messageId) };
    } catch (err) {
      log.error("Error sending email", { error: errorMessage(err) });
      return { sent: false, reason: errorMessage(err) };
    }
  }
}

/** Stand-in used when credentials are missing */
export class DisabledMailer implements ReportMailer {
  readonly configured = false;

  constructor(private readonly reason: string) {}

  async send(): Promise<SendResult> {
    log.warn(`Email skipped: ${this.reason}`);
    return { sent: false, reason: this.reason };
  }
}

/**
 * Build the mailer from config. Credentials are resolved through the
 * configured password variable at call time.
 */
export function createMailer(cfg: Config, env: Env = process.env): ReportMailer {
  const creds = resolveEmailCredentials(cfg, env);
  if (!creds) {
    return new DisabledMailer(
      `email not configured (EMAIL_SENDER, EMAIL_RECEIVER and ${cfg.email.passwordEnv} are required)`
    );
  }

  const transport = nodemailer.createTransport({
    host: cfg.email.smtpHost,
    port: cfg.email.smtpPort,
    secure: cfg.email.smtpPort === 465,
    auth: { user: creds.user, pass: creds.pass },
  });

  return new SmtpMailer({ from: creds.user, to: creds.receiver, transport });
}
