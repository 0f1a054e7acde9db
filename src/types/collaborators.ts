/**
 * Contracts for the pipeline's side-effecting collaborators.
 * Failures are returned as values; none of these reject.
 */

import type { PortfolioReport } from "./portfolio.js";

export type ChartResult =
  | { ok: true; path: string }
  | { ok: false; error: string };

export interface ChartRenderer {
  render(report: PortfolioReport): Promise<ChartResult>;
}

export interface MailMessage {
  subject: string;
  html: string;
  /** Image embedded inline as cid:portfolio_chart */
  attachmentPath?: string;
}

export type SendResult =
  | { sent: true; messageId: string }
  | { sent: false; reason: string };

export interface ReportMailer {
  /** False when credentials are missing; send() then reports a skip */
  readonly configured: boolean;
  send(message: MailMessage): Promise<SendResult>;
}
