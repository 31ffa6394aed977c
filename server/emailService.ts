import nodemailer from "nodemailer";
import type { SendMailOptions } from "nodemailer";
import type { AppConfig } from "./config";
import { logger } from "./logger";
import { createSafeErrorContext } from "./emailErrors";
import { STATUS_LABELS } from "../shared/quoteWorkflow";
import type { CatalogProduct, FollowUpType, Quote, QuoteStatus } from "../shared/types";
import type { NotificationDispatcher, QuoteDocumentOptions } from "./storage/types";

export type EmailSettings = AppConfig["email"];

/**
 * The part of a nodemailer transporter the dispatcher uses
 */
export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<unknown>;
}

export interface RenderedEmail {
  subject: string;
  html: string;
}

const SEND_TIMEOUT_MS = 12000;

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/**
 * Short customer-facing reference: first 8 characters of the id, upper-cased
 */
export function quoteReference(quoteId: string): string {
  return quoteId.substring(0, 8).toUpperCase();
}

function formatDate(date: Date): string {
  return date.toISOString().substring(0, 10);
}

function formatTotal(total: number | null): string {
  return total === null ? "To be quoted" : total.toFixed(2);
}

const STATUS_MESSAGES: Partial<Record<QuoteStatus, { title: string; message: string; action: string }>> = {
  approved: {
    title: "Your quote has been approved",
    message: "Your quote has been approved and is ready for processing.",
    action: "Contact us to proceed with your order",
  },
  rejected: {
    title: "Quote Status Update",
    message: "We've reviewed your quote and cannot proceed with it as submitted.",
    action: "Contact us to discuss alternative options",
  },
  expired: {
    title: "Quote Expiration Notice",
    message: "Your quote has expired. We'd be happy to prepare a new one.",
    action: "Contact us for a new quote",
  },
};

export function renderStatusChangeEmail(quote: Quote, newStatus: QuoteStatus, notes: string | null, now: Date = new Date()): RenderedEmail {
  const reference = quoteReference(quote.id);
  const label = STATUS_LABELS[newStatus];
  const info = STATUS_MESSAGES[newStatus] ?? {
    title: "Quote Status Update",
    message: `Your quote status has been updated to: ${label}`,
    action: "Contact us if you have any questions",
  };

  const notesBlock = notes
    ? `<div><p><strong>Additional Information:</strong></p><p>${escapeHtml(notes)}</p></div>`
    : "";

  return {
    subject: `Quote #${reference} Status Update - ${info.title}`,
    html: [
      `<h2>${info.title}</h2>`,
      `<p>Dear ${escapeHtml(quote.customerInfo.name)},</p>`,
      `<p>${escapeHtml(info.message)}</p>`,
      `<p><strong>Quote Reference:</strong> #${reference}</p>`,
      `<p><strong>New Status:</strong> ${label}</p>`,
      `<p><strong>Date:</strong> ${formatDate(now)}</p>`,
      notesBlock,
      `<p><strong>Next Steps:</strong> ${info.action}</p>`,
    ].join("\n"),
  };
}

export function renderQuoteDocumentEmail(
  quote: Quote,
  products: CatalogProduct[],
  options: Pick<QuoteDocumentOptions, "customMessage">
): RenderedEmail {
  const reference = quoteReference(quote.id);
  const descriptions = new Map(products.map((product) => [product.id, product.description]));

  const rows = quote.items.map((item) => {
    const description = descriptions.get(item.productId);
    const price = item.unitPrice === null ? "To be quoted" : item.unitPrice.toFixed(2);
    return `<tr><td>${escapeHtml(item.productName)}${description ? `<br><small>${escapeHtml(description)}</small>` : ""}</td><td>${item.quantity}</td><td>${price}</td></tr>`;
  });

  const messageBlock = options.customMessage
    ? `<div><p><strong>Personal Message:</strong></p><p>${escapeHtml(options.customMessage)}</p></div>`
    : "";

  const company = quote.customerInfo.company;

  return {
    subject: company ? `Quote #${reference} - ${company}` : `Quote #${reference}`,
    html: [
      `<p>Dear ${escapeHtml(quote.customerInfo.name)},</p>`,
      `<p>Thank you for requesting a quote. Your quotation details are below.</p>`,
      `<p><strong>Quote Reference:</strong> #${reference}</p>`,
      `<p><strong>Total Items:</strong> ${quote.items.length}</p>`,
      `<p><strong>Estimated Total:</strong> ${formatTotal(quote.totalEstimate)}</p>`,
      `<p><strong>Valid Until:</strong> ${formatDate(quote.expiresAt)}</p>`,
      messageBlock,
      `<table><thead><tr><th>Product</th><th>Qty</th><th>Unit Price</th></tr></thead><tbody>${rows.join("")}</tbody></table>`,
    ].join("\n"),
  };
}

export function renderFollowUpEmail(quote: Quote, followUpType: FollowUpType, now: Date = new Date()): RenderedEmail {
  const reference = quoteReference(quote.id);
  const daysSinceQuote = Math.floor((now.getTime() - quote.createdAt.getTime()) / (24 * 60 * 60 * 1000));

  let title: string;
  let message: string;
  switch (followUpType) {
    case "reminder":
      title = "Friendly Reminder - Your Quote";
      message = `We wanted to follow up on the quote we sent you ${daysSinceQuote} days ago.`;
      break;
    case "expiring":
      title = "Your Quote Expires Soon";
      message = `Your quote is valid until ${formatDate(quote.expiresAt)}. Let us know if you'd like to proceed.`;
      break;
    default:
      title = "Following Up on Your Quote";
      message = "We hope you've had a chance to review your quote.";
  }

  return {
    subject: `${title} - Quote #${reference}`,
    html: [
      `<h2>${title}</h2>`,
      `<p>Dear ${escapeHtml(quote.customerInfo.name)},</p>`,
      `<p>${message}</p>`,
      `<p><strong>Quote Reference:</strong> #${reference}</p>`,
      `<p><strong>Quote Date:</strong> ${formatDate(quote.createdAt)}</p>`,
      `<p><strong>Total Items:</strong> ${quote.items.length}</p>`,
    ].join("\n"),
  };
}

function createSmtpTransport(settings: EmailSettings): MailTransport {
  const { host, port, user, password } = settings.smtp;
  if (!host) {
    throw new Error("SMTP host missing configuration");
  }

  return nodemailer.createTransport({
    host,
    port,
    secure: port === 465, // true for 465, false for other ports
    auth: user && password ? { user, pass: password } : undefined,
    connectionTimeout: 5000,
    greetingTimeout: 5000,
    socketTimeout: 10000,
  });
}

/**
 * Customer notifications over SMTP. When FEATURE_EMAIL_ENABLED is off every
 * send is a logged no-op that resolves false.
 */
export class EmailService implements NotificationDispatcher {
  private transporter: MailTransport | null;

  constructor(
    private readonly settings: EmailSettings,
    transporter?: MailTransport
  ) {
    this.transporter = transporter ?? null;
  }

  async sendStatusChange(quote: Quote, newStatus: QuoteStatus, notes: string | null): Promise<boolean> {
    return await this.deliver("status_change", quote, quote.customerInfo.email, renderStatusChangeEmail(quote, newStatus, notes));
  }

  async sendQuoteDocument(quote: Quote, products: CatalogProduct[], options: QuoteDocumentOptions): Promise<boolean> {
    return await this.deliver("quote_document", quote, options.recipientEmail, renderQuoteDocumentEmail(quote, products, options));
  }

  async sendFollowUp(quote: Quote, followUpType: FollowUpType): Promise<boolean> {
    return await this.deliver(`follow_up_${followUpType}`, quote, quote.customerInfo.email, renderFollowUpEmail(quote, followUpType));
  }

  private getTransporter(): MailTransport {
    if (!this.transporter) {
      this.transporter = createSmtpTransport(this.settings);
    }
    return this.transporter;
  }

  private async deliver(kind: string, quote: Quote, to: string, email: RenderedEmail): Promise<boolean> {
    // Operational kill switch: disable email during provider outages or bounce storms
    if (!this.settings.enabled) {
      logger.warn("email_disabled", {
        kind,
        quoteId: quote.id,
        recipient: this.maskEmail(to),
        feature: "FEATURE_EMAIL_ENABLED",
      });
      return false;
    }

    logger.info("email_send_start", { kind, quoteId: quote.id, recipientDomain: to.split("@")[1] });

    let timer: NodeJS.Timeout | undefined;
    try {
      const sendPromise = this.getTransporter().sendMail({
        from: `"${this.settings.fromName}" <${this.settings.from}>`,
        to,
        subject: email.subject,
        html: email.html,
      });
      const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error("Email send operation timed out")), SEND_TIMEOUT_MS);
      });

      const result = await Promise.race([sendPromise, timeoutPromise]);
      const messageId = result && typeof result === "object" ? Reflect.get(result, "messageId") : undefined;

      logger.info("email_send_success", { kind, quoteId: quote.id, messageId });
      return true;
    } catch (error) {
      logger.error("email_send_error", { kind, quoteId: quote.id, ...createSafeErrorContext(error) });
      throw error;
    } finally {
      if (timer) clearTimeout(timer);
    }
  }

  /**
   * Mask email address for privacy in logs
   */
  private maskEmail(email: string): string {
    const [local, domain] = email.split("@");
    if (local.length <= 2) return `${local.substring(0, 1)}***@${domain}`;
    return `${local.substring(0, 2)}***@${domain}`;
  }
}
