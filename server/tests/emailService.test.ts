/**
 * Email Service Tests
 *
 * Rendering and delivery against a recording transport; no SMTP connection is made.
 */

import { describe, it, expect } from '@jest/globals';
import type { SendMailOptions } from 'nodemailer';
import { classifyEmailError, createSafeErrorContext } from '../emailErrors';
import {
  EmailService,
  escapeHtml,
  quoteReference,
  renderFollowUpEmail,
  renderQuoteDocumentEmail,
  renderStatusChangeEmail,
  type EmailSettings,
  type MailTransport,
} from '../emailService';
import { makeQuote } from './fakes';

class RecordingTransport implements MailTransport {
  readonly mails: SendMailOptions[] = [];
  failWith: Error | null = null;

  async sendMail(mail: SendMailOptions): Promise<unknown> {
    if (this.failWith) throw this.failWith;
    this.mails.push(mail);
    return { messageId: `<msg-${this.mails.length}@test>` };
  }
}

function settings(enabled: boolean): EmailSettings {
  return {
    enabled,
    from: 'quotes@example.com',
    fromName: 'Quote Desk',
    smtp: { host: 'smtp.example.com', port: 587, user: undefined, password: undefined },
  };
}

const quote = makeQuote({ id: 'a1b2c3d4-e5f6-7890-abcd-ef0123456789' });

describe('email rendering', () => {
  it('uses the first 8 characters of the id as reference', () => {
    expect(quoteReference(quote.id)).toBe('A1B2C3D4');
  });

  it('escapes markup', () => {
    expect(escapeHtml(`<b>"Tom" & 'Jerry'</b>`)).toBe('&lt;b&gt;&quot;Tom&quot; &amp; &#39;Jerry&#39;&lt;/b&gt;');
  });

  it('renders status change subjects per status', () => {
    expect(renderStatusChangeEmail(quote, 'approved', null).subject)
      .toBe('Quote #A1B2C3D4 Status Update - Your quote has been approved');
    expect(renderStatusChangeEmail(quote, 'pending', null).subject)
      .toBe('Quote #A1B2C3D4 Status Update - Quote Status Update');
  });

  it('includes escaped notes in a status change', () => {
    const { html } = renderStatusChangeEmail(quote, 'rejected', 'Lead time > 6 weeks', new Date('2026-03-02T10:00:00.000Z'));
    expect(html).toContain('<p>Lead time &gt; 6 weeks</p>');
    expect(html).toContain('<p><strong>Date:</strong> 2026-03-02</p>');
  });

  it('renders the quote document with unpriced items as to be quoted', () => {
    const withUnpriced = makeQuote({
      id: quote.id,
      items: [{ productId: 'prod-9', productName: 'Custom Jig', quantity: 1, unitPrice: null, originalPrice: null, discountApplied: 0, notes: null }],
      totalEstimate: null,
    });
    const email = renderQuoteDocumentEmail(withUnpriced, [], { customMessage: 'See you Tuesday' });

    expect(email.subject).toBe('Quote #A1B2C3D4 - Acme Fabrication');
    expect(email.html).toContain('<tr><td>Custom Jig</td><td>1</td><td>To be quoted</td></tr>');
    expect(email.html).toContain('<p><strong>Estimated Total:</strong> To be quoted</p>');
    expect(email.html).toContain('<p>See you Tuesday</p>');
  });

  it('renders follow-up titles', () => {
    expect(renderFollowUpEmail(quote, 'expiring').subject).toBe('Your Quote Expires Soon - Quote #A1B2C3D4');
    const reminder = renderFollowUpEmail(quote, 'reminder', new Date('2026-02-11T09:00:00.000Z'));
    expect(reminder.html).toContain('the quote we sent you 10 days ago');
  });
});

describe('EmailService', () => {
  it('sends through the transport with the configured sender', async () => {
    const transport = new RecordingTransport();
    const service = new EmailService(settings(true), transport);

    await expect(service.sendFollowUp(quote, 'general')).resolves.toBe(true);
    expect(transport.mails).toHaveLength(1);
    expect(transport.mails[0]).toMatchObject({
      from: '"Quote Desk" <quotes@example.com>',
      to: 'dana@example.com',
      subject: 'Following Up on Your Quote - Quote #A1B2C3D4',
    });
  });

  it('sends the quote document to the chosen recipient', async () => {
    const transport = new RecordingTransport();
    const service = new EmailService(settings(true), transport);

    await service.sendQuoteDocument(quote, [], { recipientEmail: 'buyer@example.com' });
    expect(transport.mails[0].to).toBe('buyer@example.com');
  });

  it('is a no-op resolving false when email is disabled', async () => {
    const transport = new RecordingTransport();
    const service = new EmailService(settings(false), transport);

    await expect(service.sendStatusChange(quote, 'approved', null)).resolves.toBe(false);
    expect(transport.mails).toHaveLength(0);
  });

  it('rethrows transport failures', async () => {
    const transport = new RecordingTransport();
    transport.failWith = new Error('Invalid login: 535 Authentication failed');
    const service = new EmailService(settings(true), transport);

    await expect(service.sendStatusChange(quote, 'approved', null)).rejects.toThrow('Invalid login');
  });
});

describe('email error classification', () => {
  it('classifies by nodemailer code first', () => {
    const error = Object.assign(new Error('connect refused'), { code: 'ECONNREFUSED' });
    expect(classifyEmailError(error)).toEqual({ code: 'EMAIL_CONNECTION_REFUSED', category: 'NETWORK' });
  });

  it('falls back to message matching', () => {
    expect(classifyEmailError(new Error('Email send operation timed out'))).toEqual({
      code: 'EMAIL_SEND_TIMEOUT',
      category: 'TIMEOUT',
    });
    expect(classifyEmailError('boom').code).toBe('EMAIL_UNKNOWN_ERROR');
  });

  it('builds a log context without secrets', () => {
    const error = Object.assign(new Error('Message rejected'), { code: 'EMESSAGE', responseCode: 554 });
    expect(createSafeErrorContext(error)).toEqual({
      emailErrorCode: 'SMTP_MESSAGE_REJECTED',
      emailErrorCategory: 'SMTP',
      errorName: 'Error',
      errorCode: 'EMESSAGE',
      errorMessage: 'Message rejected',
      smtpResponseCode: 554,
    });
  });
});
