/**
 * Quote Routes Integration Tests
 *
 * Full Express app from createApp over in-memory repositories. Requests are
 * authenticated with real HS256 tokens signed with a test secret.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { createSecretKey } from 'crypto';
import type { Express } from 'express';
import { SignJWT } from 'jose';
import request from 'supertest';
import { createApp, type AppServices } from '../app';
import {
  InMemoryCatalog,
  InMemoryDirectory,
  InMemoryHistoryStore,
  InMemoryQuoteStore,
  RecordingDispatcher,
  fixedClock,
  makeCompany,
  makeIdentity,
  makeQuote,
} from './fakes';

const SECRET = 'test-secret-value-0123';

async function bearer(userId: string): Promise<string> {
  const token = await new SignJWT({})
    .setProtectedHeader({ alg: 'HS256' })
    .setSubject(userId)
    .setIssuedAt()
    .setExpirationTime('1h')
    .sign(createSecretKey(Buffer.from(SECRET, 'utf8')));
  return `Bearer ${token}`;
}

describe('Quote routes', () => {
  let app: Express;
  let services: AppServices;
  let quotes: InMemoryQuoteStore;
  let dispatcher: RecordingDispatcher;

  beforeEach(() => {
    quotes = new InMemoryQuoteStore();
    dispatcher = new RecordingDispatcher();
    const directory = new InMemoryDirectory();
    directory.addUser(makeIdentity({ id: 'user-customer', companyId: 'company-1' }));
    directory.addUser(makeIdentity({ id: 'user-stranger', companyId: 'company-2' }));
    directory.addUser(makeIdentity({ id: 'user-admin', role: 'admin' }));
    directory.addCompany(makeCompany({ id: 'company-1' }));
    directory.addCompany(makeCompany({ id: 'company-2', name: 'Other Co' }));

    quotes.seed(makeQuote({ id: 'quote-a', createdBy: 'user-customer', adminNotes: 'internal margin note' }));

    const built = createApp({
      repositories: {
        quotes,
        history: new InMemoryHistoryStore(),
        companies: directory,
        users: directory,
        catalog: new InMemoryCatalog(),
      },
      dispatcher,
      authTokenSecret: SECRET,
      quoteValidityDays: 30,
      notificationConcurrency: 1,
      now: fixedClock(),
    });
    app = built.app;
    services = built.services;
  });

  it('serves health checks without authentication', async () => {
    const health = await request(app).get('/health');
    const ready = await request(app).get('/ready');

    expect(health.status).toBe(200);
    expect(health.body.status).toBe('ok');
    expect(ready.status).toBe(200);
    expect(ready.body).toMatchObject({ status: 'ready', database: 'connected' });
  });

  it('echoes a valid X-Request-Id', async () => {
    const response = await request(app).get('/health').set('X-Request-Id', 'req-123');
    expect(response.headers['x-request-id']).toBe('req-123');
  });

  it('requires a bearer token on the API', async () => {
    const response = await request(app).get('/api/quotes');
    expect(response.status).toBe(401);
    expect(response.body).toEqual({ message: 'Authentication required' });
  });

  it('creates a quote from a snake_case body', async () => {
    const response = await request(app)
      .post('/api/quotes')
      .set('Authorization', await bearer('user-customer'))
      .send({
        customer_info: { name: 'Dana Buyer', email: 'dana@example.com' },
        items: [{ product_id: 'prod-1', product_name: 'Steel Bracket', quantity: 4, unit_price: 12.5 }],
      });

    expect(response.status).toBe(201);
    expect(response.body).toMatchObject({
      id: 'quote-1',
      status: 'draft',
      total_estimate: 50,
      created_by: 'user-customer',
      created_at: '2026-03-02T10:00:00.000Z',
      expires_at: '2026-04-01T10:00:00.000Z',
      customer_info: { name: 'Dana Buyer', email: 'dana@example.com', company: null, phone: null, address: null },
    });
    expect(response.body.items).toEqual([
      {
        product_id: 'prod-1',
        product_name: 'Steel Bracket',
        quantity: 4,
        unit_price: 12.5,
        original_price: null,
        discount_applied: 0,
        notes: null,
      },
    ]);
    expect(response.body).not.toHaveProperty('admin_notes');
  });

  it('answers 400 with a readable message for an invalid body', async () => {
    const response = await request(app)
      .post('/api/quotes')
      .set('Authorization', await bearer('user-customer'))
      .send({ customer_info: { name: 'Dana Buyer', email: 'dana@example.com' }, items: [] });

    expect(response.status).toBe(400);
    expect(response.body.message).toMatch(/^Validation error/);
  });

  it('answers 400 for an out-of-range page size', async () => {
    const response = await request(app)
      .get('/api/quotes?limit=500')
      .set('Authorization', await bearer('user-admin'));
    expect(response.status).toBe(400);
  });

  it('shows admin notes to staff only', async () => {
    const asAdmin = await request(app).get('/api/quotes/quote-a').set('Authorization', await bearer('user-admin'));
    const asOwner = await request(app).get('/api/quotes/quote-a').set('Authorization', await bearer('user-customer'));

    expect(asAdmin.body.admin_notes).toBe('internal margin note');
    expect(asOwner.status).toBe(200);
    expect(asOwner.body).not.toHaveProperty('admin_notes');
  });

  it('maps domain errors to their status and code', async () => {
    const forbidden = await request(app).get('/api/quotes/quote-a').set('Authorization', await bearer('user-stranger'));
    const missing = await request(app).get('/api/quotes/nope').set('Authorization', await bearer('user-admin'));

    expect(forbidden.status).toBe(403);
    expect(forbidden.body).toEqual({ message: 'Access denied', code: 'FORBIDDEN' });
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ message: 'Quote not found', code: 'NOT_FOUND' });
  });

  it('changes status and rejects a no-op change', async () => {
    const auth = await bearer('user-admin');
    const changed = await request(app)
      .post('/api/quotes/quote-a/status-change')
      .set('Authorization', auth)
      .send({ new_status: 'approved', admin_notes: 'Approved by phone', notify_customer: true });
    await services.notifications.onIdle();

    expect(changed.status).toBe(200);
    expect(changed.body).toEqual({
      message: 'Quote status changed from draft to approved',
      old_status: 'draft',
      new_status: 'approved',
      notification_sent: true,
    });
    expect(dispatcher.sent).toEqual([
      { kind: 'status_change', quoteId: 'quote-a', newStatus: 'approved', notes: 'Approved by phone' },
    ]);

    const again = await request(app)
      .post('/api/quotes/quote-a/status-change')
      .set('Authorization', auth)
      .send({ new_status: 'approved' });
    expect(again.status).toBe(400);
    expect(again.body).toEqual({ message: 'Quote is already in approved status', code: 'NO_OP_TRANSITION' });
  });

  it('returns the history of a quote', async () => {
    const auth = await bearer('user-admin');
    await request(app).post('/api/quotes/quote-a/status-change').set('Authorization', auth).send({ new_status: 'sent' });

    const response = await request(app).get('/api/quotes/quote-a/history').set('Authorization', auth);
    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      quote_id: 'quote-a',
      quote_status: 'sent',
      history: [
        {
          id: 'history-1',
          action: 'status_changed',
          field_changed: 'status',
          old_value: 'draft',
          new_value: 'sent',
          changed_by: 'user-admin',
          timestamp: '2026-03-02T10:00:00.000Z',
          notes: 'Status changed from draft to sent',
        },
      ],
    });
  });

  it('applies a discount', async () => {
    const response = await request(app)
      .post('/api/quotes/quote-a/bulk-discount')
      .set('Authorization', await bearer('user-admin'))
      .send({ discount_type: 'percentage', discount_value: 10, reason: 'Volume order' });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      message: 'Discount applied successfully',
      total_discount: 100,
      new_total: 900,
      items_affected: 1,
    });
  });

  it('runs bulk actions and reports per-item results', async () => {
    const response = await request(app)
      .post('/api/quotes/bulk-action')
      .set('Authorization', await bearer('user-admin'))
      .send({ quote_ids: ['quote-a', 'quote-missing'], action: 'approve' });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      message: 'Bulk action completed',
      action: 'approve',
      processed_count: 1,
      failed_count: 1,
      processed_quotes: [{ quote_id: 'quote-a', action: 'approve', old_status: 'draft', new_status: 'approved' }],
      failed_quotes: [{ quote_id: 'quote-missing', reason: 'Quote not found' }],
    });
  });

  it('forbids bulk actions for non-staff', async () => {
    const response = await request(app)
      .post('/api/quotes/bulk-action')
      .set('Authorization', await bearer('user-customer'))
      .send({ quote_ids: ['quote-a'], action: 'delete' });

    expect(response.status).toBe(403);
    expect(response.body.message).toBe('Only admins and managers can run bulk actions');
  });

  it('queues the quote email and answers 202', async () => {
    const response = await request(app)
      .post('/api/quotes/quote-a/email')
      .set('Authorization', await bearer('user-customer'))
      .send({ custom_message: 'Thanks for your business' });
    await services.notifications.onIdle();

    expect(response.status).toBe(202);
    expect(response.body).toEqual({
      message: 'Quote email has been queued for sending',
      recipient_email: 'dana@example.com',
      queued: true,
    });
    expect((await quotes.findById('quote-a'))?.status).toBe('sent');
  });

  it('lists company quotes', async () => {
    const response = await request(app)
      .get('/api/companies/company-1/quotes')
      .set('Authorization', await bearer('user-customer'));

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      company_id: 'company-1',
      company_name: 'Acme Fabrication',
      quote_sharing_enabled: false,
      total_count: 1,
    });
    expect(response.body.quotes[0].id).toBe('quote-a');
  });

  it('deletes a quote as staff', async () => {
    const response = await request(app).delete('/api/quotes/quote-a').set('Authorization', await bearer('user-admin'));
    expect(response.status).toBe(200);
    expect(response.body).toEqual({ message: 'Quote deleted successfully' });
  });

  it('refuses to delete a quote that is no longer a draft', async () => {
    quotes.seed(makeQuote({ id: 'quote-sent', status: 'sent' }));
    const response = await request(app).delete('/api/quotes/quote-sent').set('Authorization', await bearer('user-admin'));

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ message: 'Can only delete draft quotes', code: 'INVALID_ARGUMENT' });
    expect(await quotes.findById('quote-sent')).toBeDefined();
  });

  it('serves the status breakdown and summary to staff', async () => {
    const breakdown = await request(app)
      .get('/api/analytics/quotes/status-breakdown')
      .set('Authorization', await bearer('user-admin'));
    expect(breakdown.status).toBe(200);
    expect(breakdown.body).toEqual([{ status: 'draft', count: 1, percentage: 100 }]);

    const summary = await request(app).get('/api/analytics/summary').set('Authorization', await bearer('user-admin'));
    expect(summary.status).toBe(200);
    expect(summary.body).toEqual({
      total_quotes: 1,
      recent_quotes: 0,
      pending_quotes: 1,
      converted_quotes: 0,
      conversion_rate: 0,
      user_role: 'admin',
    });
  });

  it('forbids analytics without analytics:read', async () => {
    const response = await request(app).get('/api/analytics/summary').set('Authorization', await bearer('user-customer'));

    expect(response.status).toBe(403);
    expect(response.body.message).toBe('Insufficient permissions to view analytics');
  });
});
