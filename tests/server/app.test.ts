import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createApp } from '../../src/server/app.js';
import { TokenManager } from '../../src/services/auth.js';
import { CrmService } from '../../src/services/crm.js';
import { InboundRateLimiter } from '../../src/services/rate-limiter.js';
import { fail, ok } from '../../src/lib/outcome.js';
import { FakeRequester } from '../helpers/fake-requester.js';
import { listen, postJson, type RunningServer } from '../helpers/http.js';

const CONTACT = {
  email: 'ada@example.com',
  firstname: 'Ada',
  lastname: 'Lovelace',
  phone: '555-0100',
};

describe('HTTP app', () => {
  let api: FakeRequester;
  let running: RunningServer;

  async function start(rateLimit = { limit: 100, windowMs: 60000 }): Promise<string> {
    const tokens = new TokenManager({
      clientId: 'test-client-id',
      clientSecret: 'test-secret',
      refreshToken: 'test-refresh-token',
    });
    const app = createApp({
      crm: new CrmService(api),
      tokens,
      rateLimiter: new InboundRateLimiter(rateLimit),
    });
    running = await listen(app);
    return running.baseUrl;
  }

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    api = new FakeRequester();
  });

  afterEach(async () => {
    await running.close();
    vi.restoreAllMocks();
  });

  describe('GET /api/v1', () => {
    it('should return the welcome envelope', async () => {
      const baseUrl = await start();

      const res = await fetch(`${baseUrl}/api/v1`);

      expect(res.status).toBe(200);
      expect(res.headers.get('x-request-id')).toMatch(/^[0-9a-f-]{36}$/);
      expect(await res.json()).toEqual({
        success: true,
        message: 'Welcome to crm-gateway',
        status_code: 200,
        data: {},
      });
    });
  });

  describe('POST /api/v1/hubspot/contact', () => {
    it('should answer 201 when the contact is created', async () => {
      api.enqueue(ok({ results: [] }), ok({ id: '501', properties: CONTACT }));
      const baseUrl = await start();

      const res = await postJson(`${baseUrl}/api/v1/hubspot/contact`, CONTACT);

      expect(res.status).toBe(201);
      expect(await res.json()).toEqual({
        success: true,
        message: 'Contact created successfully.',
        status_code: 201,
        data: { id: '501', properties: CONTACT },
      });
    });

    it('should answer 200 when the contact is updated', async () => {
      api.enqueue(ok({ results: [{ id: '501', properties: {} }] }), ok({ id: '501', properties: CONTACT }));
      const baseUrl = await start();

      const res = await postJson(`${baseUrl}/api/v1/hubspot/contact`, CONTACT);

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ message: 'Contact updated successfully.', status_code: 200 });
    });

    it('should answer 400 when no payload is sent', async () => {
      const baseUrl = await start();

      const res = await fetch(`${baseUrl}/api/v1/hubspot/contact`, { method: 'POST' });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        success: false,
        error_message: 'No JSON payload provided',
        status_code: 400,
        data: {},
      });
    });

    it('should answer 400 for malformed JSON', async () => {
      const baseUrl = await start();

      const res = await fetch(`${baseUrl}/api/v1/hubspot/contact`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"email":',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ success: false, error_message: 'Malformed JSON payload' });
    });

    it('should answer 422 with field issues for invalid data', async () => {
      const baseUrl = await start();

      const res = await postJson(`${baseUrl}/api/v1/hubspot/contact`, { ...CONTACT, email: 'nope' });

      expect(res.status).toBe(422);
      expect(await res.json()).toEqual({
        success: false,
        error_message: 'Invalid contact data.',
        status_code: 422,
        data: { email: ['Invalid email'] },
      });
    });

    it('should map upstream outcomes to their status codes', async () => {
      api.enqueue(fail('ServiceUnavailable', 'Exceeded max retries (3) for CRM API request.', { status: 503 }));
      const baseUrl = await start();

      const res = await postJson(`${baseUrl}/api/v1/hubspot/contact`, CONTACT);

      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({
        success: false,
        error_message: 'Exceeded max retries (3) for CRM API request.',
        status_code: 503,
        data: { status: 503 },
      });
    });

    it('should answer 500 when a handler throws', async () => {
      const baseUrl = await start();

      const res = await postJson(`${baseUrl}/api/v1/hubspot/contact`, CONTACT);

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        success: false,
        error_message: 'Internal Server Error',
        status_code: 500,
        data: 'Unexpected CRM request: POST /crm/v3/objects/contacts/search',
      });
    });
  });

  describe('POST /api/v1/hubspot/deals', () => {
    const deal = { dealname: 'Annual plan', amount: 1200, dealstage: 'appointmentscheduled' };

    it('should return the action for each deal', async () => {
      api.enqueue(
        ok({ id: '501', properties: {} }),
        ok({ results: [] }),
        ok({ id: '900', properties: deal }),
        ok({})
      );
      const baseUrl = await start();

      const res = await postJson(`${baseUrl}/api/v1/hubspot/deals`, { contactId: 501, deals: [deal] });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        success: true,
        message: 'Deals processed successfully.',
        status_code: 200,
        data: [{ action: 'created', deal: { id: '900', properties: deal } }],
      });
      expect(api.calls[0]?.path).toBe('/crm/v3/objects/contacts/501');
    });

    it('should require a contactId', async () => {
      const baseUrl = await start();

      const res = await postJson(`${baseUrl}/api/v1/hubspot/deals`, { deals: [deal] });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error_message: 'contactId is required.' });
    });

    it('should require at least one deal', async () => {
      const baseUrl = await start();

      const res = await postJson(`${baseUrl}/api/v1/hubspot/deals`, { contactId: '501', deals: [] });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error_message: "At least one deal object is required in 'deals' array.",
      });
    });

    it('should answer 404 when the contact is missing', async () => {
      api.enqueue(fail('NotFound', 'Resource not found in CRM', ''));
      const baseUrl = await start();

      const res = await postJson(`${baseUrl}/api/v1/hubspot/deals`, { contactId: '404', deals: [deal] });

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        success: false,
        error_message: 'Contact not found',
        status_code: 404,
        data: { contactId: '404', upstream: '' },
      });
    });
  });

  describe('POST /api/v1/hubspot/tickets', () => {
    it('should require at least one ticket', async () => {
      const baseUrl = await start();

      const res = await postJson(`${baseUrl}/api/v1/hubspot/tickets`, { contactId: '501' });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error_message: "At least one ticket object is required in 'tickets' array.",
      });
    });

    it('should return the created tickets', async () => {
      const ticket = {
        subject: 'Cannot log in',
        description: 'Password reset link expired',
        category: 'general_inquiry',
        pipeline: '0',
        hs_ticket_priority: 'LOW',
        hs_pipeline_stage: '1',
      };
      api.enqueue(ok({ id: '501', properties: {} }), ok({ results: [] }), ok({ id: '700', properties: ticket }), ok({}));
      const baseUrl = await start();

      const res = await postJson(`${baseUrl}/api/v1/hubspot/tickets`, { contactId: '501', tickets: [ticket] });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        success: true,
        message: 'Tickets created successfully.',
        status_code: 200,
        data: [{ action: 'created', ticket: { id: '700', properties: ticket } }],
      });
    });
  });

  describe('GET /api/v1/hubspot/new-crm-objects', () => {
    it('should require since', async () => {
      const baseUrl = await start();

      const res = await fetch(`${baseUrl}/api/v1/hubspot/new-crm-objects`);

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error_message: "Query parameter 'since' is required, e.g. ?since=YYYY-MM-DDT00:00:00Z",
      });
    });

    it('should pass limit and after through to the searches', async () => {
      api.enqueue(ok({ results: [] }), ok({ results: [] }), ok({ results: [] }));
      const baseUrl = await start();

      const res = await fetch(
        `${baseUrl}/api/v1/hubspot/new-crm-objects?since=2026-01-01T00:00:00Z&limit=25&after=cursor-9`
      );

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        success: true,
        message: 'Retrieved newly created CRM objects.',
        status_code: 200,
        data: {
          contacts: [],
          contacts_paging: null,
          deals: [],
          deals_paging: null,
          tickets: [],
          tickets_paging: null,
        },
      });
      expect(api.calls[0]?.body).toMatchObject({ limit: 25, after: 'cursor-9' });
    });

    it('should default the limit to 10 when it is not a number', async () => {
      api.enqueue(ok({}), ok({}), ok({}));
      const baseUrl = await start();

      await fetch(`${baseUrl}/api/v1/hubspot/new-crm-objects?since=2026-01-01T00:00:00Z&limit=ten`);

      expect(api.calls[0]?.body).toMatchObject({ limit: 10 });
    });
  });

  describe('inbound rate limiting', () => {
    it('should answer 429 on request limit + 1', async () => {
      const baseUrl = await start({ limit: 2, windowMs: 60000 });

      const first = await fetch(`${baseUrl}/api/v1`);
      const second = await fetch(`${baseUrl}/api/v1`);
      const third = await fetch(`${baseUrl}/api/v1`);

      expect(first.status).toBe(200);
      expect(second.status).toBe(200);
      expect(third.status).toBe(429);
      expect(Number(third.headers.get('retry-after'))).toBeGreaterThan(0);
      expect(await third.json()).toEqual({
        success: false,
        error_message: 'Too many requests',
        status_code: 429,
        data: {},
      });
    });
  });

  describe('operational endpoints', () => {
    it('should report health', async () => {
      const baseUrl = await start();

      const res = await fetch(`${baseUrl}/health`);
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({
        status: 'healthy',
        components: {
          auth: { status: 'healthy', details: 'No access token cached yet' },
          rateLimiter: { status: 'healthy', details: '1 callers tracked (100 requests / 60000ms)' },
        },
      });
    });

    it('should expose Prometheus metrics', async () => {
      const baseUrl = await start();

      const res = await fetch(`${baseUrl}/metrics`);

      expect(res.status).toBe(200);
      expect(res.headers.get('content-type')).toContain('text/plain');
      expect(await res.text()).toContain('# TYPE inbound_rate_limited_total counter');
    });

    it('should answer 404 for unknown routes', async () => {
      const baseUrl = await start();

      const res = await fetch(`${baseUrl}/api/v2/unknown`);

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        success: false,
        error_message: 'Route not found',
        status_code: 404,
        data: {},
      });
    });
  });
});
