/**
 * CRM Routes
 * /api/v1/hubspot/* - 只負責檢查請求形狀並把 Result 轉成回應
 */

import { Router, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import { sendError, sendOutcome, sendSuccess } from '../lib/responses.js';
import { DEFAULT_SEARCH_LIMIT, type CrmService } from '../services/crm.js';

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/**
 * express 4 不會處理 async handler 的 rejection，交給錯誤中介層
 */
export function asyncHandler(handler: AsyncHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function readContactId(body: Record<string, unknown>): string | undefined {
  const value = body.contactId;
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

export function createCrmRouter(crm: CrmService): Router {
  const router = Router();

  router.post(
    '/contact',
    asyncHandler(async (req, res) => {
      const body: unknown = req.body;
      if (!isRecord(body) || Object.keys(body).length === 0) {
        sendError(res, 'No JSON payload provided', 400);
        return;
      }

      const result = await crm.upsertContact(body);
      if (!result.ok) {
        sendOutcome(res, result.error);
        return;
      }

      if (result.value.action === 'created') {
        sendSuccess(res, 'Contact created successfully.', 201, result.value.record);
      } else {
        sendSuccess(res, 'Contact updated successfully.', 200, result.value.record);
      }
    })
  );

  router.post(
    '/deals',
    asyncHandler(async (req, res) => {
      const body: unknown = req.body;
      if (!isRecord(body) || Object.keys(body).length === 0) {
        sendError(res, 'No JSON payload provided.', 400);
        return;
      }

      const contactId = readContactId(body);
      if (contactId === undefined) {
        sendError(res, 'contactId is required.', 400);
        return;
      }
      const deals = body.deals;
      if (!Array.isArray(deals) || deals.length === 0) {
        sendError(res, "At least one deal object is required in 'deals' array.", 400);
        return;
      }

      const result = await crm.upsertDeals(contactId, deals);
      if (!result.ok) {
        sendOutcome(res, result.error);
        return;
      }

      sendSuccess(
        res,
        'Deals processed successfully.',
        200,
        result.value.map(({ action, record }) => ({ action, deal: record }))
      );
    })
  );

  router.post(
    '/tickets',
    asyncHandler(async (req, res) => {
      const body: unknown = req.body;
      if (!isRecord(body) || Object.keys(body).length === 0) {
        sendError(res, 'No JSON payload provided.', 400);
        return;
      }

      const contactId = readContactId(body);
      if (contactId === undefined) {
        sendError(res, 'contactId is required.', 400);
        return;
      }
      const tickets = body.tickets;
      if (!Array.isArray(tickets) || tickets.length === 0) {
        sendError(res, "At least one ticket object is required in 'tickets' array.", 400);
        return;
      }

      const result = await crm.createTickets(contactId, tickets);
      if (!result.ok) {
        sendOutcome(res, result.error);
        return;
      }

      sendSuccess(
        res,
        'Tickets created successfully.',
        200,
        result.value.map(({ action, record }) => ({ action, ticket: record }))
      );
    })
  );

  router.get(
    '/new-crm-objects',
    asyncHandler(async (req, res) => {
      const since = queryString(req.query.since);
      if (since === undefined) {
        sendError(res, "Query parameter 'since' is required, e.g. ?since=YYYY-MM-DDT00:00:00Z", 400);
        return;
      }

      const rawLimit = queryString(req.query.limit);
      const parsedLimit = rawLimit === undefined ? NaN : Number.parseInt(rawLimit, 10);
      const limit = Number.isNaN(parsedLimit) ? DEFAULT_SEARCH_LIMIT : parsedLimit;
      const after = queryString(req.query.after);

      const result = await crm.retrieveNewCrmObjects(since, limit, after);
      if (!result.ok) {
        sendOutcome(res, result.error);
        return;
      }

      sendSuccess(res, 'Retrieved newly created CRM objects.', 200, result.value);
    })
  );

  return router;
}
