/**
 * CRM Service
 * 聯絡人、交易、工單的建立與更新 - 把入站欄位一對一轉成 HubSpot 屬性
 */

import { loggers } from '../lib/logger.js';
import { fail, ok, type Result } from '../lib/outcome.js';
import {
  ContactSchema,
  DealSchema,
  TicketSchema,
  flattenIssues,
  type ContactInput,
  type DealInput,
  type TicketInput,
} from '../lib/schemas.js';
import type {
  AssociationsResponse,
  ContactWithDeals,
  CrmObject,
  CrmObjectType,
  CrmProperties,
  NewCrmObjects,
  SearchRequest,
  SearchResponse,
  UpsertAction,
} from '../types/crm.js';
import type { CrmRequester } from './api.js';

const OBJECTS_ENDPOINT = '/crm/v3/objects';
const ASSOCIATIONS_ENDPOINT = '/crm/v4/objects';

// HubSpot search API 單頁上限
const MAX_SEARCH_LIMIT = 100;
export const DEFAULT_SEARCH_LIMIT = 10;

const SEARCH_PROPERTIES: Record<CrmObjectType, string[]> = {
  contacts: ['email', 'firstname', 'lastname', 'phone', 'createdate'],
  deals: ['dealname', 'amount', 'dealstage', 'pipeline', 'createdate'],
  // 與建立 ticket 時寫入的欄位一致
  tickets: ['subject', 'description', 'category', 'pipeline', 'hs_pipeline_stage', 'hs_ticket_priority', 'createdate'],
};

export interface UpsertResult {
  record: CrmObject;
  action: UpsertAction;
}

export class CrmService {
  constructor(private readonly api: CrmRequester) {}

  /**
   * 依 email 建立或更新聯絡人
   */
  async upsertContact(data: unknown): Promise<Result<UpsertResult>> {
    const parsed = ContactSchema.safeParse(data);
    if (!parsed.success) {
      loggers.crm.warn('Invalid contact data', { issues: flattenIssues(parsed.error) });
      return fail('UnprocessableEntity', 'Invalid contact data.', flattenIssues(parsed.error));
    }

    const contact: ContactInput = parsed.data;
    const existing = await this.findContactByEmail(contact.email);
    if (!existing.ok) {
      return existing;
    }

    if (existing.value !== null) {
      loggers.crm.info('Contact found, updating', { contactId: existing.value });
      const updated = await this.updateObject('contacts', existing.value, contact);
      return updated.ok ? ok<UpsertResult>({ record: updated.value, action: 'updated' }) : updated;
    }

    loggers.crm.info('No existing contact, creating');
    const created = await this.createObject('contacts', contact);
    return created.ok ? ok<UpsertResult>({ record: created.value, action: 'created' }) : created;
  }

  /**
   * 搜尋 email 完全相符的聯絡人
   * @returns 聯絡人 ID，不存在時為 null
   */
  async findContactByEmail(email: string): Promise<Result<string | null>> {
    return this.findIdByProperty('contacts', 'email', email);
  }

  /**
   * 依 dealname 建立或更新多筆交易，並關聯到指定聯絡人
   * 所有交易先全部驗證，任何一筆不合法就不發出任何寫入
   */
  async upsertDeals(contactId: string, deals: unknown[]): Promise<Result<UpsertResult[]>> {
    const validDeals: DealInput[] = [];
    for (const [index, deal] of deals.entries()) {
      const parsed = DealSchema.safeParse(deal);
      if (!parsed.success) {
        return fail('UnprocessableEntity', 'Invalid deal data', { index, issues: flattenIssues(parsed.error) });
      }
      validDeals.push(parsed.data);
    }

    const contact = await this.assertContactExists(contactId);
    if (!contact.ok) {
      return contact;
    }

    const results: UpsertResult[] = [];
    for (const deal of validDeals) {
      const existing = await this.findIdByProperty('deals', 'dealname', deal.dealname);
      if (!existing.ok) {
        return existing;
      }

      const saved =
        existing.value !== null
          ? await this.updateObject('deals', existing.value, deal)
          : await this.createObject('deals', deal);
      if (!saved.ok) {
        return saved;
      }

      const associated = await this.associate('deals', saved.value.id, 'contacts', contactId);
      if (!associated.ok) {
        return associated;
      }

      const action: UpsertAction = existing.value !== null ? 'updated' : 'created';
      loggers.crm.info(`Deal ${action}`, { dealId: saved.value.id, contactId });
      results.push({ record: saved.value, action });
    }

    return ok(results);
  }

  /**
   * 建立工單（永遠是新建），並關聯到聯絡人以及該聯絡人的所有交易
   */
  async createTickets(contactId: string, tickets: unknown[]): Promise<Result<UpsertResult[]>> {
    const validTickets: TicketInput[] = [];
    for (const [index, ticket] of tickets.entries()) {
      const parsed = TicketSchema.safeParse(ticket);
      if (!parsed.success) {
        return fail('UnprocessableEntity', 'Invalid ticket data', { index, issues: flattenIssues(parsed.error) });
      }
      validTickets.push(parsed.data);
    }

    const contact = await this.assertContactExists(contactId);
    if (!contact.ok) {
      return contact;
    }

    const dealIds = await this.fetchAssociatedIds('contacts', contactId, 'deals');
    if (!dealIds.ok) {
      return dealIds;
    }

    const results: UpsertResult[] = [];
    for (const ticket of validTickets) {
      const created = await this.createObject('tickets', ticket);
      if (!created.ok) {
        return created;
      }
      const ticketId = created.value.id;

      const toContact = await this.associate('tickets', ticketId, 'contacts', contactId);
      if (!toContact.ok) {
        return toContact;
      }

      for (const dealId of dealIds.value) {
        const toDeal = await this.associate('tickets', ticketId, 'deals', dealId);
        if (!toDeal.ok) {
          return toDeal;
        }
      }

      loggers.crm.info('Ticket created', { ticketId, contactId, dealCount: dealIds.value.length });
      results.push({ record: created.value, action: 'created' });
    }

    return ok(results);
  }

  /**
   * 取得 since 之後建立的聯絡人（含關聯交易）、交易與工單
   * 三種物件共用同一個 after 游標，各自回傳自己的 paging
   */
  async retrieveNewCrmObjects(
    since: string,
    limit: number = DEFAULT_SEARCH_LIMIT,
    after?: string
  ): Promise<Result<NewCrmObjects>> {
    const sinceMs = Date.parse(since);
    if (Number.isNaN(sinceMs)) {
      return fail('BadRequest', "Query parameter 'since' must be an ISO 8601 timestamp", since);
    }
    const requested = Number.isFinite(limit) ? Math.trunc(limit) : DEFAULT_SEARCH_LIMIT;
    const pageSize = Math.min(Math.max(requested, 1), MAX_SEARCH_LIMIT);

    const contacts = await this.searchCreatedSince('contacts', sinceMs, pageSize, after);
    if (!contacts.ok) {
      return contacts;
    }
    const deals = await this.searchCreatedSince('deals', sinceMs, pageSize, after);
    if (!deals.ok) {
      return deals;
    }
    const tickets = await this.searchCreatedSince('tickets', sinceMs, pageSize, after);
    if (!tickets.ok) {
      return tickets;
    }

    const enriched: ContactWithDeals[] = [];
    for (const contact of contacts.value.results ?? []) {
      const associatedDeals = await this.fetchAssociatedDeals(contact.id);
      if (!associatedDeals.ok) {
        return associatedDeals;
      }
      enriched.push({ ...contact, associatedDeals: associatedDeals.value });
    }

    return ok({
      contacts: enriched,
      contacts_paging: contacts.value.paging ?? null,
      deals: deals.value.results ?? [],
      deals_paging: deals.value.paging ?? null,
      tickets: tickets.value.results ?? [],
      tickets_paging: tickets.value.paging ?? null,
    });
  }

  /**
   * 聯絡人不存在（或已封存）時回傳 NotFound
   */
  async assertContactExists(contactId: string): Promise<Result<CrmObject>> {
    const result = await this.api.request<CrmObject>('GET', `${OBJECTS_ENDPOINT}/contacts/${encodeURIComponent(contactId)}`);
    if (!result.ok && result.error.kind === 'NotFound') {
      return fail('NotFound', 'Contact not found', { contactId, upstream: result.error.detail });
    }
    return result;
  }

  private async fetchAssociatedDeals(contactId: string): Promise<Result<CrmObject[]>> {
    const ids = await this.fetchAssociatedIds('contacts', contactId, 'deals');
    if (!ids.ok) {
      return ids;
    }
    if (ids.value.length === 0) {
      return ok([]);
    }

    const batch = await this.api.request<SearchResponse>('POST', `${OBJECTS_ENDPOINT}/deals/batch/read`, {
      inputs: ids.value.map((id) => ({ id })),
      properties: SEARCH_PROPERTIES.deals,
    });
    return batch.ok ? ok(batch.value.results ?? []) : batch;
  }

  private async fetchAssociatedIds(
    fromType: CrmObjectType,
    fromId: string,
    toType: CrmObjectType
  ): Promise<Result<string[]>> {
    const result = await this.api.request<AssociationsResponse>(
      'GET',
      `${ASSOCIATIONS_ENDPOINT}/${fromType}/${encodeURIComponent(fromId)}/associations/${toType}`
    );
    if (!result.ok) {
      return result;
    }
    return ok((result.value.results ?? []).map((item) => String(item.toObjectId)));
  }

  private async findIdByProperty(
    type: CrmObjectType,
    propertyName: string,
    value: string
  ): Promise<Result<string | null>> {
    const payload: SearchRequest = {
      filterGroups: [{ filters: [{ propertyName, operator: 'EQ', value }] }],
      properties: SEARCH_PROPERTIES[type],
      limit: 1,
    };

    const result = await this.api.request<SearchResponse>('POST', `${OBJECTS_ENDPOINT}/${type}/search`, payload);
    if (!result.ok) {
      return result;
    }

    const first = result.value.results?.[0];
    return ok(first ? first.id : null);
  }

  private async searchCreatedSince(
    type: CrmObjectType,
    sinceMs: number,
    limit: number,
    after?: string
  ): Promise<Result<SearchResponse>> {
    const payload: SearchRequest = {
      filterGroups: [{ filters: [{ propertyName: 'createdate', operator: 'GTE', value: String(sinceMs) }] }],
      properties: SEARCH_PROPERTIES[type],
      sorts: [{ propertyName: 'createdate', direction: 'ASCENDING' }],
      limit,
    };
    if (after !== undefined) {
      payload.after = after;
    }

    return this.api.request<SearchResponse>('POST', `${OBJECTS_ENDPOINT}/${type}/search`, payload);
  }

  private async createObject(type: CrmObjectType, properties: CrmProperties): Promise<Result<CrmObject>> {
    return this.api.request<CrmObject>('POST', `${OBJECTS_ENDPOINT}/${type}`, { properties });
  }

  private async updateObject(type: CrmObjectType, id: string, properties: CrmProperties): Promise<Result<CrmObject>> {
    return this.api.request<CrmObject>('PATCH', `${OBJECTS_ENDPOINT}/${type}/${encodeURIComponent(id)}`, {
      properties,
    });
  }

  /**
   * 以預設關聯類型連結兩個物件
   */
  private async associate(
    fromType: CrmObjectType,
    fromId: string,
    toType: CrmObjectType,
    toId: string
  ): Promise<Result<unknown>> {
    return this.api.request(
      'PUT',
      `${ASSOCIATIONS_ENDPOINT}/${fromType}/${encodeURIComponent(fromId)}/associations/default/${toType}/${encodeURIComponent(toId)}`
    );
  }
}
