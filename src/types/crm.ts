/**
 * HubSpot CRM API 型別
 */

export type CrmObjectType = 'contacts' | 'deals' | 'tickets';

export type CrmProperties = Record<string, unknown>;

export interface CrmObject {
  id: string;
  properties: CrmProperties;
  createdAt?: string;
  updatedAt?: string;
  archived?: boolean;
}

export interface Paging {
  next?: {
    after: string;
    link?: string;
  };
}

export interface SearchResponse {
  total?: number;
  results?: CrmObject[];
  paging?: Paging;
}

export type FilterOperator = 'EQ' | 'NEQ' | 'GT' | 'GTE' | 'LT' | 'LTE';

export interface SearchFilter {
  propertyName: string;
  operator: FilterOperator;
  value: string;
}

export interface SearchRequest {
  filterGroups: Array<{ filters: SearchFilter[] }>;
  properties?: string[];
  sorts?: Array<{ propertyName: string; direction: 'ASCENDING' | 'DESCENDING' }>;
  limit?: number;
  after?: string;
}

/** v4 associations list item */
export interface AssociationResult {
  toObjectId: string | number;
  associationTypes?: Array<{ category: string; typeId: number; label?: string | null }>;
}

export interface AssociationsResponse {
  results?: AssociationResult[];
  paging?: Paging;
}

export type UpsertAction = 'created' | 'updated';

export interface ContactWithDeals extends CrmObject {
  associatedDeals: CrmObject[];
}

export interface NewCrmObjects {
  contacts: ContactWithDeals[];
  contacts_paging: Paging | null;
  deals: CrmObject[];
  deals_paging: Paging | null;
  tickets: CrmObject[];
  tickets_paging: Paging | null;
}
