/**
 * Payload Schemas
 * 入站 CRM 資料驗證；未定義的欄位原樣保留並送往 HubSpot
 */

import { z } from 'zod';

export const TICKET_CATEGORIES = [
  'general_inquiry',
  'technical_issue',
  'billing',
  'service_request',
  'meeting',
] as const;

export const ContactSchema = z
  .object({
    email: z.string().email(),
    firstname: z.string().min(1),
    lastname: z.string().min(1),
    phone: z.string().min(1),
  })
  .passthrough();

export const DealSchema = z
  .object({
    dealname: z.string().min(1),
    amount: z.number().finite().nonnegative(),
    dealstage: z.string().min(1),
  })
  .passthrough();

export const TicketSchema = z
  .object({
    subject: z.string().min(1),
    description: z.string().min(1),
    category: z.enum(TICKET_CATEGORIES),
    pipeline: z.string().min(1),
    hs_ticket_priority: z.string().min(1),
    hs_pipeline_stage: z.string().min(1),
  })
  .passthrough();

export type ContactInput = z.infer<typeof ContactSchema>;
export type DealInput = z.infer<typeof DealSchema>;
export type TicketInput = z.infer<typeof TicketSchema>;

/**
 * 把 zod 錯誤攤平成 { 欄位: [訊息] }，作為 ErrorOutcome 的 detail
 */
export function flattenIssues(error: z.ZodError): Record<string, string[]> {
  const fields: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join('.') : '_schema';
    const messages = fields[key] ?? [];
    messages.push(issue.message);
    fields[key] = messages;
  }
  return fields;
}
