import { sql } from 'drizzle-orm';
import {
  boolean,
  decimal,
  index,
  jsonb,
  pgTable,
  text,
  timestamp,
  varchar,
} from "drizzle-orm/pg-core";
import { z } from "zod";
import {
  BULK_ACTIONS,
  DISCOUNT_TYPES,
  FOLLOW_UP_TYPES,
  QUOTE_STATUSES,
} from "./types";

// ============================================================
// STORED DOCUMENT SHAPES
// Field names are the persisted contract; do not rename.
// ============================================================

export type CustomerInfoDocument = {
  name: string;
  email: string;
  company?: string | null;
  phone?: string | null;
  address?: string | null;
};

export type QuoteItemDocument = {
  product_id: string;
  product_name: string;
  quantity: number;
  unit_price: number | null;
  original_price?: number | null;
  discount_applied?: number;
  notes?: string | null;
};

// ============================================================
// DIRECTORY TABLES (owned by account & company management)
// ============================================================

export const companies = pgTable("companies", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  name: varchar("name", { length: 100 }).notNull(),
  status: varchar("status", { length: 30 }).notNull().default('pending_approval'),
  quoteSharingEnabled: boolean("quote_sharing_enabled").notNull().default(true),
  requireApprovalForQuotes: boolean("require_approval_for_quotes").notNull().default(false),
  maxQuoteValueWithoutApproval: decimal("max_quote_value_without_approval", { precision: 12, scale: 2 }),
  assignedSalesRep: varchar("assigned_sales_rep"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => [
  index("companies_assigned_sales_rep_idx").on(table.assignedSalesRep),
]);

export type CompanyRow = typeof companies.$inferSelect;

export const users = pgTable("users", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  email: varchar("email", { length: 255 }).notNull().unique(),
  firstName: varchar("first_name", { length: 100 }),
  lastName: varchar("last_name", { length: 100 }),
  role: varchar("role", { length: 30 }).notNull().default('customer'),
  status: varchar("status", { length: 30 }).notNull().default('pending_verification'),
  companyId: varchar("company_id").references(() => companies.id, { onDelete: 'set null' }),
  permissions: jsonb("permissions").$type<string[]>().default(sql`'[]'::jsonb`).notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
}, (table) => [
  index("users_company_id_idx").on(table.companyId),
]);

export type UserRow = typeof users.$inferSelect;

export const products = pgTable("products", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  name: varchar("name", { length: 200 }).notNull(),
  description: text("description"),
  price: decimal("price", { precision: 12, scale: 2 }),
  isActive: boolean("is_active").notNull().default(true),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export type ProductRow = typeof products.$inferSelect;

// ============================================================
// QUOTES
// ============================================================

export const quotes = pgTable("quotes", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  customerInfo: jsonb("customer_info").$type<CustomerInfoDocument>().notNull(),
  items: jsonb("items").$type<QuoteItemDocument[]>().default(sql`'[]'::jsonb`).notNull(),
  status: varchar("status", { length: 20 }).notNull().default('draft'),
  totalEstimate: decimal("total_estimate", { precision: 12, scale: 2 }),
  notes: text("notes"),
  adminNotes: text("admin_notes"),
  createdBy: varchar("created_by").notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
  expiresAt: timestamp("expires_at").notNull(),
  requestedDeliveryDate: timestamp("requested_delivery_date"),
  lastEmailedAt: timestamp("last_emailed_at"),
  lastFollowUpAt: timestamp("last_follow_up_at"),
  discountApplied: decimal("discount_applied", { precision: 12, scale: 2 }),
  discountReason: varchar("discount_reason", { length: 200 }),
}, (table) => [
  index("quotes_created_by_idx").on(table.createdBy),
  index("quotes_status_idx").on(table.status),
  index("quotes_created_at_idx").on(table.createdAt),
]);

export type QuoteRow = typeof quotes.$inferSelect;
export type InsertQuoteRow = typeof quotes.$inferInsert;

// Append-only; rows are never updated or deleted
export const quoteHistory = pgTable("quote_history", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  quoteId: varchar("quote_id").notNull(),
  action: varchar("action", { length: 40 }).notNull(),
  fieldChanged: varchar("field_changed", { length: 60 }),
  oldValue: text("old_value"),
  newValue: text("new_value"),
  changedBy: varchar("changed_by").notNull(),
  timestamp: timestamp("timestamp").defaultNow().notNull(),
  notes: text("notes"),
}, (table) => [
  index("quote_history_quote_id_idx").on(table.quoteId),
  index("quote_history_timestamp_idx").on(table.timestamp),
]);

export type QuoteHistoryRow = typeof quoteHistory.$inferSelect;

// ============================================================
// REQUEST SCHEMAS
// ============================================================

export const MAX_BULK_QUOTES = 50;
export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export const customerInfoSchema = z.object({
  name: z.string().min(1).max(100),
  company: z.string().max(100).nullish(),
  email: z.string().min(5).max(100).email(),
  phone: z.string().max(20).nullish(),
  address: z.string().max(500).nullish(),
});

// Request bodies use the snake_case wire names and parse into camelCase inputs

export const quoteItemInputSchema = z.object({
  product_id: z.string().min(1),
  product_name: z.string().min(1).max(200),
  quantity: z.number().int().positive(),
  unit_price: z.number().min(0).nullish(),
  notes: z.string().max(500).nullish(),
}).transform((item) => ({
  productId: item.product_id,
  productName: item.product_name,
  quantity: item.quantity,
  unitPrice: item.unit_price ?? null,
  notes: item.notes ?? null,
}));

export type QuoteItemInput = z.infer<typeof quoteItemInputSchema>;

export const createQuoteSchema = z.object({
  customer_info: customerInfoSchema,
  items: z.array(quoteItemInputSchema).min(1),
  notes: z.string().max(1000).nullish(),
  requested_delivery_date: z.coerce.date().nullish(),
}).transform((body) => ({
  customerInfo: body.customer_info,
  items: body.items,
  notes: body.notes ?? null,
  requestedDeliveryDate: body.requested_delivery_date ?? null,
}));

export type CreateQuoteInput = z.infer<typeof createQuoteSchema>;

export const updateQuoteSchema = z.object({
  customer_info: customerInfoSchema.optional(),
  items: z.array(quoteItemInputSchema).min(1).optional(),
  status: z.enum(QUOTE_STATUSES).optional(),
  notes: z.string().max(1000).nullish(),
  admin_notes: z.string().max(1000).nullish(),
  total_estimate: z.number().min(0).optional(),
}).transform((body) => ({
  customerInfo: body.customer_info,
  items: body.items,
  status: body.status,
  notes: body.notes,
  adminNotes: body.admin_notes,
  totalEstimate: body.total_estimate,
}));

export type UpdateQuoteInput = z.infer<typeof updateQuoteSchema>;

export const listQuotesQuerySchema = z.object({
  status: z.enum(QUOTE_STATUSES).optional(),
  customer_email: z.string().min(1).max(100).optional(),
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
}).transform((query) => ({
  filters: { status: query.status, customerEmail: query.customer_email },
  pagination: { skip: query.skip, limit: query.limit },
}));

export const companyQuotesQuerySchema = z.object({
  status: z.enum(QUOTE_STATUSES).optional(),
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
}).transform((query) => ({
  filters: { status: query.status },
  pagination: { skip: query.skip, limit: query.limit },
}));

export const discountRequestSchema = z.object({
  discount_type: z.enum(DISCOUNT_TYPES),
  discount_value: z.number().positive(),
  apply_to_items: z.array(z.number().int().min(0)).optional(),
  reason: z.string().max(200).optional(),
}).transform((body) => ({
  discountType: body.discount_type,
  discountValue: body.discount_value,
  applyToItems: body.apply_to_items,
  reason: body.reason,
}));

export const bulkActionSchema = z.object({
  quote_ids: z.array(z.string().min(1)).min(1).max(MAX_BULK_QUOTES),
  action: z.enum(BULK_ACTIONS),
  notes: z.string().max(500).optional(),
  notify_customers: z.boolean().optional().default(false),
}).transform((body) => ({
  quoteIds: body.quote_ids,
  action: body.action,
  notes: body.notes,
  notifyCustomers: body.notify_customers,
}));

export const emailQuoteSchema = z.object({
  recipient_email: z.string().email().optional(),
  custom_message: z.string().max(1000).optional(),
}).transform((body) => ({
  recipientEmail: body.recipient_email,
  customMessage: body.custom_message,
}));

export const followUpSchema = z.object({
  follow_up_type: z.enum(FOLLOW_UP_TYPES).default('general'),
}).transform((body) => ({
  followUpType: body.follow_up_type,
}));
