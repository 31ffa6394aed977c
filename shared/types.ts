/**
 * Domain entities shared by the service layer, storage mappers and HTTP serializers.
 *
 * Field names here are camelCase; the snake_case storage and wire names live in
 * shared/schema.ts and server/routes/serializers.ts.
 */

export const USER_ROLES = ['admin', 'manager', 'sales_rep', 'customer', 'company_admin'] as const;
export type UserRole = typeof USER_ROLES[number];

export const ACCOUNT_STATUSES = ['active', 'inactive', 'suspended', 'pending_verification'] as const;
export type AccountStatus = typeof ACCOUNT_STATUSES[number];

export const COMPANY_STATUSES = ['active', 'inactive', 'suspended', 'pending_approval'] as const;
export type CompanyStatus = typeof COMPANY_STATUSES[number];

export const QUOTE_STATUSES = ['draft', 'pending', 'sent', 'approved', 'rejected', 'expired', 'archived'] as const;
export type QuoteStatus = typeof QUOTE_STATUSES[number];

export const BULK_ACTIONS = ['approve', 'reject', 'archive', 'delete'] as const;
export type BulkAction = typeof BULK_ACTIONS[number];

export const DISCOUNT_TYPES = ['percentage', 'fixed_amount'] as const;
export type DiscountType = typeof DISCOUNT_TYPES[number];

export const FOLLOW_UP_TYPES = ['general', 'reminder', 'expiring'] as const;
export type FollowUpType = typeof FOLLOW_UP_TYPES[number];

export type HistoryAction =
  | 'created'
  | 'updated'
  | 'status_changed'
  | 'discount_applied'
  | 'emailed'
  | `bulk_${BulkAction}`;

/**
 * Authenticated caller. Issued by the authentication subsystem and treated as an
 * immutable value for the duration of one request.
 */
export interface Identity {
  id: string;
  role: UserRole;
  companyId: string | null;
  /** Custom permission overrides granted on top of the role table */
  permissions: string[];
  status: AccountStatus;
  email?: string;
}

export interface Company {
  id: string;
  name: string;
  status: CompanyStatus;
  quoteSharingEnabled: boolean;
  requireApprovalForQuotes: boolean;
  maxQuoteValueWithoutApproval: number | null;
  assignedSalesRep: string | null;
}

export interface CustomerInfo {
  name: string;
  email: string;
  company?: string | null;
  phone?: string | null;
  address?: string | null;
}

export interface QuoteItem {
  productId: string;
  productName: string;
  quantity: number;
  /** null means "to be quoted" */
  unitPrice: number | null;
  /** Pre-discount price, written the first time a discount touches the item */
  originalPrice: number | null;
  discountApplied: number;
  notes: string | null;
}

export interface Quote {
  id: string;
  customerInfo: CustomerInfo;
  items: QuoteItem[];
  status: QuoteStatus;
  totalEstimate: number | null;
  notes: string | null;
  adminNotes: string | null;
  createdBy: string;
  createdAt: Date;
  updatedAt: Date;
  expiresAt: Date;
  requestedDeliveryDate: Date | null;
  lastEmailedAt: Date | null;
  lastFollowUpAt: Date | null;
  discountApplied: number | null;
  discountReason: string | null;
}

export interface HistoryEntry {
  id: string;
  quoteId: string;
  action: HistoryAction;
  fieldChanged: string | null;
  oldValue: string | null;
  newValue: string | null;
  changedBy: string;
  timestamp: Date;
  notes: string | null;
}

export type NewHistoryEntry = Omit<HistoryEntry, 'id'>;

export interface CatalogProduct {
  id: string;
  name: string;
  description: string | null;
  price: number | null;
}

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value);
}

export const isUserRole = (value: string): value is UserRole => isOneOf(USER_ROLES, value);
export const isAccountStatus = (value: string): value is AccountStatus => isOneOf(ACCOUNT_STATUSES, value);
export const isCompanyStatus = (value: string): value is CompanyStatus => isOneOf(COMPANY_STATUSES, value);
export const isQuoteStatus = (value: string): value is QuoteStatus => isOneOf(QUOTE_STATUSES, value);

const HISTORY_ACTIONS: readonly HistoryAction[] = [
  'created',
  'updated',
  'status_changed',
  'discount_applied',
  'emailed',
  ...BULK_ACTIONS.map((action): HistoryAction => `bulk_${action}`),
];

export const isHistoryAction = (value: string): value is HistoryAction => isOneOf(HISTORY_ACTIONS, value);
