/**
 * @studio-ledger/shared
 *
 * API request/response shapes and common constants shared by the server and
 * any client of the studio ledger API.
 */

export type { ApiError, ApiErrorResponse, ValidationFieldError, HealthResponse } from './types/api.js';
export type { ErrorCode, EntityName } from './types/errors.js';

// Pagination
export type { PaginationQuery, PaginationMeta, IssuedDateRangeQuery } from './types/pagination.js';
export { DEFAULT_PAGE_LIMIT, MAX_PAGE_LIMIT } from './types/pagination.js';

// Money
export type { Money, PaymentStatus } from './types/money.js';

// Clients
export type {
  Client,
  CreateClientRequest,
  UpdateClientRequest,
  ClientListQuery,
  ClientListResponse,
  ClientResponse,
} from './types/client.js';

// Shoots
export type {
  Shoot,
  CreateShootRequest,
  UpdateShootRequest,
  ShootListQuery,
  ShootListResponse,
  ShootResponse,
} from './types/shoot.js';

// Packages
export type {
  Package,
  CreatePackageRequest,
  UpdatePackageRequest,
  PackageListQuery,
  PackageListResponse,
  PackageResponse,
} from './types/package.js';

// Invoices
export type {
  Invoice,
  CreateInvoiceRequest,
  UpdateInvoiceRequest,
  InvoiceListQuery,
  InvoiceListResponse,
  InvoiceResponse,
  InvoiceSummary,
  InvoiceSummaryResponse,
} from './types/invoice.js';

// Payments
export type {
  Payment,
  CreatePaymentRequest,
  PaymentListQuery,
  PaymentListResponse,
  PaymentResponse,
} from './types/payment.js';

// Reports
export type { InvoiceReportRow, InvoiceReportQuery, InvoiceReportResponse } from './types/report.js';
