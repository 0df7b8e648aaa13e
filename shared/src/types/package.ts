/**
 * Package types and interfaces.
 * Packages are priced offerings an invoice may optionally reference.
 */

import type { Money } from './money.js';
import type { PaginationMeta, PaginationQuery } from './pagination.js';

export interface Package {
  id: number;
  /** Unique across all packages. */
  name: string;
  description: string | null;
  price: Money;
  isActive: boolean;
}

export interface CreatePackageRequest {
  name: string;
  description?: string | null;
  price: Money;
  isActive?: boolean;
}

export interface UpdatePackageRequest {
  name?: string;
  description?: string | null;
  price?: Money;
  isActive?: boolean;
}

export type PackageListQuery = PaginationQuery;

export interface PackageListResponse {
  packages: Package[];
  pagination: PaginationMeta;
}

export interface PackageResponse {
  package: Package;
}
