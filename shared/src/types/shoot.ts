/**
 * Shoot types and interfaces.
 * A shoot is a booked session for exactly one client.
 */

import type { PaginationMeta, PaginationQuery } from './pagination.js';

export interface Shoot {
  id: number;
  clientId: number;
  /** Calendar date (YYYY-MM-DD). */
  shootDate: string;
  location: string | null;
}

export interface CreateShootRequest {
  clientId: number;
  shootDate: string;
  location?: string | null;
}

/**
 * Request body for updating a shoot. The owning client cannot be changed.
 */
export interface UpdateShootRequest {
  shootDate?: string;
  location?: string | null;
}

export type ShootListQuery = PaginationQuery;

export interface ShootListResponse {
  shoots: Shoot[];
  pagination: PaginationMeta;
}

export interface ShootResponse {
  shoot: Shoot;
}
