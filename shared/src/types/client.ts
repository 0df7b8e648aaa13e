/**
 * Client types and interfaces.
 * A client books shoots and receives invoices.
 */

import type { PaginationMeta, PaginationQuery } from './pagination.js';

/**
 * Client entity as returned by the API.
 */
export interface Client {
  id: number;
  name: string;
  /** Stored trimmed and lower-cased; unique across all clients. */
  email: string;
  phone: string | null;
}

/**
 * Request body for creating a new client.
 */
export interface CreateClientRequest {
  name: string;
  email: string;
  phone?: string | null;
}

/**
 * Request body for updating a client.
 * All fields are optional; at least one must be provided.
 */
export interface UpdateClientRequest {
  name?: string;
  email?: string;
  phone?: string | null;
}

export type ClientListQuery = PaginationQuery;

export interface ClientListResponse {
  clients: Client[];
  pagination: PaginationMeta;
}

export interface ClientResponse {
  client: Client;
}
