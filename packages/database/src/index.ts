/**
 * @ipam-report/database
 *
 * Database client and utilities
 */

export * from './client';

export type { Pool, PoolClient } from 'pg';
