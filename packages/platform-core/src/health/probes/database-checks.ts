/**
 * Database Health Checks
 *
 * Relational store probe issuing `SELECT 1` over an existing pool
 */

import { BaseProbe, healthy, unhealthy } from './base-probe.js';
import { errorMessage } from '../../error-handling/errors.js';
import type { ProbeResult } from '../types.js';

/**
 * Satisfied by a pg `Pool` or `Client`. The probe never opens or closes it.
 */
export interface QueryableDatabase {
  query(text: string): Promise<{ rows: unknown[] }>;
}

export interface DatabaseProbeOptions {
  query?: string;
}

export class DatabaseProbe extends BaseProbe {
  readonly type = 'database';
  private readonly query: string;

  constructor(
    private readonly db: QueryableDatabase,
    options: DatabaseProbeOptions = {}
  ) {
    super();
    this.query = options.query ?? 'SELECT 1';
  }

  protected async performCheck(): Promise<ProbeResult> {
    const result = await this.db.query(this.query);
    if (result.rows.length === 0) {
      return unhealthy('query returned no rows');
    }
    return healthy();
  }

  protected describeFailure(error: unknown): string {
    const errorClass = error instanceof Error ? error.constructor.name : typeof error;
    return `query failed: ${errorClass}: ${errorMessage(error)}`;
  }
}

export function createDatabaseProbe(db: QueryableDatabase, options?: DatabaseProbeOptions): DatabaseProbe {
  return new DatabaseProbe(db, options);
}
