import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { Pool } from 'pg';
import { CourseCandidate, CourseSearchProvider, CourseSearchRequest, isResourceType } from '../types';

const CANDIDATE_QUERY = `
  SELECT
    id,
    course_type_standard AS type,
    name,
    COALESCE(provider_standardized, provider) AS provider,
    description,
    1 - (embedding <=> $1::vector) AS similarity
  FROM courses
  WHERE platform = $2
    AND embedding IS NOT NULL
    AND 1 - (embedding <=> $1::vector) >= $3
    AND 1 - (embedding <=> $1::vector) >= CASE $4
      WHEN 'SKILL' THEN $5::float8
      WHEN 'FIELD' THEN $6::float8
      ELSE $7::float8
    END
  ORDER BY similarity DESC
  LIMIT $8`;

/**
 * Maps one datastore row to a candidate. Rows without an id, with an
 * unknown type or without a usable similarity are rejected here so the
 * selector only ever sees complete records.
 */
export function toCourseCandidate(input: unknown): CourseCandidate | null {
  if (!input || typeof input !== 'object') return null;
  const row = input as Record<string, unknown>;

  const id = String(row.id ?? '').trim();
  const type = String(row.type ?? '').trim().toLowerCase();
  const similarity = Number(row.similarity);

  if (!id || !isResourceType(type) || row.similarity === null || !Number.isFinite(similarity)) {
    return null;
  }

  return {
    id,
    type,
    similarity: Math.min(Math.max(similarity, 0), 1),
    name: String(row.name ?? ''),
    provider: String(row.provider ?? ''),
    description: String(row.description ?? ''),
  };
}

@Injectable()
export class CourseVectorStoreService implements CourseSearchProvider, OnModuleDestroy {
  private pool: Pool | null = null;
  private readonly statementTimeoutMs = Number(process.env.COURSE_QUERY_TIMEOUT_MS || 3000);

  async search(request: CourseSearchRequest): Promise<CourseCandidate[]> {
    const result = await this.getPool().query(CANDIDATE_QUERY, [
      JSON.stringify(request.vector),
      request.platform,
      request.minThreshold,
      request.category,
      request.thresholds.SKILL,
      request.thresholds.FIELD,
      request.thresholds.DEFAULT,
      request.limit,
    ]);

    const candidates = result.rows
      .map((row: unknown) => toCourseCandidate(row))
      .filter((row): row is CourseCandidate => Boolean(row));

    const dropped = result.rows.length - candidates.length;
    if (dropped > 0) {
      console.warn(`[CourseVectorStoreService] Dropped ${dropped} malformed course rows`);
    }
    return candidates;
  }

  async onModuleDestroy(): Promise<void> {
    if (!this.pool) return;
    const pool = this.pool;
    this.pool = null;
    await pool.end();
  }

  private getPool(): Pool {
    if (!this.pool) {
      const statementTimeout =
        Number.isFinite(this.statementTimeoutMs) && this.statementTimeoutMs > 0 ? this.statementTimeoutMs : 3000;

      if (process.env.DATABASE_URL) {
        this.pool = new Pool({ connectionString: process.env.DATABASE_URL, statement_timeout: statementTimeout });
      } else {
        this.pool = new Pool({
          host: process.env.PGHOST || 'localhost',
          port: Number(process.env.PGPORT || 5432),
          user: process.env.PGUSER || 'postgres',
          password: process.env.PGPASSWORD || '',
          database: process.env.PGDATABASE || 'courses',
          statement_timeout: statementTimeout,
        });
      }

      this.pool.on('error', (error) => {
        console.error('[CourseVectorStoreService] Idle pg client error', error);
      });
    }
    return this.pool;
  }
}
