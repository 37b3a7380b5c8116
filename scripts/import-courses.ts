import 'reflect-metadata';
import 'dotenv/config';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { Pool } from 'pg';
import { EmbeddingService } from '../src/common/services/embedding.service';
import { ResourceType, isResourceType } from '../src/common/types';

interface CourseRow {
  id: string;
  name: string;
  type: ResourceType;
  provider: string;
  description: string;
  platform: string;
}

const EMBEDDING_BATCH_SIZE = 50;

function getPool(): Pool {
  if (process.env.DATABASE_URL) {
    return new Pool({ connectionString: process.env.DATABASE_URL });
  }

  return new Pool({
    host: process.env.PGHOST || 'localhost',
    port: Number(process.env.PGPORT || 5432),
    user: process.env.PGUSER || 'postgres',
    password: process.env.PGPASSWORD || '',
    database: process.env.PGDATABASE || 'courses',
  });
}

function buildContent(row: CourseRow): string {
  return [`${row.name} ${row.type}`, row.provider, row.description].filter(Boolean).join('. ');
}

async function readInputFile(): Promise<CourseRow[]> {
  const filePath = process.argv[2] || path.join(process.cwd(), 'data', 'courses.json');
  const raw = await fs.readFile(filePath, 'utf8');
  const parsed: unknown = JSON.parse(raw.replace(/^﻿/, '').trim());
  if (!Array.isArray(parsed)) {
    throw new Error('Input file does not contain a JSON array.');
  }

  const rows: CourseRow[] = [];
  for (const item of parsed) {
    const row = (item || {}) as Record<string, unknown>;
    const type = String(row.type || '').trim().toLowerCase();
    const id = String(row.id || '').trim();
    if (!id || !isResourceType(type)) {
      console.warn(`Skipping malformed course: ${JSON.stringify(item).slice(0, 120)}`);
      continue;
    }
    rows.push({
      id,
      type,
      name: String(row.name || '').trim(),
      provider: String(row.provider || '').trim(),
      description: String(row.description || '').trim(),
      platform: String(row.platform || process.env.COURSE_PLATFORM || 'coursera').trim(),
    });
  }
  return rows;
}

async function run(): Promise<void> {
  const rows = await readInputFile();
  const embeddings = new EmbeddingService();
  const pool = getPool();
  const client = await pool.connect();
  let upserted = 0;

  try {
    await client.query('BEGIN');

    for (let start = 0; start < rows.length; start += EMBEDDING_BATCH_SIZE) {
      const batch = rows.slice(start, start + EMBEDDING_BATCH_SIZE);
      const vectors = await embeddings.embed(batch.map(buildContent));

      for (const [i, row] of batch.entries()) {
        const result = await client.query(
          `INSERT INTO courses (id, name, course_type_standard, provider, description, platform, embedding)
           VALUES ($1, $2, $3, $4, $5, $6, $7::vector)
           ON CONFLICT (id) DO UPDATE SET
             name = EXCLUDED.name,
             course_type_standard = EXCLUDED.course_type_standard,
             provider = EXCLUDED.provider,
             description = EXCLUDED.description,
             platform = EXCLUDED.platform,
             embedding = EXCLUDED.embedding`,
          [row.id, row.name, row.type, row.provider, row.description, row.platform, JSON.stringify(vectors[i])],
        );
        upserted += result.rowCount || 0;
      }

      console.log(`Embedded ${Math.min(start + batch.length, rows.length)}/${rows.length}`);
    }

    await client.query('COMMIT');
    console.log(`Upserted: ${upserted}`);
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
    await pool.end();
  }
}

run().catch((error) => {
  console.error('Error importing courses:', error);
  process.exit(1);
});
