import { Pool } from 'pg'

import { loadConfig } from './config.js'

/** The slice of `Pool` the stores use. */
export type Queryable = {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>
}

let _pool: Pool | null = null

export function getPool(): Pool {
  if (_pool) return _pool
  _pool = new Pool({ connectionString: loadConfig().databaseUrl })
  _pool.on('error', (err) => {
    console.error('[server] idle postgres client error:', err.message)
  })
  return _pool
}

export async function closePool(): Promise<void> {
  if (!_pool) return
  const pool = _pool
  _pool = null
  await pool.end()
}

export async function ensureSchema(db: Queryable = getPool()) {
  const sql = `
  create table if not exists datasets (
    id bigserial primary key,
    name text not null unique,
    description text not null default '',
    kind text not null default 'items',
    created_at timestamptz not null default now(),
    updated_at timestamptz not null default now()
  );

  create table if not exists conversations (
    id bigserial primary key,
    dataset_id bigint not null references datasets(id) on delete cascade,
    split text not null check (split in ('train', 'valid', 'test')),
    status text not null check (status in ('draft', 'pending', 'approved', 'rejected', 'archived')),
    tags jsonb not null default '[]'::jsonb,
    source text not null default '',
    notes text not null default '',
    created_at timestamptz not null default now(),
    updated_at timestamptz not null default now()
  );

  -- Messages are replaced wholesale; idx only orders them within a conversation
  create table if not exists conversation_messages (
    id bigserial primary key,
    conversation_id bigint not null references conversations(id) on delete cascade,
    idx int not null,
    role text not null check (role in ('system', 'user', 'assistant')),
    name text not null default '',
    content text not null,
    meta jsonb not null default '{}'::jsonb,
    created_at timestamptz not null default now(),
    unique (conversation_id, idx)
  );

  create table if not exists dataset_items (
    id bigserial primary key,
    dataset_id bigint not null references datasets(id) on delete cascade,
    data jsonb not null,
    source_ref text not null default '',
    created_at timestamptz not null default now(),
    updated_at timestamptz not null default now()
  );

  create index if not exists conversations_dataset_split_status_idx on conversations(dataset_id, split, status);
  create index if not exists conversations_split_status_idx on conversations(split, status);
  create index if not exists conversation_messages_conversation_idx on conversation_messages(conversation_id, idx);
  create index if not exists dataset_items_dataset_idx on dataset_items(dataset_id, id);
  `
  await db.query(sql)
}
