import type { FastifyBaseLogger } from 'fastify';
import type { Pool, PoolClient } from 'pg';

export interface Migration {
  id: string;
  statements: string[];
}

const MIGRATION_TABLE = 'schema_migration';

export const MIGRATIONS: readonly Migration[] = [
  {
    id: '0001_chat_core',
    statements: [
      `CREATE TABLE IF NOT EXISTS app_user (
        id text PRIMARY KEY,
        username text UNIQUE NOT NULL,
        is_active boolean NOT NULL DEFAULT true,
        created_at timestamptz NOT NULL DEFAULT now()
      )`,
      `CREATE TABLE IF NOT EXISTS chat (
        id text PRIMARY KEY,
        name text,
        is_group boolean NOT NULL DEFAULT false,
        created_at timestamptz NOT NULL DEFAULT now()
      )`,
      `CREATE TABLE IF NOT EXISTS chat_participant (
        chat_id text NOT NULL REFERENCES chat(id) ON DELETE CASCADE,
        user_id text NOT NULL REFERENCES app_user(id) ON DELETE CASCADE,
        joined_at timestamptz NOT NULL DEFAULT now(),
        left_at timestamptz,
        PRIMARY KEY (chat_id, user_id)
      )`,
      `CREATE TABLE IF NOT EXISTS chat_message (
        id text PRIMARY KEY,
        chat_id text NOT NULL REFERENCES chat(id) ON DELETE CASCADE,
        sender_id text NOT NULL REFERENCES app_user(id) ON DELETE CASCADE,
        content text NOT NULL,
        message_type text NOT NULL DEFAULT 'text',
        reply_to_id text REFERENCES chat_message(id) ON DELETE SET NULL,
        status text NOT NULL DEFAULT 'sent',
        is_deleted boolean NOT NULL DEFAULT false,
        created_at timestamptz NOT NULL DEFAULT now(),
        updated_at timestamptz
      )`,
      `CREATE INDEX IF NOT EXISTS idx_chat_message_chat_ts ON chat_message(chat_id, created_at, id)`,
      `CREATE TABLE IF NOT EXISTS message_read_receipt (
        message_id text NOT NULL REFERENCES chat_message(id) ON DELETE CASCADE,
        user_id text NOT NULL REFERENCES app_user(id) ON DELETE CASCADE,
        read_at timestamptz NOT NULL DEFAULT now(),
        PRIMARY KEY (message_id, user_id)
      )`,
    ],
  },
  {
    id: '0002_location',
    statements: [
      `CREATE TABLE IF NOT EXISTS user_location (
        id text PRIMARY KEY,
        user_id text NOT NULL REFERENCES app_user(id) ON DELETE CASCADE,
        latitude double precision NOT NULL,
        longitude double precision NOT NULL,
        accuracy double precision,
        altitude double precision,
        speed double precision,
        heading double precision,
        recorded_at timestamptz NOT NULL DEFAULT now()
      )`,
      `CREATE INDEX IF NOT EXISTS idx_user_location_user_ts ON user_location(user_id, recorded_at DESC)`,
      `CREATE TABLE IF NOT EXISTS geofence_area (
        id text PRIMARY KEY,
        user_id text NOT NULL REFERENCES app_user(id) ON DELETE CASCADE,
        name text NOT NULL,
        center_latitude double precision NOT NULL,
        center_longitude double precision NOT NULL,
        radius_meters double precision NOT NULL CHECK (radius_meters > 0),
        notify_on_entry boolean NOT NULL DEFAULT true,
        notify_on_exit boolean NOT NULL DEFAULT true,
        is_active boolean NOT NULL DEFAULT true,
        created_at timestamptz NOT NULL DEFAULT now()
      )`,
      `CREATE TABLE IF NOT EXISTS geofence_event (
        id text PRIMARY KEY,
        geofence_id text NOT NULL REFERENCES geofence_area(id) ON DELETE CASCADE,
        user_id text NOT NULL REFERENCES app_user(id) ON DELETE CASCADE,
        event_type text NOT NULL CHECK (event_type IN ('enter', 'exit')),
        latitude double precision NOT NULL,
        longitude double precision NOT NULL,
        occurred_at timestamptz NOT NULL DEFAULT now()
      )`,
      `CREATE INDEX IF NOT EXISTS idx_geofence_event_lookup
         ON geofence_event(user_id, geofence_id, occurred_at DESC)`,
    ],
  },
  {
    id: '0003_device_tokens',
    statements: [
      `CREATE TABLE IF NOT EXISTS device_token (
        token text PRIMARY KEY,
        user_id text NOT NULL REFERENCES app_user(id) ON DELETE CASCADE,
        platform text NOT NULL,
        is_active boolean NOT NULL DEFAULT true,
        updated_at timestamptz NOT NULL DEFAULT now()
      )`,
      `CREATE INDEX IF NOT EXISTS idx_device_token_user ON device_token(user_id) WHERE is_active`,
    ],
  },
];

const ensureMigrationTable = async (pool: Pool): Promise<void> => {
  await pool.query(
    `CREATE TABLE IF NOT EXISTS ${MIGRATION_TABLE} (
      id text PRIMARY KEY,
      applied_at timestamptz NOT NULL DEFAULT now()
    )`,
  );
};

const hasMigrationRun = async (client: PoolClient, id: string): Promise<boolean> => {
  const result = await client.query<{ id: string }>(
    `SELECT id FROM ${MIGRATION_TABLE} WHERE id = $1 LIMIT 1`,
    [id],
  );
  return (result.rowCount ?? 0) > 0;
};

const recordMigration = async (client: PoolClient, id: string): Promise<void> => {
  await client.query(
    `INSERT INTO ${MIGRATION_TABLE} (id) VALUES ($1) ON CONFLICT (id) DO NOTHING`,
    [id],
  );
};

export const runMigrations = async (pool: Pool, logger: FastifyBaseLogger): Promise<void> => {
  await ensureMigrationTable(pool);

  for (const migration of MIGRATIONS) {
    const client = await pool.connect();
    let inTransaction = false;
    try {
      const applied = await hasMigrationRun(client, migration.id);
      if (applied) {
        continue;
      }

      await client.query('BEGIN');
      inTransaction = true;
      for (const statement of migration.statements) {
        await client.query(statement);
      }
      await recordMigration(client, migration.id);
      await client.query('COMMIT');
      inTransaction = false;
      logger.info({ migration: migration.id }, 'Applied database migration');
    } catch (error) {
      if (inTransaction) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackError) {
          logger.error({ err: rollbackError, migration: migration.id }, 'Failed to rollback migration');
        }
      }
      throw error;
    } finally {
      client.release();
    }
  }
};
