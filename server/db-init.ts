import { sql, type SQL } from 'drizzle-orm';
import { db } from './db';
import { getErrorMessage } from './utils/errorUtils';
import { logger } from './core/logger';

const tableQueries: Array<{ name: string; query: SQL }> = [
  {
    name: 'sessions',
    query: sql`
      CREATE TABLE IF NOT EXISTS sessions (
        sid VARCHAR PRIMARY KEY,
        sess JSONB NOT NULL,
        expire TIMESTAMP NOT NULL
      )
    `,
  },
  {
    name: 'employees',
    query: sql`
      CREATE TABLE IF NOT EXISTS employees (
        id SERIAL PRIMARY KEY,
        username VARCHAR(64) NOT NULL UNIQUE,
        employee_no VARCHAR(32),
        name VARCHAR(100) NOT NULL,
        email VARCHAR,
        department VARCHAR,
        position VARCHAR,
        supervisor_id INTEGER REFERENCES employees(id),
        role VARCHAR(20) NOT NULL DEFAULT 'employee',
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `,
  },
  {
    name: 'devices',
    query: sql`
      CREATE TABLE IF NOT EXISTS devices (
        id SERIAL PRIMARY KEY,
        name VARCHAR(100) NOT NULL,
        type VARCHAR(50),
        description TEXT,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        retired_at TIMESTAMPTZ
      )
    `,
  },
  {
    name: 'device_requests',
    query: sql`
      CREATE TABLE IF NOT EXISTS device_requests (
        id SERIAL PRIMARY KEY,
        device_id INTEGER NOT NULL REFERENCES devices(id),
        requester_id INTEGER NOT NULL REFERENCES employees(id),
        status VARCHAR(20) NOT NULL DEFAULT 'pending',
        requested_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        decided_by INTEGER REFERENCES employees(id),
        decided_at TIMESTAMPTZ,
        reject_reason TEXT,
        collected_at TIMESTAMPTZ,
        return_requested_at TIMESTAMPTZ,
        return_confirmed_by INTEGER REFERENCES employees(id),
        returned_at TIMESTAMPTZ,
        cancelled_by INTEGER REFERENCES employees(id),
        cancelled_at TIMESTAMPTZ,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        CONSTRAINT device_requests_status_check
          CHECK (status IN ('pending', 'approved', 'rejected', 'collected', 'return_pending', 'returned', 'cancelled'))
      )
    `,
  },
  {
    name: 'meeting_rooms',
    query: sql`
      CREATE TABLE IF NOT EXISTS meeting_rooms (
        id SERIAL PRIMARY KEY,
        name VARCHAR(100) NOT NULL,
        capacity INTEGER NOT NULL DEFAULT 1 CHECK (capacity > 0),
        location VARCHAR,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        retired_at TIMESTAMPTZ
      )
    `,
  },
  {
    name: 'room_bookings',
    query: sql`
      CREATE TABLE IF NOT EXISTS room_bookings (
        id SERIAL PRIMARY KEY,
        room_id INTEGER NOT NULL REFERENCES meeting_rooms(id),
        requester_id INTEGER NOT NULL REFERENCES employees(id),
        title VARCHAR(200),
        start_at TIMESTAMPTZ NOT NULL,
        end_at TIMESTAMPTZ NOT NULL,
        status VARCHAR(20) NOT NULL DEFAULT 'confirmed',
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        completed_at TIMESTAMPTZ,
        cancelled_at TIMESTAMPTZ,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        CONSTRAINT room_bookings_interval_check CHECK (start_at < end_at),
        CONSTRAINT room_bookings_status_check CHECK (status IN ('confirmed', 'completed', 'cancelled'))
      )
    `,
  },
  {
    name: 'leave_requests',
    query: sql`
      CREATE TABLE IF NOT EXISTS leave_requests (
        id SERIAL PRIMARY KEY,
        requester_id INTEGER NOT NULL REFERENCES employees(id),
        leave_type VARCHAR(20) NOT NULL,
        start_date DATE NOT NULL,
        end_date DATE NOT NULL,
        reason TEXT,
        status VARCHAR(20) NOT NULL DEFAULT 'pending',
        decided_by INTEGER REFERENCES employees(id),
        decided_at TIMESTAMPTZ,
        reject_reason TEXT,
        cancelled_by INTEGER REFERENCES employees(id),
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        CONSTRAINT leave_requests_dates_check CHECK (start_date <= end_date),
        CONSTRAINT leave_requests_status_check CHECK (status IN ('pending', 'approved', 'rejected', 'cancelled'))
      )
    `,
  },
];

const indexQueries: Array<{ name: string; query: SQL }> = [
  { name: 'IDX_session_expire', query: sql`CREATE INDEX IF NOT EXISTS "IDX_session_expire" ON sessions(expire)` },
  { name: 'employees_supervisor_id_idx', query: sql`CREATE INDEX IF NOT EXISTS employees_supervisor_id_idx ON employees(supervisor_id)` },
  { name: 'device_requests_device_id_idx', query: sql`CREATE INDEX IF NOT EXISTS device_requests_device_id_idx ON device_requests(device_id)` },
  { name: 'device_requests_requester_id_idx', query: sql`CREATE INDEX IF NOT EXISTS device_requests_requester_id_idx ON device_requests(requester_id)` },
  { name: 'device_requests_status_idx', query: sql`CREATE INDEX IF NOT EXISTS device_requests_status_idx ON device_requests(status)` },
  { name: 'room_bookings_room_start_idx', query: sql`CREATE INDEX IF NOT EXISTS room_bookings_room_start_idx ON room_bookings(room_id, start_at)` },
  { name: 'room_bookings_requester_id_idx', query: sql`CREATE INDEX IF NOT EXISTS room_bookings_requester_id_idx ON room_bookings(requester_id)` },
  { name: 'leave_requests_requester_id_idx', query: sql`CREATE INDEX IF NOT EXISTS leave_requests_requester_id_idx ON leave_requests(requester_id)` },
  { name: 'leave_requests_status_idx', query: sql`CREATE INDEX IF NOT EXISTS leave_requests_status_idx ON leave_requests(status)` },
];

// At most one active request per device, whatever the application does.
async function ensureSingleActiveRequestIndex(): Promise<void> {
  await db.execute(sql`
    CREATE UNIQUE INDEX IF NOT EXISTS device_requests_one_active_idx
      ON device_requests(device_id)
      WHERE status IN ('pending', 'approved', 'collected', 'return_pending')
  `);
}

// Confirmed bookings of one room never share an instant of [start_at, end_at).
async function ensureBookingExclusion(): Promise<void> {
  await db.execute(sql`CREATE EXTENSION IF NOT EXISTS btree_gist`);
  await db.execute(sql`
    DO $$
    BEGIN
      IF NOT EXISTS (
        SELECT 1 FROM pg_constraint
        WHERE conname = 'room_bookings_no_overlap'
      ) THEN
        ALTER TABLE room_bookings ADD CONSTRAINT room_bookings_no_overlap
          EXCLUDE USING gist (
            room_id WITH =,
            tstzrange(start_at, end_at, '[)') WITH &&
          ) WHERE (status = 'confirmed');
      END IF;
    END $$;
  `);
}

/**
 * Creates the tables, indexes and constraints the office store relies on.
 * Table creation failures abort startup; index failures are logged and skipped.
 */
export async function ensureOfficeSchema(): Promise<void> {
  for (const { name, query } of tableQueries) {
    try {
      await db.execute(query);
    } catch (error: unknown) {
      logger.error(`[DB Init] Failed to create table ${name}`, { extra: { errorMessage: getErrorMessage(error) } });
      throw error;
    }
  }
  logger.info('[DB Init] Tables ensured');

  await ensureSingleActiveRequestIndex();
  await ensureBookingExclusion();
  logger.info('[DB Init] Integrity constraints ensured');

  for (const { name, query } of indexQueries) {
    try {
      await db.execute(query);
    } catch (err: unknown) {
      logger.warn(`[DB Init] Skipping index ${name}: ${getErrorMessage(err)}`);
    }
  }
  logger.info('[DB Init] Indexes processed');
}
