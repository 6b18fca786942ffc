import pg from 'pg';
import { loadDemoSeed } from './core/store/demoData';
const { Pool } = pg;

const pool = new Pool({
  connectionString: process.env.DATABASE_URL,
});

// Loads the demo directory, devices and rooms into Postgres. Safe to re-run.
async function seed() {
  console.log('Seeding database...\n');
  const data = loadDemoSeed();

  try {
    console.log('Creating employees...');
    for (const employee of data.employees) {
      await pool.query(
        `INSERT INTO employees (username, name, role, department, supervisor_id)
         VALUES ($1, $2, $3, $4, (SELECT id FROM employees WHERE username = $5))
         ON CONFLICT (username) DO UPDATE SET
           name = EXCLUDED.name,
           role = EXCLUDED.role,
           department = EXCLUDED.department,
           supervisor_id = EXCLUDED.supervisor_id,
           updated_at = NOW()`,
        [employee.username, employee.name, employee.role, employee.department ?? null, employee.supervisor ?? null]
      );
    }
    console.log(`✓ ${data.employees.length} employees\n`);

    console.log('Creating devices...');
    let devicesInserted = 0;
    for (const device of data.devices) {
      const result = await pool.query(
        `INSERT INTO devices (name, type, description)
         SELECT $1, $2, $3
         WHERE NOT EXISTS (SELECT 1 FROM devices WHERE name = $1 AND retired_at IS NULL)`,
        [device.name, device.type, device.description]
      );
      if (result.rowCount && result.rowCount > 0) devicesInserted++;
    }
    console.log(`✓ Devices: ${devicesInserted} new (${data.devices.length - devicesInserted} already existed)\n`);

    console.log('Creating meeting rooms...');
    let roomsInserted = 0;
    for (const room of data.rooms) {
      const result = await pool.query(
        `INSERT INTO meeting_rooms (name, capacity, location)
         SELECT $1, $2, $3
         WHERE NOT EXISTS (SELECT 1 FROM meeting_rooms WHERE name = $1 AND retired_at IS NULL)`,
        [room.name, room.capacity, room.location]
      );
      if (result.rowCount && result.rowCount > 0) roomsInserted++;
    }
    console.log(`✓ Meeting rooms: ${roomsInserted} new (${data.rooms.length - roomsInserted} already existed)\n`);

    console.log('Database seeded successfully!');
  } catch (error) {
    console.error('Seed error:', error);
    throw error;
  } finally {
    await pool.end();
  }
}

seed().catch(() => {
  process.exitCode = 1;
});
