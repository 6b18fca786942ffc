import fs from 'fs';
import { z } from 'zod';
import { EMPLOYEE_ROLES } from '../../../shared/constants/roles';
import type { MemoryOfficeStore } from './memoryStore';

const demoSeedSchema = z.object({
  employees: z.array(z.object({
    username: z.string().min(1),
    name: z.string().min(1),
    role: z.enum(EMPLOYEE_ROLES),
    department: z.string().nullable().optional(),
    supervisor: z.string().optional(),
  })),
  devices: z.array(z.object({
    name: z.string().min(1),
    type: z.string().nullable(),
    description: z.string().nullable(),
  })),
  rooms: z.array(z.object({
    name: z.string().min(1),
    capacity: z.number().int().positive(),
    location: z.string().nullable(),
  })),
});

export type DemoSeed = z.infer<typeof demoSeedSchema>;

const DEMO_SEED_URL = new URL('../../data/demo-seed.json', import.meta.url);

export function loadDemoSeed(): DemoSeed {
  const raw: unknown = JSON.parse(fs.readFileSync(DEMO_SEED_URL, 'utf-8'));
  return demoSeedSchema.parse(raw);
}

/** Supervisors must appear before their reports in the seed file. */
export async function seedMemoryStore(store: MemoryOfficeStore, seed: DemoSeed = loadDemoSeed()): Promise<void> {
  const idsByUsername = new Map<string, number>();
  for (const entry of seed.employees) {
    const supervisorId = entry.supervisor ? idsByUsername.get(entry.supervisor) : undefined;
    if (entry.supervisor && supervisorId === undefined) {
      throw new Error(`[Seed] Supervisor ${entry.supervisor} of ${entry.username} is not seeded yet`);
    }
    const employee = store.addEmployee({
      username: entry.username,
      name: entry.name,
      role: entry.role,
      department: entry.department ?? null,
      supervisorId: supervisorId ?? null,
    });
    idsByUsername.set(employee.username, employee.id);
  }

  const at = new Date();
  for (const device of seed.devices) {
    await store.insertDevice(device, at);
  }
  for (const room of seed.rooms) {
    await store.insertRoom(room, at);
  }
}
