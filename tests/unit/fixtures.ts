import { MemoryOfficeStore } from '../../server/core/store/memoryStore';
import { createOfficeServices, type OfficeServices } from '../../server/core/officeServices';
import type { Employee } from '../../shared/schema';

export interface TestClock {
  now: () => Date;
  set: (iso: string) => void;
  advanceMinutes: (minutes: number) => void;
}

export function createTestClock(startIso = '2030-01-15T08:00:00.000Z'): TestClock {
  let current = new Date(startIso).getTime();
  return {
    now: () => new Date(current),
    set: (iso) => {
      current = new Date(iso).getTime();
    },
    advanceMinutes: (minutes) => {
      current += minutes * 60_000;
    },
  };
}

export interface OfficeFixture {
  store: MemoryOfficeStore;
  services: OfficeServices;
  clock: TestClock;
  superAdmin: Employee;
  deviceAdmin: Employee;
  supervisor: Employee;
  alice: Employee;
  bob: Employee;
  carol: Employee;
  departed: Employee;
}

export interface FixtureOptions {
  timeZone?: string;
  maxActiveBookingsPerEmployee?: number;
}

/**
 * superAdmin
 *   ├── deviceAdmin
 *   └── supervisor
 *         ├── alice
 *         └── bob
 * carol reports to superAdmin; departed is inactive.
 */
export function createOfficeFixture(options: FixtureOptions = {}): OfficeFixture {
  const store = new MemoryOfficeStore();
  const clock = createTestClock();
  const at = clock.now();

  const superAdmin = store.addEmployee({ username: 'root', name: 'Sam Super', role: 'super_admin' }, at);
  const deviceAdmin = store.addEmployee({ username: 'kit', name: 'Kit Keeper', role: 'device_admin', supervisorId: superAdmin.id }, at);
  const supervisor = store.addEmployee({ username: 'lead', name: 'Lee Lead', role: 'supervisor', supervisorId: superAdmin.id }, at);
  const alice = store.addEmployee({ username: 'alice', name: 'Alice Able', supervisorId: supervisor.id }, at);
  const bob = store.addEmployee({ username: 'bob', name: 'Bob Baker', supervisorId: supervisor.id }, at);
  const carol = store.addEmployee({ username: 'carol', name: 'Carol Cole', role: 'hr', supervisorId: superAdmin.id }, at);
  const departed = store.addEmployee({ username: 'gone', name: 'Dee Parted', supervisorId: supervisor.id, isActive: false }, at);

  const services = createOfficeServices(store, {
    timeZone: options.timeZone ?? 'UTC',
    maxActiveBookingsPerEmployee: options.maxActiveBookingsPerEmployee ?? 0,
    now: clock.now,
  });

  return { store, services, clock, superAdmin, deviceAdmin, supervisor, alice, bob, carol, departed };
}
