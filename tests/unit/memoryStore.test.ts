import { describe, it, expect } from 'vitest';
import { ConflictError } from '../../server/core/errors';
import { MemoryOfficeStore } from '../../server/core/store/memoryStore';
import { loadDemoSeed, seedMemoryStore } from '../../server/core/store/demoData';

const AT = new Date('2030-01-15T08:00:00.000Z');

describe('Memory Store - transactions', () => {
  it('rolls back every write when the work throws', async () => {
    const store = new MemoryOfficeStore();
    const employee = store.addEmployee({ username: 'alice', name: 'Alice Able' }, AT);

    await expect(store.transaction(async (tx) => {
      const device = await tx.insertDevice({ name: 'Laptop', type: null, description: null }, AT);
      await tx.insertDeviceRequest({ deviceId: device.id, requesterId: employee.id }, AT);
      throw new Error('abort');
    })).rejects.toThrow('abort');

    expect(await store.listDevices()).toEqual([]);
    expect(await store.listDeviceRequests({})).toEqual([]);
  });

  it('reports a second active request as a Conflict', async () => {
    const store = new MemoryOfficeStore();
    const employee = store.addEmployee({ username: 'alice', name: 'Alice Able' }, AT);
    const device = await store.transaction(tx => tx.insertDevice({ name: 'Laptop', type: null, description: null }, AT));
    await store.transaction(tx => tx.insertDeviceRequest({ deviceId: device.id, requesterId: employee.id }, AT));

    await expect(
      store.transaction(tx => tx.insertDeviceRequest({ deviceId: device.id, requesterId: employee.id }, AT))
    ).rejects.toBeInstanceOf(ConflictError);
  });

  it('reports an overlapping booking as a Conflict and keeps touching ones', async () => {
    const store = new MemoryOfficeStore();
    const employee = store.addEmployee({ username: 'alice', name: 'Alice Able' }, AT);
    const room = await store.transaction(tx => tx.insertRoom({ name: 'Board Room', capacity: 8, location: null }, AT));
    const slot = (start: string, end: string) => ({
      roomId: room.id,
      requesterId: employee.id,
      title: null,
      startAt: new Date(`2030-01-16T${start}:00.000Z`),
      endAt: new Date(`2030-01-16T${end}:00.000Z`),
    });

    await store.transaction(tx => tx.insertBooking(slot('10:00', '11:00'), AT));
    await store.transaction(tx => tx.insertBooking(slot('11:00', '12:00'), AT));
    await expect(store.transaction(tx => tx.insertBooking(slot('10:59', '11:01'), AT))).rejects.toThrow(
      'Time slot conflicts with an existing booking'
    );
  });

  it('moves a row only from the expected status', async () => {
    const store = new MemoryOfficeStore();
    const employee = store.addEmployee({ username: 'alice', name: 'Alice Able' }, AT);
    const leave = await store.transaction(tx => tx.insertLeave({
      requesterId: employee.id,
      leaveType: 'annual',
      startDate: '2030-02-03',
      endDate: '2030-02-04',
      reason: null,
    }, AT));

    const later = new Date('2030-01-15T09:00:00.000Z');
    const approved = await store.transitionLeave(leave.id, { from: ['pending'], to: 'approved', at: later });
    expect(approved).toMatchObject({ status: 'approved', updatedAt: later });
    expect(await store.transitionLeave(leave.id, { from: ['pending'], to: 'rejected', at: later })).toBeNull();
    expect(await store.transitionLeave(404, { from: ['pending'], to: 'rejected', at: later })).toBeNull();
  });
});

describe('Memory Store - demo data', () => {
  it('seeds the bundled directory with supervisors wired up', async () => {
    const store = new MemoryOfficeStore();
    const seed = loadDemoSeed();
    await seedMemoryStore(store, seed);

    const lead = await store.findEmployee(3);
    expect(lead).toMatchObject({ username: 'lead', role: 'supervisor', supervisorId: 1 });
    expect(await store.listDirectReportIds(3)).toEqual([6, 7]);
    expect(await store.listDevices()).toHaveLength(seed.devices.length);
    expect((await store.listRooms()).map(r => r.name)).toEqual(['Focus Room', 'Board Room', 'Huddle Space']);
  });

  it('refuses a supervisor that is not seeded first', async () => {
    const store = new MemoryOfficeStore();
    await expect(seedMemoryStore(store, {
      employees: [{ username: 'alex', name: 'Alex Example', role: 'employee', supervisor: 'lead' }],
      devices: [],
      rooms: [],
    })).rejects.toThrow('[Seed] Supervisor lead of alex is not seeded yet');
  });
});
