import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../server/core/logger', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn()
  }
}));

import {
  ForbiddenError,
  InvalidInputError,
  InvalidIntervalError,
  InvalidTransitionError,
  NotFoundError,
} from '../../server/core/errors';
import { createOfficeFixture, type OfficeFixture } from './fixtures';

describe('Leave Requests', () => {
  let f: OfficeFixture;

  beforeEach(() => {
    f = createOfficeFixture();
  });

  it('files a pending leave', async () => {
    const leave = await f.services.leaves.create(f.alice.id, {
      leaveType: 'annual',
      startDate: '2030-02-03',
      endDate: '2030-02-07',
      reason: ' family trip ',
    });
    expect(leave).toMatchObject({
      requesterId: f.alice.id,
      leaveType: 'annual',
      status: 'pending',
      reason: 'family trip',
      decidedBy: null,
    });
  });

  it('accepts a single-day leave', async () => {
    const leave = await f.services.leaves.create(f.alice.id, { leaveType: 'sick', startDate: '2030-02-03', endDate: '2030-02-03' });
    expect(leave.status).toBe('pending');
  });

  it('rejects unknown leave types and malformed or inverted dates', async () => {
    await expect(
      f.services.leaves.create(f.alice.id, { leaveType: 'sabbatical', startDate: '2030-02-03', endDate: '2030-02-04' })
    ).rejects.toBeInstanceOf(InvalidInputError);
    await expect(
      f.services.leaves.create(f.alice.id, { leaveType: 'annual', startDate: '2030-02-30', endDate: '2030-03-01' })
    ).rejects.toBeInstanceOf(InvalidInputError);
    await expect(
      f.services.leaves.create(f.alice.id, { leaveType: 'annual', startDate: '2030-02-05', endDate: '2030-02-04' })
    ).rejects.toBeInstanceOf(InvalidIntervalError);
  });

  it('lets the direct supervisor approve', async () => {
    const leave = await f.services.leaves.create(f.alice.id, { leaveType: 'annual', startDate: '2030-02-03', endDate: '2030-02-04' });
    const approved = await f.services.leaves.approve(f.supervisor.id, leave.id);
    expect(approved).toMatchObject({ status: 'approved', decidedBy: f.supervisor.id });
  });

  it('lets a super admin decide for anyone', async () => {
    const leave = await f.services.leaves.create(f.alice.id, { leaveType: 'annual', startDate: '2030-02-03', endDate: '2030-02-04' });
    const rejected = await f.services.leaves.reject(f.superAdmin.id, leave.id, ' busy quarter ');
    expect(rejected).toMatchObject({ status: 'rejected', decidedBy: f.superAdmin.id, rejectReason: 'busy quarter' });
  });

  it('denies peers, other supervisors and the requester', async () => {
    const leave = await f.services.leaves.create(f.alice.id, { leaveType: 'annual', startDate: '2030-02-03', endDate: '2030-02-04' });
    await expect(f.services.leaves.approve(f.bob.id, leave.id)).rejects.toBeInstanceOf(ForbiddenError);
    await expect(f.services.leaves.approve(f.carol.id, leave.id)).rejects.toBeInstanceOf(ForbiddenError);
    await expect(f.services.leaves.approve(f.alice.id, leave.id)).rejects.toThrow('Cannot decide on your own request');
  });

  it('never lets a super admin approve their own leave', async () => {
    const leave = await f.services.leaves.create(f.superAdmin.id, { leaveType: 'personal', startDate: '2030-02-03', endDate: '2030-02-03' });
    await expect(f.services.leaves.approve(f.superAdmin.id, leave.id)).rejects.toBeInstanceOf(ForbiddenError);
  });

  it('decides a pending leave only once', async () => {
    const leave = await f.services.leaves.create(f.alice.id, { leaveType: 'annual', startDate: '2030-02-03', endDate: '2030-02-04' });
    await f.services.leaves.approve(f.supervisor.id, leave.id);
    await expect(f.services.leaves.reject(f.supervisor.id, leave.id)).rejects.toBeInstanceOf(InvalidTransitionError);
    await expect(f.services.leaves.cancel(f.alice.id, leave.id)).rejects.toThrow('Cannot move a approved leave to cancelled');
  });

  it('lets the requester or the supervisor cancel a pending leave', async () => {
    const own = await f.services.leaves.create(f.alice.id, { leaveType: 'annual', startDate: '2030-02-03', endDate: '2030-02-04' });
    const cancelled = await f.services.leaves.cancel(f.alice.id, own.id);
    expect(cancelled).toMatchObject({ status: 'cancelled', cancelledBy: f.alice.id });

    const other = await f.services.leaves.create(f.bob.id, { leaveType: 'annual', startDate: '2030-02-03', endDate: '2030-02-04' });
    await expect(f.services.leaves.cancel(f.alice.id, other.id)).rejects.toBeInstanceOf(ForbiddenError);
    const bySupervisor = await f.services.leaves.cancel(f.supervisor.id, other.id);
    expect(bySupervisor.cancelledBy).toBe(f.supervisor.id);
  });

  it('reports an unknown leave as not found', async () => {
    await expect(f.services.leaves.approve(f.supervisor.id, 404)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('shows each approver the pending leaves they may decide', async () => {
    const fromAlice = await f.services.leaves.create(f.alice.id, { leaveType: 'annual', startDate: '2030-02-03', endDate: '2030-02-04' });
    f.clock.advanceMinutes(1);
    const fromBob = await f.services.leaves.create(f.bob.id, { leaveType: 'sick', startDate: '2030-02-05', endDate: '2030-02-05' });
    f.clock.advanceMinutes(1);
    const fromCarol = await f.services.leaves.create(f.carol.id, { leaveType: 'personal', startDate: '2030-02-06', endDate: '2030-02-06' });
    f.clock.advanceMinutes(1);
    const decided = await f.services.leaves.create(f.bob.id, { leaveType: 'annual', startDate: '2030-03-01', endDate: '2030-03-02' });
    await f.services.leaves.approve(f.supervisor.id, decided.id);

    const forSupervisor = await f.services.leaves.listPendingForApprover(f.supervisor.id);
    expect(forSupervisor.map(l => l.id)).toEqual([fromAlice.id, fromBob.id]);

    const forSuperAdmin = await f.services.leaves.listPendingForApprover(f.superAdmin.id);
    expect(forSuperAdmin.map(l => l.id)).toEqual([fromAlice.id, fromBob.id, fromCarol.id]);

    expect(await f.services.leaves.listPendingForApprover(f.alice.id)).toEqual([]);
  });

  it('lists my leaves newest first', async () => {
    const first = await f.services.leaves.create(f.bob.id, { leaveType: 'annual', startDate: '2030-02-03', endDate: '2030-02-04' });
    f.clock.advanceMinutes(1);
    const second = await f.services.leaves.create(f.bob.id, { leaveType: 'sick', startDate: '2030-02-10', endDate: '2030-02-10' });
    const mine = await f.services.leaves.listMine(f.bob.id);
    expect(mine.map(l => l.id)).toEqual([second.id, first.id]);
  });
});
