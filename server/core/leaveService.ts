import type { LeaveRequest } from '../../shared/schema';
import { LEAVE_TYPES, type LeaveStatus, type LeaveType } from '../../shared/constants/statuses';
import type { ActorProfile } from './actorDirectory';
import { assertCanDecideFor, canDecideFor, resolveActiveActor } from './approvalGate';
import { ForbiddenError, InvalidInputError, InvalidIntervalError, InvalidTransitionError, NotFoundError } from './errors';
import { logger } from './logger';
import type { ServiceContext } from './serviceContext';
import type { LeaveRequestPatch, OfficeRepository } from './store/types';
import { isValidDateString } from '../utils/dateUtils';

export interface CreateLeaveInput {
  leaveType: string;
  startDate: string;
  endDate: string;
  reason?: string | null;
}

function isLeaveType(value: string): value is LeaveType {
  const allowed: readonly string[] = LEAVE_TYPES;
  return allowed.includes(value);
}

export class LeaveService {
  constructor(private readonly ctx: ServiceContext) {}

  async create(actorId: number, input: CreateLeaveInput): Promise<LeaveRequest> {
    const actor = await resolveActiveActor(this.ctx.directory, actorId);
    if (!isLeaveType(input.leaveType)) {
      throw new InvalidInputError(`Unknown leave type: ${input.leaveType}`, { allowed: LEAVE_TYPES });
    }
    if (!isValidDateString(input.startDate) || !isValidDateString(input.endDate)) {
      throw new InvalidInputError('startDate and endDate must be YYYY-MM-DD', {
        startDate: input.startDate,
        endDate: input.endDate,
      });
    }
    // ISO calendar dates compare correctly as strings.
    if (input.endDate < input.startDate) {
      throw new InvalidIntervalError('endDate must not be before startDate', {
        startDate: input.startDate,
        endDate: input.endDate,
      });
    }
    const leaveType = input.leaveType;
    const at = this.ctx.now();

    const leave = await this.ctx.store.transaction(tx => tx.insertLeave({
      requesterId: actor.id,
      leaveType,
      startDate: input.startDate,
      endDate: input.endDate,
      reason: input.reason?.trim() || null,
    }, at));

    logger.info('[Leaves] Leave requested', { actorId: actor.id, leaveId: leave.id, status: leave.status });
    return leave;
  }

  approve(actorId: number, leaveId: number): Promise<LeaveRequest> {
    return this.decide(actorId, leaveId, 'approved', (actor, at) => ({ decidedBy: actor.id, decidedAt: at }));
  }

  reject(actorId: number, leaveId: number, reason?: string | null): Promise<LeaveRequest> {
    const rejectReason = reason?.trim() || null;
    return this.decide(actorId, leaveId, 'rejected', (actor, at) => ({ decidedBy: actor.id, decidedAt: at, rejectReason }));
  }

  /** The requester, their supervisor or a super_admin may withdraw a pending leave. */
  async cancel(actorId: number, leaveId: number): Promise<LeaveRequest> {
    const actor = await resolveActiveActor(this.ctx.directory, actorId);
    const at = this.ctx.now();

    const leave = await this.ctx.store.transaction(async (tx) => {
      const existing = await this.loadLeave(tx, leaveId);
      if (existing.requesterId !== actor.id) {
        const subject = await this.resolveSubject(existing.requesterId);
        if (!canDecideFor(actor, subject)) {
          throw new ForbiddenError('Only the requester, their supervisor or a super admin may cancel this leave', { actorId: actor.id });
        }
      }
      return this.transition(tx, existing, 'cancelled', { cancelledBy: actor.id }, at);
    });

    logger.info('[Leaves] Leave cancelled', { actorId: actor.id, leaveId, status: leave.status });
    return leave;
  }

  async listMine(actorId: number): Promise<LeaveRequest[]> {
    const actor = await resolveActiveActor(this.ctx.directory, actorId);
    return this.ctx.store.listLeaves({ requesterIds: [actor.id], order: 'desc' });
  }

  /** A super_admin sees every pending leave; anyone else sees their direct reports'. */
  async listPendingForApprover(actorId: number): Promise<LeaveRequest[]> {
    const actor = await resolveActiveActor(this.ctx.directory, actorId);
    if (actor.role === 'super_admin') {
      return this.ctx.store.listLeaves({ statuses: ['pending'], order: 'asc' });
    }
    const reportIds = await this.ctx.store.listDirectReportIds(actor.id);
    if (reportIds.length === 0) return [];
    return this.ctx.store.listLeaves({ requesterIds: reportIds, statuses: ['pending'], order: 'asc' });
  }

  private async decide(
    actorId: number,
    leaveId: number,
    to: Extract<LeaveStatus, 'approved' | 'rejected'>,
    patch: (actor: ActorProfile, at: Date) => LeaveRequestPatch
  ): Promise<LeaveRequest> {
    const actor = await resolveActiveActor(this.ctx.directory, actorId);
    const at = this.ctx.now();

    const leave = await this.ctx.store.transaction(async (tx) => {
      const existing = await this.loadLeave(tx, leaveId);
      assertCanDecideFor(actor, await this.resolveSubject(existing.requesterId));
      return this.transition(tx, existing, to, patch(actor, at), at);
    });

    logger.info(`[Leaves] Leave ${to}`, { actorId: actor.id, leaveId, status: leave.status });
    return leave;
  }

  private async loadLeave(tx: OfficeRepository, leaveId: number): Promise<LeaveRequest> {
    const leave = await tx.findLeave(leaveId, { forUpdate: true });
    if (!leave) {
      throw new NotFoundError('Leave request not found', { leaveId });
    }
    return leave;
  }

  // A requester who has left the directory can still be decided on, but only by a super_admin.
  private async resolveSubject(requesterId: number): Promise<ActorProfile> {
    const subject = await this.ctx.directory.resolve(requesterId);
    return subject ?? { id: requesterId, role: 'employee', supervisorId: null, active: false };
  }

  private async transition(
    tx: OfficeRepository,
    leave: LeaveRequest,
    to: LeaveStatus,
    patch: LeaveRequestPatch,
    at: Date
  ): Promise<LeaveRequest> {
    if (leave.status !== 'pending') {
      throw new InvalidTransitionError(`Cannot move a ${leave.status} leave to ${to}`, { leaveId: leave.id, status: leave.status });
    }
    const updated = await tx.transitionLeave(leave.id, { from: ['pending'], to, patch, at });
    if (!updated) {
      throw new InvalidTransitionError('Leave request changed concurrently', { leaveId: leave.id });
    }
    return updated;
  }
}
