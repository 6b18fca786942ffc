import type { EmployeeRole } from '../../shared/constants/roles';
import type { ActorDirectory, ActorProfile } from './actorDirectory';
import { ForbiddenError } from './errors';

export const PERMISSIONS = {
  'device.manage': ['device_admin', 'super_admin'],
  'device.decide': ['device_admin', 'super_admin'],
  'device.confirmReturn': ['device_admin', 'super_admin'],
  'device.adminCancel': ['device_admin', 'super_admin'],
  'device.viewQueues': ['device_admin', 'super_admin'],
  'room.manage': ['super_admin'],
} as const satisfies Record<string, readonly EmployeeRole[]>;

export type Permission = keyof typeof PERMISSIONS;

export function hasPermission(actor: ActorProfile, permission: Permission): boolean {
  if (!actor.active) return false;
  const allowed: readonly EmployeeRole[] = PERMISSIONS[permission];
  return allowed.includes(actor.role);
}

export function isOwner(actor: ActorProfile, requesterId: number): boolean {
  return actor.active && actor.id === requesterId;
}

/**
 * Supervisor-gated decisions: the subject's direct supervisor or a super_admin,
 * and never the subject themself.
 */
export function canDecideFor(actor: ActorProfile, subject: ActorProfile): boolean {
  if (!actor.active) return false;
  if (actor.id === subject.id) return false;
  return actor.role === 'super_admin' || subject.supervisorId === actor.id;
}

/**
 * Resolves the acting employee. Unknown and inactive actors are denied here,
 * before any entity is loaded.
 */
export async function resolveActiveActor(directory: ActorDirectory, actorId: number): Promise<ActorProfile> {
  const actor = await directory.resolve(actorId);
  if (!actor) {
    throw new ForbiddenError('Unknown actor', { actorId });
  }
  if (!actor.active) {
    throw new ForbiddenError('Actor is inactive', { actorId });
  }
  return actor;
}

export function assertPermission(actor: ActorProfile, permission: Permission): void {
  if (!hasPermission(actor, permission)) {
    throw new ForbiddenError(`Role ${actor.role} may not perform ${permission}`, { actorId: actor.id, permission });
  }
}

export function assertOwner(actor: ActorProfile, requesterId: number, what: string): void {
  if (!isOwner(actor, requesterId)) {
    throw new ForbiddenError(`Only the requester may act on this ${what}`, { actorId: actor.id });
  }
}

export function assertCanDecideFor(actor: ActorProfile, subject: ActorProfile): void {
  if (actor.id === subject.id) {
    throw new ForbiddenError('Cannot decide on your own request', { actorId: actor.id });
  }
  if (!canDecideFor(actor, subject)) {
    throw new ForbiddenError('Only the direct supervisor or a super admin may decide', { actorId: actor.id, subjectId: subject.id });
  }
}
