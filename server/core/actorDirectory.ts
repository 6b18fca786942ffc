import type { EmployeeRole } from '../../shared/constants/roles';
import type { OfficeRepository } from './store/types';

export interface ActorProfile {
  id: number;
  role: EmployeeRole;
  supervisorId: number | null;
  active: boolean;
}

// Read-only view over the employee directory. Unknown ids resolve to null.
export interface ActorDirectory {
  resolve(actorId: number): Promise<ActorProfile | null>;
}

export class StoreActorDirectory implements ActorDirectory {
  constructor(private readonly repository: Pick<OfficeRepository, 'findEmployee'>) {}

  async resolve(actorId: number): Promise<ActorProfile | null> {
    const employee = await this.repository.findEmployee(actorId);
    if (!employee) return null;
    return {
      id: employee.id,
      role: employee.role,
      supervisorId: employee.supervisorId,
      active: employee.isActive,
    };
  }
}
