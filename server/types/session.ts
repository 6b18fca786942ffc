import type { Session, SessionData } from 'express-session';
import type { EmployeeRole } from '../../shared/constants/roles';

// Written by the authentication service when it issues the session.
export interface SessionUser {
  id: number;
  username?: string;
  name?: string;
  role?: EmployeeRole;
}

declare module 'express-session' {
  interface SessionData {
    user?: SessionUser;
  }
}

export function getSessionUser(req: { session?: Session & Partial<SessionData> }): SessionUser | undefined {
  return req.session?.user;
}
