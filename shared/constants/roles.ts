export const EMPLOYEE_ROLES = [
  'super_admin',
  'hr',
  'finance',
  'device_admin',
  'supervisor',
  'employee'
] as const;

export type EmployeeRole = typeof EMPLOYEE_ROLES[number];

