import { index, jsonb, pgTable, timestamp, varchar, serial, boolean, integer } from "drizzle-orm/pg-core";
import type { EmployeeRole } from "../constants/roles";

// Session storage table, shared with connect-pg-simple.
export const sessions = pgTable(
  "sessions",
  {
    sid: varchar("sid").primaryKey(),
    sess: jsonb("sess").notNull(),
    expire: timestamp("expire").notNull(),
  },
  (table) => [index("IDX_session_expire").on(table.expire)]
);

// Employee directory. Owned by the HR side of the platform; read-only here.
export const employees = pgTable("employees", {
  id: serial("id").primaryKey(),
  username: varchar("username", { length: 64 }).notNull().unique(),
  employeeNo: varchar("employee_no", { length: 32 }),
  name: varchar("name", { length: 100 }).notNull(),
  email: varchar("email"),
  department: varchar("department"),
  position: varchar("position"),
  supervisorId: integer("supervisor_id"),
  role: varchar("role", { length: 20 }).$type<EmployeeRole>().notNull().default("employee"),
  isActive: boolean("is_active").notNull().default(true),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index("employees_supervisor_id_idx").on(table.supervisorId),
]);

export type Employee = typeof employees.$inferSelect;
export type InsertEmployee = typeof employees.$inferInsert;
