import { index, pgTable, timestamp, varchar, serial, text, date, integer } from "drizzle-orm/pg-core";
import type { LeaveStatus, LeaveType } from "../constants/statuses";

export const leaveRequests = pgTable("leave_requests", {
  id: serial("id").primaryKey(),
  requesterId: integer("requester_id").notNull(),
  leaveType: varchar("leave_type", { length: 20 }).$type<LeaveType>().notNull(),
  startDate: date("start_date").notNull(),
  endDate: date("end_date").notNull(),
  reason: text("reason"),
  status: varchar("status", { length: 20 }).$type<LeaveStatus>().notNull().default("pending"),
  decidedBy: integer("decided_by"),
  decidedAt: timestamp("decided_at", { withTimezone: true }),
  rejectReason: text("reject_reason"),
  cancelledBy: integer("cancelled_by"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index("leave_requests_requester_id_idx").on(table.requesterId),
  index("leave_requests_status_idx").on(table.status),
]);

export type LeaveRequest = typeof leaveRequests.$inferSelect;
export type InsertLeaveRequest = typeof leaveRequests.$inferInsert;
