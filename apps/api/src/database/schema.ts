import { isNull, relations, sql } from "drizzle-orm";
import {
  boolean,
  check,
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
  varchar,
} from "drizzle-orm/pg-core";

export const admins = pgTable("admins", {
  id: uuid("id").primaryKey().defaultRandom(),
  username: varchar("username", { length: 80 }).notNull().unique(),
  passwordHash: varchar("password_hash", { length: 200 }).notNull(),
  isSuperadmin: boolean("is_superadmin").notNull().default(false),
  clinicId: integer("clinic_id"),
  createdAt: timestamp("created_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});

export const OPEN_SHIFT_INDEX = "shifts_one_open_per_admin";

/** One clock-in/clock-out period; `clockOut` stays null while the shift is open. */
export const shifts = pgTable(
  "shifts",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    adminId: uuid("admin_id")
      .notNull()
      .references(() => admins.id),
    clockIn: timestamp("clock_in", { withTimezone: true }).notNull(),
    clockOut: timestamp("clock_out", { withTimezone: true }),
    note: text("note"),
  },
  (table) => ({
    adminClockInIdx: index("shifts_admin_clock_in_idx").on(
      table.adminId,
      table.clockIn,
    ),
    oneOpenPerAdmin: uniqueIndex(OPEN_SHIFT_INDEX)
      .on(table.adminId)
      .where(isNull(table.clockOut)),
    clockOrder: check(
      "shifts_clock_order",
      sql`${table.clockOut} IS NULL OR ${table.clockOut} >= ${table.clockIn}`,
    ),
  }),
);

export const auditEvents = pgTable("audit_events", {
  id: uuid("id").primaryKey().defaultRandom(),
  actorAdminId: uuid("actor_admin_id").references(() => admins.id),
  action: varchar("action", { length: 64 }).notNull(),
  entityType: varchar("entity_type", { length: 64 }).notNull(),
  entityId: varchar("entity_id", { length: 64 }),
  payload: jsonb("payload"),
  createdAt: timestamp("created_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});

export const adminsRelations = relations(admins, ({ many }) => ({
  shifts: many(shifts),
}));

export const shiftsRelations = relations(shifts, ({ one }) => ({
  admin: one(admins, {
    fields: [shifts.adminId],
    references: [admins.id],
  }),
}));

export type Admin = typeof admins.$inferSelect;
export type Shift = typeof shifts.$inferSelect;
export type NewAuditEvent = typeof auditEvents.$inferInsert;
