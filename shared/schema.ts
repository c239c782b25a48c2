import { pgTable, serial, text, integer, boolean, timestamp, real, index, unique, uuid } from "drizzle-orm/pg-core";

// Learners
export const users = pgTable("users", {
  id: serial("id").primaryKey(),
  username: text("username").notNull().unique(),
  email: text("email").notNull(),
  isActive: boolean("is_active").default(true).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull()
});

// One row per learner per course run; passed_timestamp is set the first time the learner passes
export const persistentCourseGrades = pgTable("persistent_course_grades", {
  id: serial("id").primaryKey(),
  userId: integer("user_id").references(() => users.id).notNull(),
  courseId: text("course_id").notNull(),
  percentGrade: real("percent_grade").default(0).notNull(),
  letterGrade: text("letter_grade").default("").notNull(),
  passedTimestamp: timestamp("passed_timestamp", { withTimezone: true }),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  modifiedAt: timestamp("modified_at", { withTimezone: true }).defaultNow().notNull()
}, (t) => ({
  userCourse: unique().on(t.userId, t.courseId),
  passedIdx: index("persistent_course_grades_passed_idx").on(t.passedTimestamp)
}));

export const studentCourseEnrollments = pgTable("student_course_enrollments", {
  id: serial("id").primaryKey(),
  userId: integer("user_id").references(() => users.id).notNull(),
  courseId: text("course_id").notNull(),
  mode: text("mode").default("audit").notNull(),
  isActive: boolean("is_active").default(true).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull()
}, (t) => ({
  userCourse: unique().on(t.userId, t.courseId),
  userIdx: index("student_course_enrollments_user_idx").on(t.userId)
}));

export const enterpriseCustomers = pgTable("enterprise_customers", {
  uuid: uuid("uuid").primaryKey(),
  name: text("name").notNull(),
  slug: text("slug").notNull().unique(),
  active: boolean("active").default(true).notNull(),
  enableLearnerPortal: boolean("enable_learner_portal").default(false).notNull()
});

export const enterpriseCustomerUsers = pgTable("enterprise_customer_users", {
  id: serial("id").primaryKey(),
  userId: integer("user_id").references(() => users.id).notNull(),
  enterpriseCustomerUuid: uuid("enterprise_customer_uuid").references(() => enterpriseCustomers.uuid).notNull(),
  active: boolean("active").default(true).notNull(),
  linked: boolean("linked").default(true).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull()
}, (t) => ({
  userCustomer: unique().on(t.userId, t.enterpriseCustomerUuid),
  userIdx: index("enterprise_customer_users_user_idx").on(t.userId)
}));
