import dayjs from "dayjs";
import tz from "dayjs/plugin/timezone.js";
import utc from "dayjs/plugin/utc.js";
import { and, asc, eq, gte, lt } from "drizzle-orm";
import type { Logger } from "pino";
import type { Database } from "../../server/db";
import { persistentCourseGrades, users } from "../../shared/schema";

dayjs.extend(utc);
dayjs.extend(tz);

export interface LearnerUser {
  id: number;
  username: string;
  email: string;
}

export interface PassedWindow {
  date: string; // YYYY-MM-DD in the business timezone
  start: Date;
  end: Date;
}

export interface PassedGradeRow {
  courseId: string;
  user: LearnerUser;
}

export interface PassedGradeStore {
  getPassedCourseToUsers(window: PassedWindow): Promise<Map<string, LearnerUser[]>>;
}

/**
 * The calendar day before `now` in the given zone, as a [start, end) range of instants.
 */
export function yesterdayWindow(now: Date, zone: string): PassedWindow {
  const today = dayjs(now).tz(zone).format("YYYY-MM-DD");
  const date = dayjs(today).subtract(1, "day").format("YYYY-MM-DD");
  return {
    date,
    start: dayjs.tz(date, zone).toDate(),
    end: dayjs.tz(today, zone).toDate()
  };
}

export function groupPassedGrades(rows: readonly PassedGradeRow[]): Map<string, LearnerUser[]> {
  const byCourse = new Map<string, LearnerUser[]>();
  for (const row of rows) {
    const learners = byCourse.get(row.courseId) ?? [];
    if (!learners.some(u => u.id === row.user.id)) {
      learners.push(row.user);
    }
    byCourse.set(row.courseId, learners);
  }
  return byCourse;
}

/**
 * Grades passed inside the window; `end` is exclusive so a midnight pass lands on one day only.
 */
export function passedGradesQuery(db: Database, window: PassedWindow) {
  return db
    .select({
      courseId: persistentCourseGrades.courseId,
      userId: users.id,
      username: users.username,
      email: users.email
    })
    .from(persistentCourseGrades)
    .innerJoin(users, eq(users.id, persistentCourseGrades.userId))
    .where(and(
      gte(persistentCourseGrades.passedTimestamp, window.start),
      lt(persistentCourseGrades.passedTimestamp, window.end)
    ))
    .orderBy(asc(persistentCourseGrades.id));
}

export class DrizzlePassedGradeStore implements PassedGradeStore {
  constructor(private readonly db: Database, private readonly logger: Logger) {}

  async getPassedCourseToUsers(window: PassedWindow): Promise<Map<string, LearnerUser[]>> {
    const rows = await passedGradesQuery(this.db, window);

    const byCourse = groupPassedGrades(rows.map(r => ({
      courseId: r.courseId,
      user: { id: r.userId, username: r.username, email: r.email }
    })));

    this.logger.info(
      `[Program Course Nudge] Found [${rows.length}] passing grades on [${window.date}] date with ` +
      `[${new Set(rows.map(r => r.userId)).size}] distinct users and [${byCourse.size}] distinct courses`
    );

    return byCourse;
  }
}
