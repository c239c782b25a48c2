/**
 * Program progress
 *
 * Splits each program's courses into completed, in-progress and not-started
 * buckets for one learner. A course counts as completed when the learner has
 * a passing grade on any of its runs, and as in progress when the learner
 * holds an active enrollment in any of its runs.
 */

import { and, eq, isNotNull } from "drizzle-orm";
import type { Database } from "../../server/db";
import { persistentCourseGrades, studentCourseEnrollments } from "../../shared/schema";
import type { CatalogCourse, CatalogProgram } from "../catalog/types";
import type { LearnerUser } from "../grades/passed";

export interface ProgramProgress {
  program: CatalogProgram;
  completed: CatalogCourse[];
  inProgress: CatalogCourse[];
  notStarted: CatalogCourse[];
}

export interface LearnerCourseActivity {
  passedCourseRunKeys: ReadonlySet<string>;
  enrolledCourseRunKeys: ReadonlySet<string>;
}

export interface ProgramProgressSource {
  progress(user: LearnerUser, programs: readonly CatalogProgram[]): Promise<ProgramProgress[]>;
}

export function partitionProgramProgress(program: CatalogProgram, activity: LearnerCourseActivity): ProgramProgress {
  const result: ProgramProgress = { program, completed: [], inProgress: [], notStarted: [] };

  for (const course of program.courses) {
    const runKeys = course.courseRuns.map(r => r.key);
    if (runKeys.some(k => activity.passedCourseRunKeys.has(k))) {
      result.completed.push(course);
    } else if (runKeys.some(k => activity.enrolledCourseRunKeys.has(k))) {
      result.inProgress.push(course);
    } else {
      result.notStarted.push(course);
    }
  }

  return result;
}

export function passedCourseRunsQuery(db: Database, userId: number) {
  return db
    .select({ courseId: persistentCourseGrades.courseId })
    .from(persistentCourseGrades)
    .where(and(
      eq(persistentCourseGrades.userId, userId),
      isNotNull(persistentCourseGrades.passedTimestamp)
    ));
}

export function activeEnrollmentsQuery(db: Database, userId: number) {
  return db
    .select({ courseId: studentCourseEnrollments.courseId })
    .from(studentCourseEnrollments)
    .where(and(
      eq(studentCourseEnrollments.userId, userId),
      eq(studentCourseEnrollments.isActive, true)
    ));
}

export class DrizzleProgramProgressMeter implements ProgramProgressSource {
  constructor(private readonly db: Database) {}

  async progress(user: LearnerUser, programs: readonly CatalogProgram[]): Promise<ProgramProgress[]> {
    const activity = await this.loadActivity(user.id);
    return programs.map(program => partitionProgramProgress(program, activity));
  }

  private async loadActivity(userId: number): Promise<LearnerCourseActivity> {
    const passed = await passedCourseRunsQuery(this.db, userId);
    const enrolled = await activeEnrollmentsQuery(this.db, userId);

    return {
      passedCourseRunKeys: new Set(passed.map(r => r.courseId)),
      enrolledCourseRunKeys: new Set(enrolled.map(r => r.courseId))
    };
  }
}
