import { COURSE_RUN_PUBLISHED } from "../catalog/types";
import type { CatalogCourse, CatalogCourseRun, CatalogProgram, KnownProgramType } from "../catalog/types";
import type { ProgramProgress } from "../programs/progress";

// Revenue priority; lower sorts first
export const PROGRAM_TYPE_RANK: Record<KnownProgramType, number> = {
  "MicroMasters": 1,
  "Professional Program": 2,
  "Professional Certificate": 3,
  "XSeries": 4,
  "Masters": 5,
  "MicroBachelors": 6
};

export const UNKNOWN_PROGRAM_RANK = 7;

export interface NudgeSelection {
  program: CatalogProgram;
  course: CatalogCourse;
  courseRun: CatalogCourseRun;
}

function isKnownProgramType(type: string): type is KnownProgramType {
  return Object.prototype.hasOwnProperty.call(PROGRAM_TYPE_RANK, type);
}

export function programRank(type: string): number {
  return isKnownProgramType(type) ? PROGRAM_TYPE_RANK[type] : UNKNOWN_PROGRAM_RANK;
}

/**
 * Orders programs by revenue priority. Array.prototype.sort is stable, so
 * programs of the same rank keep their catalog order.
 */
export function rankPrograms(programs: readonly CatalogProgram[]): CatalogProgram[] {
  return [...programs].sort((a, b) => programRank(a.type) - programRank(b.type));
}

export function isEligibleCourseRun(run: CatalogCourseRun): boolean {
  return run.isEnrollable
    && run.isMarketable
    && Boolean(run.marketingUrl)
    && Boolean(run.image?.src)
    && run.status === COURSE_RUN_PUBLISHED;
}

/**
 * First eligible run of a not-started course, walking programs in the order
 * given. Returns null when there is nothing to suggest.
 */
export function selectNextCourse(
  programsProgress: readonly ProgramProgress[],
  completedCourseId: string
): NudgeSelection | null {
  if (!completedCourseId) {
    throw new Error("completedCourseId is required");
  }

  for (const progress of programsProgress) {
    for (const course of progress.notStarted) {
      for (const courseRun of course.courseRuns) {
        if (isEligibleCourseRun(courseRun) && courseRun.key !== completedCourseId) {
          return { program: progress.program, course, courseRun };
        }
      }
    }
  }
  return null;
}

export function findCourseRun(program: CatalogProgram, courseRunKey: string): CatalogCourseRun | null {
  for (const course of program.courses) {
    const run = course.courseRuns.find(r => r.key === courseRunKey);
    if (run) return run;
  }
  return null;
}
