/**
 * Program course nudge job
 *
 * For every learner who passed a course yesterday, suggests the next course
 * they have not started in a program containing that course, and emits an
 * analytics event the email platform turns into a nudge email.
 *
 * One linear pass per (course, learner) pair. Nothing is persisted, so a
 * second run on the same day re-emits the same events.
 */

import type { Logger } from "pino";
import type { AnalyticsSink } from "../analytics/segment";
import type { ProgramCatalog } from "../catalog/client";
import type { EnterpriseLearnerLookup } from "../enterprise/learners";
import { yesterdayWindow } from "../grades/passed";
import type { PassedGradeStore, PassedWindow } from "../grades/passed";
import type { ProgramProgressSource } from "../programs/progress";
import { buildNudgeEventProperties, buildSuggestedCourseUrl, formatNudgeRecord } from "./event";
import type { NudgeRecord } from "./event";
import { findCourseRun, rankPrograms, selectNextCourse } from "./selector";

export interface NudgeJobDeps {
  grades: PassedGradeStore;
  catalog: ProgramCatalog;
  progress: ProgramProgressSource;
  enterprise: EnterpriseLearnerLookup;
  /** Only needed when committing */
  analytics?: AnalyticsSink;
  logger: Logger;
  eventName: string;
  marketingRootUrl: string;
  enterprisePortalBaseUrl: string;
  timezone: string;
}

export interface NudgeRunOptions {
  commit: boolean;
  now?: Date;
}

export interface NudgeRunSummary {
  window: PassedWindow;
  coursesEvaluated: number;
  usersEvaluated: number;
  sent: number;
  records: NudgeRecord[];
}

export async function runProgramCourseNudges(deps: NudgeJobDeps, options: NudgeRunOptions): Promise<NudgeRunSummary> {
  const { logger } = deps;
  const analytics = options.commit ? deps.analytics : undefined;
  if (options.commit && !analytics) {
    throw new Error("An analytics sink is required unless running with --no-commit");
  }
  const window = yesterdayWindow(options.now ?? new Date(), deps.timezone);
  const courseToUsers = await deps.grades.getPassedCourseToUsers(window);

  const records: NudgeRecord[] = [];
  let usersEvaluated = 0;

  for (const [completedCourseId, learners] of courseToUsers) {
    const programs = rankPrograms(await deps.catalog.getProgramsByCourse(completedCourseId));
    if (programs.length === 0) {
      logger.debug({ completedCourseId }, "[Program Course Nudge] No programs contain course");
      continue;
    }

    for (const user of learners) {
      usersEvaluated++;
      const programsProgress = await deps.progress.progress(user, programs);
      const selection = selectNextCourse(programsProgress, completedCourseId);
      if (!selection) continue;

      const { program, course, courseRun } = selection;

      const enterpriseCustomer = await deps.enterprise.getEnterpriseCustomer(user);
      const courseUrl = buildSuggestedCourseUrl({
        enterpriseCustomer,
        course,
        courseRun,
        portalBaseUrl: deps.enterprisePortalBaseUrl,
        marketingRootUrl: deps.marketingRootUrl
      });

      if (analytics) {
        const properties = buildNudgeEventProperties({
          program,
          completedCourseId,
          completedCourseRun: findCourseRun(program, completedCourseId),
          suggestedCourseRun: courseRun,
          courseUrl
        });

        analytics.track(user.id, deps.eventName, properties);

        logger.info(
          `[Program Course Nudge] Segment event fired to suggested. Completed Course: [${completedCourseId}], ` +
          `Program: [${program.uuid}], Suggested Course: [${courseRun.key}], User: [${user.username}].`
        );
      } else {
        logger.info(
          { completedCourseId, programUuid: program.uuid, suggestedCourseRunKey: courseRun.key, courseUrl },
          `[Program Course Nudge] Dry run, event not sent for User: [${user.username}].`
        );
      }

      records.push({
        userId: user.id,
        username: user.username,
        completedCourseId,
        programUuid: program.uuid,
        suggestedCourseRunKey: courseRun.key,
        courseUrl,
        committed: options.commit
      });
    }
  }

  const sent = records.filter(r => r.committed).length;
  logger.info(
    { window: window.date, commit: options.commit, records: records.map(formatNudgeRecord) },
    `[Program Course Nudge] ${sent} Emails sent, ${records.length} suggestions found.`
  );

  return {
    window,
    coursesEvaluated: courseToUsers.size,
    usersEvaluated,
    sent,
    records
  };
}
