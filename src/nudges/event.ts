import type { CatalogCourse, CatalogCourseRun, CatalogProgram } from "../catalog/types";
import type { EnterpriseCustomer } from "../enterprise/learners";

export type NudgeEventProperties = {
  COURSE_ONE_NAME: string;
  PROGRAM_TYPE: string;
  PROGRAM_TITLE: string;
  COURSE_TWO_NAME: string;
  COURSE_TWO_SHORT_DESCRIPTION: string;
  COURSE_TWO_LINK: string;
  COURSE_TWO_IMAGE_LINK: string | null;
};

export interface NudgeRecord {
  userId: number;
  username: string;
  completedCourseId: string;
  programUuid: string;
  suggestedCourseRunKey: string;
  courseUrl: string;
  committed: boolean;
}

export interface SuggestedCourseUrlInput {
  enterpriseCustomer: EnterpriseCustomer | null;
  course: CatalogCourse;
  courseRun: CatalogCourseRun;
  portalBaseUrl: string;
  marketingRootUrl: string;
}

function joinUrl(base: string, relative: string): string {
  if (!base) return relative;
  return new URL(relative, base).toString();
}

/**
 * Enterprise learners with a learner portal land on the portal's course page;
 * everyone else goes to the public marketing page of the suggested run.
 */
export function buildSuggestedCourseUrl(input: SuggestedCourseUrlInput): string {
  const { enterpriseCustomer } = input;
  if (enterpriseCustomer && enterpriseCustomer.enableLearnerPortal) {
    return joinUrl(input.portalBaseUrl, [enterpriseCustomer.slug, "course", input.course.key].join("/"));
  }
  return joinUrl(input.marketingRootUrl, input.courseRun.marketingUrl ?? "");
}

export interface NudgeEventInput {
  program: CatalogProgram;
  completedCourseId: string;
  completedCourseRun: CatalogCourseRun | null;
  suggestedCourseRun: CatalogCourseRun;
  courseUrl: string;
}

export function buildNudgeEventProperties(input: NudgeEventInput): NudgeEventProperties {
  return {
    COURSE_ONE_NAME: input.completedCourseRun?.title ?? input.completedCourseId,
    PROGRAM_TYPE: input.program.type,
    PROGRAM_TITLE: input.program.title,
    COURSE_TWO_NAME: input.suggestedCourseRun.title,
    COURSE_TWO_SHORT_DESCRIPTION: input.suggestedCourseRun.shortDescription,
    COURSE_TWO_LINK: input.courseUrl,
    COURSE_TWO_IMAGE_LINK: input.suggestedCourseRun.image?.src ?? null
  };
}

export function formatNudgeRecord(record: NudgeRecord): string {
  return `User: ${record.username}, Completed Course: ${record.completedCourseId}, ` +
    `Suggested Course: ${record.suggestedCourseRunKey}`;
}
