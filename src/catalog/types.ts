/**
 * Catalog records as consumed by the nudge job, plus the zod schemas that
 * validate the catalog service's snake_case payloads.
 */

import { z } from "zod";

export const COURSE_RUN_PUBLISHED = "published";

export const KNOWN_PROGRAM_TYPES = [
  "MicroMasters",
  "Professional Program",
  "Professional Certificate",
  "XSeries",
  "Masters",
  "MicroBachelors"
] as const;

export type KnownProgramType = typeof KNOWN_PROGRAM_TYPES[number];

// Unknown program types are passed through untouched
export type ProgramType = KnownProgramType | (string & {});

export interface CourseRunImage {
  src: string;
}

export interface CatalogCourseRun {
  key: string;
  title: string;
  shortDescription: string;
  isEnrollable: boolean;
  isMarketable: boolean;
  marketingUrl: string | null;
  image: CourseRunImage | null;
  status: string;
}

export interface CatalogCourse {
  key: string;
  uuid: string;
  title: string;
  courseRuns: CatalogCourseRun[];
}

export interface CatalogProgram {
  uuid: string;
  title: string;
  type: ProgramType;
  courses: CatalogCourse[];
}

const courseRunSchema = z.object({
  key: z.string().min(1),
  title: z.string().default(""),
  short_description: z.string().nullish(),
  is_enrollable: z.boolean().default(false),
  is_marketable: z.boolean().default(false),
  marketing_url: z.string().nullish(),
  image: z.object({ src: z.string().nullish() }).nullish(),
  status: z.string().default("")
});

const courseSchema = z.object({
  key: z.string().min(1),
  uuid: z.string().default(""),
  title: z.string().default(""),
  course_runs: z.array(courseRunSchema).default([])
});

export const programSchema = z.object({
  uuid: z.string().min(1),
  title: z.string().default(""),
  type: z.string().default(""),
  courses: z.array(courseSchema).default([])
});

export const programPageSchema = z.object({
  results: z.array(z.unknown()),
  next: z.string().nullish()
});

export type ProgramPayload = z.infer<typeof programSchema>;

export function toCatalogProgram(payload: ProgramPayload): CatalogProgram {
  return {
    uuid: payload.uuid,
    title: payload.title,
    type: payload.type,
    courses: payload.courses.map(course => ({
      key: course.key,
      uuid: course.uuid,
      title: course.title,
      courseRuns: course.course_runs.map(run => ({
        key: run.key,
        title: run.title,
        shortDescription: run.short_description ?? "",
        isEnrollable: run.is_enrollable,
        isMarketable: run.is_marketable,
        marketingUrl: run.marketing_url ?? null,
        image: run.image?.src ? { src: run.image.src } : null,
        status: run.status
      }))
    }))
  };
}
