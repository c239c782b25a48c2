import type { CatalogCourse, CatalogCourseRun, CatalogProgram } from '../../src/catalog/types';
import type { ProgramProgress } from '../../src/programs/progress';

export function courseRun(key: string, overrides: Partial<CatalogCourseRun> = {}): CatalogCourseRun {
  return {
    key,
    title: `${key} title`,
    shortDescription: `${key} description`,
    isEnrollable: true,
    isMarketable: true,
    marketingUrl: `https://www.example.com/course/${key.toLowerCase()}`,
    image: { src: `https://images.example.com/${key.toLowerCase()}.png` },
    status: 'published',
    ...overrides
  };
}

export function course(key: string, runs: CatalogCourseRun[]): CatalogCourse {
  return { key, uuid: `${key}-uuid`, title: `${key} course`, courseRuns: runs };
}

export function program(uuid: string, type: string, courses: CatalogCourse[] = []): CatalogProgram {
  return { uuid, title: `${uuid} title`, type, courses };
}

export function notStartedOnly(p: CatalogProgram, notStarted: CatalogCourse[] = p.courses): ProgramProgress {
  return { program: p, completed: [], inProgress: [], notStarted };
}
