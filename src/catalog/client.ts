/**
 * Catalog service integration
 * Resolves the programs that contain a given course run
 */

import type { Logger } from "pino";
import { callCatalog } from "./http";
import { programPageSchema, programSchema, toCatalogProgram } from "./types";
import type { CatalogProgram } from "./types";

export interface ProgramCatalog {
  getProgramsByCourse(courseRunKey: string): Promise<CatalogProgram[]>;
}

export interface HttpProgramCatalogOptions {
  baseUrl: string;
  token?: string;
  timeoutMs: number;
  retries: number;
  logger?: Logger;
}

// Guards against a catalog that keeps handing back `next` links
const MAX_PAGES = 50;

export class HttpProgramCatalog implements ProgramCatalog {
  constructor(private readonly opts: HttpProgramCatalogOptions) {}

  async getProgramsByCourse(courseRunKey: string): Promise<CatalogProgram[]> {
    const programs: CatalogProgram[] = [];
    let base = this.opts.baseUrl;
    let path: string = `/programs/?course=${encodeURIComponent(courseRunKey)}`;

    for (let page = 0; ; page++) {
      if (page === MAX_PAGES) {
        throw new Error(`Catalog pagination exceeded ${MAX_PAGES} pages for ${courseRunKey}`);
      }

      const response = await callCatalog({
        base,
        path,
        headers: this.opts.token ? { Authorization: `Bearer ${this.opts.token}` } : undefined,
        timeoutMs: this.opts.timeoutMs,
        retries: this.opts.retries
      });

      const { items, next } = readPage(response.json);
      for (const item of items) {
        programs.push(toCatalogProgram(programSchema.parse(item)));
      }

      this.opts.logger?.debug(
        { courseRunKey, page, received: items.length, latencyMs: response.latency },
        "[Program Course Nudge] Catalog page fetched"
      );

      if (!next) return programs;
      base = next;
      path = "";
    }
  }
}

/**
 * The programs endpoint answers either with a bare list or with a paginated envelope
 */
function readPage(json: unknown): { items: unknown[]; next: string | null } {
  if (Array.isArray(json)) {
    return { items: json, next: null };
  }
  const page = programPageSchema.safeParse(json);
  if (!page.success) {
    throw new Error(`Unexpected catalog response: ${page.error.issues.map(i => i.message).join(", ")}`);
  }
  return { items: page.data.results, next: page.data.next ?? null };
}
