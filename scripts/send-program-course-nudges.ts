#!/usr/bin/env tsx

/**
 * Program Course Nudge
 *
 * Suggests the next program course to learners who passed a course yesterday.
 *
 * Usage:
 *   npm run nudges:send
 *   npm run nudges:send -- --no-commit
 */

import { randomUUID } from "node:crypto";
import { loadConfig } from "../server/bootstrap/config";
import { getLogger, withCorrelation } from "../server/bootstrap/logger";
import { createDb, createDbPool, pingDb } from "../server/db";
import { createSegmentSink } from "../src/analytics/segment";
import { HttpProgramCatalog } from "../src/catalog/client";
import { DrizzleEnterpriseLearnerLookup } from "../src/enterprise/learners";
import { DrizzlePassedGradeStore } from "../src/grades/passed";
import { runProgramCourseNudges } from "../src/nudges/job";
import { DrizzleProgramProgressMeter } from "../src/programs/progress";

export interface CliOptions {
  commit: boolean;
  help: boolean;
}

export function parseCliArgs(args: readonly string[]): CliOptions {
  const unknown = args.filter(a => a !== "--no-commit" && a !== "--help");
  if (unknown.length > 0) {
    throw new Error(`Unknown argument(s): ${unknown.join(" ")}`);
  }
  return {
    commit: !args.includes("--no-commit"),
    help: args.includes("--help")
  };
}

const USAGE = `
Program Course Nudge

Usage: npm run nudges:send -- [options]

Options:
  --no-commit   Dry run: select and log suggestions without emitting events
  --help        Show this message
`;

async function main() {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.help) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig();
  const logger = getLogger(config.logLevel, config.logPretty, config.serviceName);
  const pool = createDbPool(config.dbUrl);

  try {
    if (!(await pingDb(pool))) {
      throw new Error("Database is not reachable");
    }

    const db = createDb(pool);
    const analytics = options.commit ? createSegmentSink(config.segmentWriteKey ?? "") : undefined;

    await withCorrelation(randomUUID(), async () => {
      const summary = await runProgramCourseNudges({
        grades: new DrizzlePassedGradeStore(db, logger),
        catalog: new HttpProgramCatalog({
          baseUrl: config.catalogApiUrl,
          token: config.catalogApiToken,
          timeoutMs: config.catalogTimeoutMs,
          retries: config.catalogMaxRetries,
          logger
        }),
        progress: new DrizzleProgramProgressMeter(db),
        enterprise: new DrizzleEnterpriseLearnerLookup(db),
        analytics,
        logger,
        eventName: config.nudgeEventName,
        marketingRootUrl: config.marketingRootUrl,
        enterprisePortalBaseUrl: config.enterprisePortalBaseUrl,
        timezone: config.timezone
      }, { commit: options.commit });

      logger.info(
        { courses: summary.coursesEvaluated, users: summary.usersEvaluated, suggestions: summary.records.length },
        "[Program Course Nudge] Run complete"
      );
    });

    await analytics?.flush();
  } finally {
    await pool.end();
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch(error => {
    console.error("[Program Course Nudge] Fatal error:", error);
    process.exit(1);
  });
}
