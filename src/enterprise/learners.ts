import { and, asc, eq } from "drizzle-orm";
import type { Database } from "../../server/db";
import { enterpriseCustomers, enterpriseCustomerUsers } from "../../shared/schema";
import type { LearnerUser } from "../grades/passed";

export interface EnterpriseCustomer {
  uuid: string;
  name: string;
  slug: string;
  enableLearnerPortal: boolean;
}

export interface EnterpriseLearnerLookup {
  getEnterpriseCustomer(user: LearnerUser): Promise<EnterpriseCustomer | null>;
}

export function enterpriseLinkQuery(db: Database, userId: number) {
  return db
    .select({
      uuid: enterpriseCustomers.uuid,
      name: enterpriseCustomers.name,
      slug: enterpriseCustomers.slug,
      enableLearnerPortal: enterpriseCustomers.enableLearnerPortal
    })
    .from(enterpriseCustomerUsers)
    .innerJoin(enterpriseCustomers, eq(enterpriseCustomers.uuid, enterpriseCustomerUsers.enterpriseCustomerUuid))
    .where(and(
      eq(enterpriseCustomerUsers.userId, userId),
      eq(enterpriseCustomerUsers.active, true)
    ))
    .orderBy(asc(enterpriseCustomerUsers.id))
    .limit(1);
}

/**
 * Resolves the enterprise customer a learner is actively linked to.
 * Learners without an active link are plain B2C learners (null).
 */
export class DrizzleEnterpriseLearnerLookup implements EnterpriseLearnerLookup {
  constructor(private readonly db: Database) {}

  async getEnterpriseCustomer(user: LearnerUser): Promise<EnterpriseCustomer | null> {
    const rows = await enterpriseLinkQuery(this.db, user.id);

    return rows[0] ?? null;
  }
}
