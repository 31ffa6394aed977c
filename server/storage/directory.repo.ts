import type { Database } from "../db";
import { companies, users, type CompanyRow, type UserRow } from "../../shared/schema";
import {
    isAccountStatus,
    isCompanyStatus,
    isUserRole,
    type Company,
    type Identity,
} from "../../shared/types";
import { fromDecimal } from "./quotes.repo";
import type { CompanyDirectory, UserDirectory } from "./types";
import { eq } from "drizzle-orm";

// Rows with a role or status outside the known sets are treated as absent:
// an unrecognised account never gains access.
export function toIdentity(row: UserRow): Identity | undefined {
    if (!isUserRole(row.role) || !isAccountStatus(row.status)) {
        return undefined;
    }

    return {
        id: row.id,
        role: row.role,
        companyId: row.companyId,
        permissions: row.permissions,
        status: row.status,
        email: row.email,
    };
}

export function toCompany(row: CompanyRow): Company | undefined {
    if (!isCompanyStatus(row.status)) {
        return undefined;
    }

    return {
        id: row.id,
        name: row.name,
        status: row.status,
        quoteSharingEnabled: row.quoteSharingEnabled,
        requireApprovalForQuotes: row.requireApprovalForQuotes,
        maxQuoteValueWithoutApproval: fromDecimal(row.maxQuoteValueWithoutApproval),
        assignedSalesRep: row.assignedSalesRep,
    };
}

/**
 * Read-only view of the account & company tables
 */
export class DirectoryRepository implements CompanyDirectory, UserDirectory {
    constructor(private readonly dbInstance: Database) { }

    async getUser(userId: string): Promise<Identity | undefined> {
        const [row] = await this.dbInstance.select().from(users).where(eq(users.id, userId)).limit(1);
        return row ? toIdentity(row) : undefined;
    }

    async getCompany(companyId: string): Promise<Company | undefined> {
        const [row] = await this.dbInstance.select().from(companies).where(eq(companies.id, companyId)).limit(1);
        return row ? toCompany(row) : undefined;
    }

    async getUsersByCompany(companyId: string): Promise<Identity[]> {
        const rows = await this.dbInstance.select().from(users).where(eq(users.companyId, companyId));
        const members: Identity[] = [];
        for (const row of rows) {
            const identity = toIdentity(row);
            if (identity) members.push(identity);
        }
        return members;
    }
}
