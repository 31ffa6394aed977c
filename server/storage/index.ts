/**
 * Storage Layer Index
 *
 * Instantiates every repository against one database handle. The composition
 * root receives this bundle and hands each port to the services that need it.
 */

import type { Database } from "../db";
import { CatalogRepository } from "./catalog.repo";
import { DirectoryRepository } from "./directory.repo";
import { QuoteHistoryRepository } from "./history.repo";
import { QuotesRepository } from "./quotes.repo";
import type {
    CatalogService,
    CompanyDirectory,
    QuoteHistoryStore,
    QuoteStore,
    UserDirectory,
} from "./types";

export interface Repositories {
    quotes: QuoteStore;
    history: QuoteHistoryStore;
    companies: CompanyDirectory;
    users: UserDirectory;
    catalog: CatalogService;
}

export function createRepositories(db: Database): Repositories {
    const directory = new DirectoryRepository(db);

    return {
        quotes: new QuotesRepository(db),
        history: new QuoteHistoryRepository(db),
        companies: directory,
        users: directory,
        catalog: new CatalogRepository(db),
    };
}
