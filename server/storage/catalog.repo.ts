import type { Database } from "../db";
import { products } from "../../shared/schema";
import type { CatalogProduct } from "../../shared/types";
import { fromDecimal } from "./quotes.repo";
import type { CatalogService } from "./types";
import { inArray } from "drizzle-orm";

export class CatalogRepository implements CatalogService {
    constructor(private readonly dbInstance: Database) { }

    async getProducts(productIds: readonly string[]): Promise<CatalogProduct[]> {
        if (productIds.length === 0) return [];

        const rows = await this.dbInstance
            .select()
            .from(products)
            .where(inArray(products.id, [...new Set(productIds)]));

        return rows.map((row) => ({
            id: row.id,
            name: row.name,
            description: row.description,
            price: fromDecimal(row.price),
        }));
    }
}
