import type { Express, RequestHandler } from "express";
import { isStaff } from "../../shared/permissions";
import { companyQuotesQuerySchema } from "../../shared/schema";
import { requireIdentity } from "../auth/tokenAuth";
import type { QuoteService } from "../services/quoteService";
import { sendRouteError } from "./routeHelpers";
import { serializeCompanyQuotes } from "./serializers";

export interface CompanyRouteDeps {
    quoteService: QuoteService;
    isAuthenticated: RequestHandler;
}

export function registerCompanyRoutes(app: Express, deps: CompanyRouteDeps): void {
    const { quoteService, isAuthenticated } = deps;

    app.get("/api/companies/:id/quotes", isAuthenticated, async (req, res) => {
        try {
            const identity = requireIdentity(req);
            const { filters, pagination } = companyQuotesQuerySchema.parse(req.query);
            const result = await quoteService.listCompanyQuotes(req.params.id, filters, pagination, identity);
            res.json(serializeCompanyQuotes(result, { includeAdminNotes: isStaff(identity) }));
        } catch (error) {
            sendRouteError(req, res, error, "Failed to retrieve company quotes");
        }
    });
}
