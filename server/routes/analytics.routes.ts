import type { Express, RequestHandler } from "express";
import { requireIdentity } from "../auth/tokenAuth";
import type { QuoteService } from "../services/quoteService";
import { sendRouteError } from "./routeHelpers";
import { serializeAnalyticsSummary, serializeStatusBreakdown } from "./serializers";

export interface AnalyticsRouteDeps {
    quoteService: QuoteService;
    isAuthenticated: RequestHandler;
}

export function registerAnalyticsRoutes(app: Express, deps: AnalyticsRouteDeps): void {
    const { quoteService, isAuthenticated } = deps;

    app.get("/api/analytics/summary", isAuthenticated, async (req, res) => {
        try {
            const identity = requireIdentity(req);
            const summary = await quoteService.getAnalyticsSummary(identity);
            res.json(serializeAnalyticsSummary(summary));
        } catch (error) {
            sendRouteError(req, res, error, "Failed to retrieve analytics summary");
        }
    });

    app.get("/api/analytics/quotes/status-breakdown", isAuthenticated, async (req, res) => {
        try {
            const identity = requireIdentity(req);
            const breakdown = await quoteService.getStatusBreakdown(identity);
            res.json(serializeStatusBreakdown(breakdown));
        } catch (error) {
            sendRouteError(req, res, error, "Failed to retrieve status breakdown");
        }
    });
}
