import type { Express, RequestHandler } from "express";
import { createServer, type Server } from "http";
import type { QuoteService } from "./services/quoteService";
import { registerAnalyticsRoutes } from "./routes/analytics.routes";
import { registerCompanyRoutes } from "./routes/companies.routes";
import { registerQuoteRoutes } from "./routes/quotes.routes";

export interface RouteDeps {
    quoteService: QuoteService;
    isAuthenticated: RequestHandler;
}

export function registerRoutes(app: Express, deps: RouteDeps): void {
    registerQuoteRoutes(app, deps);
    registerCompanyRoutes(app, deps);
    registerAnalyticsRoutes(app, deps);
}

export function createHttpServer(app: Express): Server {
    return createServer(app);
}
