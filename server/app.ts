/**
 * Composition root. Wires repositories, the notification dispatcher and the
 * services into an Express app. The process entry point and the route tests
 * both build the app through here.
 */

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { createTokenAuth } from "./auth/tokenAuth";
import { toHttpError } from "./errors";
import { logger } from "./logger";
import { inFlightTracker } from "./middleware/gracefulShutdown";
import { createReadinessCheck, healthCheck, type ReadinessProbe } from "./middleware/healthChecks";
import { assignRequestId } from "./middleware/requestContext";
import { registerRoutes } from "./routes";
import { AccessGate } from "./services/accessGate";
import { AuditTrail } from "./services/auditTrail";
import { BulkQuoteActions } from "./services/bulkQuoteActions";
import { DiscountEngine } from "./services/discountEngine";
import { NotificationQueue } from "./services/notificationQueue";
import { QuoteAnalytics } from "./services/quoteAnalytics";
import { QuoteService } from "./services/quoteService";
import { QuoteStateMachine, type Clock } from "./services/quoteStateMachine";
import type { Repositories } from "./storage";
import type { NotificationDispatcher } from "./storage/types";

export interface AppDeps {
  repositories: Repositories;
  dispatcher: NotificationDispatcher;
  authTokenSecret: string;
  quoteValidityDays: number;
  notificationConcurrency?: number;
  readinessProbe?: ReadinessProbe;
  now?: Clock;
}

export interface AppServices {
  quoteService: QuoteService;
  notifications: NotificationQueue;
}

export function createServices(deps: AppDeps): AppServices {
  const { repositories, dispatcher } = deps;
  const now: Clock = deps.now ?? (() => new Date());

  const notifications = new NotificationQueue(deps.notificationConcurrency);
  const accessGate = new AccessGate(repositories.companies, repositories.users);
  const audit = new AuditTrail(repositories.history);
  const stateMachine = new QuoteStateMachine(repositories.quotes, audit, notifications, dispatcher, now);
  const discounts = new DiscountEngine(repositories.quotes, audit, now);
  const bulk = new BulkQuoteActions(repositories.quotes, audit, stateMachine, now);
  const analytics = new QuoteAnalytics(repositories.quotes, now);

  const quoteService = new QuoteService({
    quotes: repositories.quotes,
    companies: repositories.companies,
    catalog: repositories.catalog,
    dispatcher,
    notifications,
    accessGate,
    audit,
    stateMachine,
    discounts,
    bulk,
    analytics,
    quoteValidityDays: deps.quoteValidityDays,
    now,
  });

  return { quoteService, notifications };
}

export function createApp(deps: AppDeps): { app: Express; services: AppServices } {
  const app = express();
  const services = createServices(deps);

  app.use(assignRequestId);
  app.use(inFlightTracker);
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", healthCheck);
  app.get("/ready", createReadinessCheck(deps.readinessProbe ?? (async () => true)));

  const isAuthenticated = createTokenAuth({
    secret: deps.authTokenSecret,
    users: deps.repositories.users,
  });

  registerRoutes(app, { quoteService: services.quoteService, isAuthenticated });

  app.use("/api", (_req: Request, res: Response) => {
    res.status(404).json({ message: "Not found" });
  });

  // Body parser failures and errors passed to next() land here
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = readStatus(err);
    if (status !== undefined && status >= 400 && status < 500) {
      return res.status(status).json({ message: status === 400 ? "Malformed request body" : "Request rejected" });
    }

    const mapped = toHttpError(err);
    if (mapped.status >= 500) {
      logger.withRequest(req).error("[Server] Unhandled error", { error: err });
    }
    res.status(mapped.status).json({ message: mapped.message });
  });

  return { app, services };
}

function readStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  const status = Reflect.get(err, "status");
  return typeof status === "number" ? status : undefined;
}
