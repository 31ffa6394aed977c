import type { Express, RequestHandler } from "express";
import { isStaff } from "../../shared/permissions";
import { transitionRequestSchema } from "../../shared/quoteWorkflow";
import {
    bulkActionSchema,
    createQuoteSchema,
    discountRequestSchema,
    emailQuoteSchema,
    followUpSchema,
    listQuotesQuerySchema,
    updateQuoteSchema,
} from "../../shared/schema";
import { requireIdentity } from "../auth/tokenAuth";
import type { QuoteService } from "../services/quoteService";
import { sendRouteError } from "./routeHelpers";
import { serializeBulkResult, serializeHistory, serializeQuote } from "./serializers";

export interface QuoteRouteDeps {
    quoteService: QuoteService;
    isAuthenticated: RequestHandler;
}

export function registerQuoteRoutes(app: Express, deps: QuoteRouteDeps): void {
    const { quoteService, isAuthenticated } = deps;

    app.post("/api/quotes", isAuthenticated, async (req, res) => {
        try {
            const identity = requireIdentity(req);
            const input = createQuoteSchema.parse(req.body);
            const quote = await quoteService.createQuote(input, identity);
            res.status(201).json(serializeQuote(quote, { includeAdminNotes: isStaff(identity) }));
        } catch (error) {
            sendRouteError(req, res, error, "Failed to create quote");
        }
    });

    app.get("/api/quotes", isAuthenticated, async (req, res) => {
        try {
            const identity = requireIdentity(req);
            const { filters, pagination } = listQuotesQuerySchema.parse(req.query);
            const quotes = await quoteService.listQuotes(filters, pagination, identity);
            res.json(quotes.map((quote) => serializeQuote(quote, { includeAdminNotes: isStaff(identity) })));
        } catch (error) {
            sendRouteError(req, res, error, "Failed to retrieve quotes");
        }
    });

    // Registered before /api/quotes/:id so "bulk-action" is never read as an id
    app.post("/api/quotes/bulk-action", isAuthenticated, async (req, res) => {
        try {
            const identity = requireIdentity(req);
            const request = bulkActionSchema.parse(req.body);
            const result = await quoteService.bulkAction(request, identity);
            res.json(serializeBulkResult(result));
        } catch (error) {
            sendRouteError(req, res, error, "Failed to perform bulk action");
        }
    });

    app.get("/api/quotes/:id", isAuthenticated, async (req, res) => {
        try {
            const identity = requireIdentity(req);
            const quote = await quoteService.getQuote(req.params.id, identity);
            res.json(serializeQuote(quote, { includeAdminNotes: isStaff(identity) }));
        } catch (error) {
            sendRouteError(req, res, error, "Failed to retrieve quote");
        }
    });

    app.put("/api/quotes/:id", isAuthenticated, async (req, res) => {
        try {
            const identity = requireIdentity(req);
            const patch = updateQuoteSchema.parse(req.body);
            const quote = await quoteService.updateQuote(req.params.id, patch, identity);
            res.json(serializeQuote(quote, { includeAdminNotes: isStaff(identity) }));
        } catch (error) {
            sendRouteError(req, res, error, "Failed to update quote");
        }
    });

    app.delete("/api/quotes/:id", isAuthenticated, async (req, res) => {
        try {
            const identity = requireIdentity(req);
            await quoteService.deleteQuote(req.params.id, identity);
            res.json({ message: "Quote deleted successfully" });
        } catch (error) {
            sendRouteError(req, res, error, "Failed to delete quote");
        }
    });

    app.post("/api/quotes/:id/duplicate", isAuthenticated, async (req, res) => {
        try {
            const identity = requireIdentity(req);
            const quote = await quoteService.duplicateQuote(req.params.id, identity);
            res.status(201).json(serializeQuote(quote, { includeAdminNotes: isStaff(identity) }));
        } catch (error) {
            sendRouteError(req, res, error, "Failed to duplicate quote");
        }
    });

    app.get("/api/quotes/:id/history", isAuthenticated, async (req, res) => {
        try {
            const identity = requireIdentity(req);
            const history = await quoteService.getHistory(req.params.id, identity);
            res.json(serializeHistory(history));
        } catch (error) {
            sendRouteError(req, res, error, "Failed to retrieve quote history");
        }
    });

    app.post("/api/quotes/:id/status-change", isAuthenticated, async (req, res) => {
        try {
            const identity = requireIdentity(req);
            const request = transitionRequestSchema.parse(req.body);
            const result = await quoteService.transitionStatus(req.params.id, request, identity);
            res.json({
                message: `Quote status changed from ${result.oldStatus} to ${result.newStatus}`,
                old_status: result.oldStatus,
                new_status: result.newStatus,
                notification_sent: result.notificationQueued,
            });
        } catch (error) {
            sendRouteError(req, res, error, "Failed to change quote status");
        }
    });

    app.post("/api/quotes/:id/bulk-discount", isAuthenticated, async (req, res) => {
        try {
            const identity = requireIdentity(req);
            const input = discountRequestSchema.parse(req.body);
            const result = await quoteService.applyDiscount(req.params.id, input, identity);
            res.json({
                message: "Discount applied successfully",
                total_discount: result.totalDiscount,
                new_total: result.newTotal,
                items_affected: result.itemsAffected,
            });
        } catch (error) {
            sendRouteError(req, res, error, "Failed to apply discount");
        }
    });

    app.post("/api/quotes/:id/email", isAuthenticated, async (req, res) => {
        try {
            const identity = requireIdentity(req);
            const options = emailQuoteSchema.parse(req.body ?? {});
            const result = await quoteService.emailQuote(req.params.id, options, identity);
            res.status(202).json({
                message: "Quote email has been queued for sending",
                recipient_email: result.recipientEmail,
                queued: result.queued,
            });
        } catch (error) {
            sendRouteError(req, res, error, "Failed to queue quote email");
        }
    });

    app.post("/api/quotes/:id/follow-up", isAuthenticated, async (req, res) => {
        try {
            const identity = requireIdentity(req);
            const { followUpType } = followUpSchema.parse(req.body ?? {});
            const result = await quoteService.sendFollowUp(req.params.id, followUpType, identity);
            res.status(202).json({
                message: `Follow-up email (${result.followUpType}) has been queued for sending`,
                recipient_email: result.recipientEmail,
                follow_up_type: result.followUpType,
                queued: result.queued,
            });
        } catch (error) {
            sendRouteError(req, res, error, "Failed to queue follow-up email");
        }
    });
}
