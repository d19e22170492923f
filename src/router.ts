import express from "express";
import type { ErrorKind } from "@kaggle-tools/core";
import { findOperation, readResource, toResponse } from "@kaggle-tools/langchain-tools";
import type { AppContext } from "./context.js";

export interface ApiReply {
    status: number;
    body: unknown;
}

const STATUS_BY_KIND: Record<ErrorKind, number> = {
    Validation: 400,
    Auth: 401,
    Forbidden: 403,
    NotFound: 404,
    RateLimited: 429,
    Network: 502,
    Unknown: 500,
};

/**
 * Request handlers, independent of express so they can be called directly
 */
export function createApiHandlers(context: AppContext) {
    return {
        listOperations(): ApiReply {
            return {
                status: 200,
                body: {
                    operations: context.catalog.map((e) => ({ name: e.name, description: e.description })),
                    resources: context.resources.map((r) => ({ uri: r.uri, name: r.name, description: r.description })),
                },
            };
        },

        async callOperation(name: string, input: unknown): Promise<ApiReply> {
            const entry = findOperation(context.catalog, name);
            if (!entry) {
                return { status: 404, body: { error: `Unknown operation: ${name}` } };
            }
            const response = toResponse(await entry.run(input));
            return {
                status: response.status === "success" ? 200 : STATUS_BY_KIND[response.error.kind],
                body: response,
            };
        },

        async readResource(uri: unknown): Promise<ApiReply> {
            if (typeof uri !== "string" || !uri) {
                return { status: 400, body: { error: "Query parameter 'uri' is required" } };
            }
            const text = await readResource(context.resources, uri);
            if (text === undefined) {
                return { status: 404, body: { error: `Unknown resource: ${uri}` } };
            }
            return { status: 200, body: { uri, text } };
        },

        cacheStats(): ApiReply {
            return { status: 200, body: { ...context.cache.stats(), operations: context.invoker.listOperations() } };
        },

        invalidateCache(operation: unknown): ApiReply {
            if (operation === undefined) {
                const removed = context.invoker.invalidate();
                context.logger.info(`Cache invalidated: ${removed} entries`);
                return { status: 200, body: { removed } };
            }
            if (typeof operation !== "string" || !findOperation(context.catalog, operation)) {
                return { status: 400, body: { error: `Unknown operation: ${String(operation)}` } };
            }
            const removed = context.invoker.invalidate(operation);
            context.logger.info(`Cache invalidated for ${operation}: ${removed} entries`);
            return { status: 200, body: { removed } };
        },
    };
}

export function createKaggleToolsRouter(context: AppContext): express.Router {
    const router = express.Router();
    const handlers = createApiHandlers(context);
    const send = (res: express.Response, reply: ApiReply) => res.status(reply.status).json(reply.body);

    router.get("/operations", (_req, res) => {
        send(res, handlers.listOperations());
    });

    router.post("/operations/:name", async (req, res) => {
        try {
            send(res, await handlers.callOperation(req.params.name, req.body));
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            context.logger.error(`POST /operations/${req.params.name} failed: ${message}`);
            res.status(500).json({ error: "Internal error" });
        }
    });

    router.get("/resources", async (req, res) => {
        try {
            send(res, await handlers.readResource(req.query.uri));
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            context.logger.error(`GET /resources failed: ${message}`);
            res.status(500).json({ error: "Internal error" });
        }
    });

    router.get("/cache", (_req, res) => {
        send(res, handlers.cacheStats());
    });

    router.delete("/cache", (req, res) => {
        send(res, handlers.invalidateCache(req.query.operation));
    });

    return router;
}
