import express from "express";
import type { Server } from "http";
import { createKaggleToolsRouter } from "./router.js";
import type { AppContext } from "./context.js";

export interface ServerOptions {
    port?: number;
    apiPath?: string;
}

export const DEFAULT_PORT = 4100;

export function createApp(context: AppContext, options: ServerOptions = {}): express.Express {
    const app = express();
    app.use(express.json());
    app.use(options.apiPath ?? "/api", createKaggleToolsRouter(context));
    return app;
}

/**
 * Start an Express server exposing operations, resources and cache administration
 */
export function startServer(context: AppContext, options: ServerOptions = {}): Server {
    const port = options.port ?? DEFAULT_PORT;
    return createApp(context, options).listen(port, () => {
        context.logger.info(`Kaggle tools server listening on http://localhost:${port}`);
    });
}
