import express, { type NextFunction, type Request, type Response } from "express";
import { z } from "zod";
import { ASSISTANT_NAMES, ASSISTANTS, analyzeRefundStructured, isAssistantName, runAssistant } from "./assistants.js";
import { replyText, toolCallsOf, type ChatInvoker } from "./chat.js";
import { RefundAnalysisError, errorMessage, exposedHttpError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

const ChatBodySchema = z.object({
    prompt: z.string(),
    systemPrompt: z.string().nullable().optional(),
    model: z.string().optional(),
    useTools: z.boolean().optional(),
});

const RefundAnalysisBodySchema = z.object({
    orderId: z.string().min(1),
    reason: z.string().min(1),
});

export type AppOptions = {
    invoker: ChatInvoker;
    logger?: Logger;
};

export function createApp({ invoker, logger = createLogger("silent") }: AppOptions) {
    const app = express();
    app.use(express.json({ limit: "1mb" }));

    app.get("/health", (_req, res) => {
        res.json({ status: "ok", model: invoker.defaultModel });
    });

    app.get("/assistants", (_req, res) => {
        res.json({
            assistants: ASSISTANT_NAMES.map((name) => ({ name, useTools: ASSISTANTS[name].useTools })),
        });
    });

    app.post("/assistants/:name", async (req, res, next) => {
        const name = req.params.name;
        if (!isAssistantName(name)) {
            res.status(404).json({ error: `Unknown assistant: ${name}` });
            return;
        }

        const message = req.body?.message;
        if (typeof message !== "string" || message.trim().length === 0) {
            res.status(400).json({ error: "message must be a non-empty string" });
            return;
        }

        try {
            const response = await runAssistant(invoker, name, message);
            res.json({ reply: replyText(response), toolCalls: toolCallsOf(response) });
        } catch (err) {
            next(err);
        }
    });

    app.post("/chat", async (req, res, next) => {
        const parsed = ChatBodySchema.safeParse(req.body);
        if (!parsed.success) {
            res.status(400).json({ error: "invalid chat request", issues: parsed.error.issues });
            return;
        }

        const { prompt, ...options } = parsed.data;
        try {
            res.json(await invoker.invoke(prompt, options));
        } catch (err) {
            next(err);
        }
    });

    app.post("/refund-analysis", async (req, res, next) => {
        const parsed = RefundAnalysisBodySchema.safeParse(req.body);
        if (!parsed.success) {
            res.status(400).json({ error: "orderId and reason are required", issues: parsed.error.issues });
            return;
        }

        try {
            const analysis = await analyzeRefundStructured(invoker, parsed.data.orderId, parsed.data.reason);
            res.json({ analysis });
        } catch (err) {
            if (err instanceof RefundAnalysisError) {
                res.status(502).json({ error: err.message, raw: err.raw });
                return;
            }
            next(err);
        }
    });

    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        const httpError = exposedHttpError(err);
        if (httpError?.type === "entity.parse.failed") {
            res.status(400).json({ error: "request body is not valid JSON" });
            return;
        }
        if (httpError) {
            res.status(httpError.status).json({ error: httpError.message });
            return;
        }
        logger.error(`${req.method} ${req.path} failed: ${errorMessage(err)}`);
        res.status(500).json({ error: errorMessage(err) });
    });

    return app;
}
