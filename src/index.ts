import express, { Request, Response } from "express";
import { AppDataSource } from "./db/data-source";
import { uploadRoutes } from "./routes/upload";
import { evaluateRoutes } from "./routes/evaluate";
import { resultRoutes } from "./routes/result";
import { requirementsRoutes } from "./routes/requirements";
import { logger, toErrorMessage } from "./config/logger";
import { getConfig } from "./config/env";
import { getQueueConfig } from "./queue/queue-config";
import { evaluationProcessor } from "./workers/evaluation-worker";
import { getOpenAIService } from "./services/openai.service";
import { createShutdownHandler } from "./utils/shutdown.util";

const config = getConfig();

const app = express();

// Middleware
app.use(express.json({ limit: '2mb' }));
app.use(express.urlencoded({ extended: true }));

// Routes
app.use("/requirements", requirementsRoutes);
app.use("/upload", uploadRoutes);
app.use("/evaluate", evaluateRoutes);
app.use("/result", resultRoutes);

// Health check
app.get("/health", (req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
});

// Root route
app.get("/", (req: Request, res: Response) => {
    res.json({
        message: "Resume Evidence Matcher API",
        version: "1.0.0",
        description: "Scores resumes against frozen job requirements using verbatim, validated evidence",
        endpoints: {
            "Requirements": {
                "POST /requirements": "Extract and freeze requirements from a job description",
                "GET /requirements": "List frozen requirements artifacts",
                "GET /requirements/:roleId/:jdHash": "Get a frozen requirements document"
            },
            "File Management": {
                "POST /upload": "Upload a resume (PDF or text)"
            },
            "Evaluation System": {
                "POST /evaluate": "Start evaluation (async)",
                "GET /result/:id": "Get evaluation results"
            },
            "System": {
                "GET /health": "Health check",
                "GET /": "API information"
            }
        },
        infrastructure: {
            "Queue System": "BullMQ with Redis",
            "Database": "PostgreSQL with TypeORM",
            "Artifacts": config.artifactsDir,
            "LLM": {
                extraction: config.extraction.modelId,
                matching: config.matching.modelId
            }
        }
    });
});

// Initialize database and start server
async function startServer() {
    try {
        await AppDataSource.initialize();
        await AppDataSource.runMigrations();
        logger.info({}, "Database connection established");

        const openaiConnected = await getOpenAIService().testConnection(config.matching.modelId);
        if (openaiConnected) {
            logger.info({ model: config.matching.modelId }, "OpenAI service initialized and connected");
        } else {
            logger.warn({ model: config.matching.modelId }, "OpenAI service initialized but connection test failed");
        }

        const queueConfig = getQueueConfig();
        queueConfig.startWorker(evaluationProcessor);
        logger.info({ concurrency: config.queue.concurrency }, "Queue system initialized and worker started");

        const server = app.listen(config.port, () => {
            logger.info({
                port: config.port,
                artifactsDir: config.artifactsDir,
                minQuoteLength: config.minQuoteLength,
                rejectEmptyEvidence: config.rejectEmptyEvidence
            }, `Server running at http://localhost:${config.port}`);
        });

        const shutdown = createShutdownHandler([
            {
                name: "http server",
                close: () => new Promise<void>((resolve, reject) => {
                    server.close(error => error ? reject(error) : resolve());
                })
            },
            { name: "queue", close: () => queueConfig.close() },
            { name: "database", close: () => AppDataSource.destroy() }
        ], logger, code => process.exit(code));

        process.once("SIGTERM", signal => void shutdown(signal));
        process.once("SIGINT", signal => void shutdown(signal));
    } catch (error: unknown) {
        logger.error({ error: toErrorMessage(error) }, "Failed to start server");
        process.exit(1);
    }
}

void startServer();
