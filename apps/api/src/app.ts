import express from "express";
import cors from "cors";
import { config } from "./config";
import { errorHandler } from "./middleware/error.middleware";
import { requestLogger } from "./middleware/request-logger.middleware";
import analysisRoutes from "./routes/analysis.routes";
import exportRoutes from "./routes/export.routes";
import passwordRoutes from "./routes/password.routes";

export const createApp = () => {
    const app = express();

    app.use(cors({
        origin: config.corsOrigins,
        credentials: true
    }));
    app.use(requestLogger);
    app.use(express.json({ limit: "1mb" }));

    app.use(passwordRoutes);
    app.use(analysisRoutes);
    app.use(exportRoutes);

    app.get("/health", (req, res) => {
        res.json({ status: "ok" });
    });

    app.use(errorHandler);

    return app;
};
