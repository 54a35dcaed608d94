import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import config from './config';
import './container';

// Import routes
import healthRoutes from './routes/health';
import cropRoutes from './routes/crop';
import jobRoutes from "./routes/job";

// Import middleware
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { ApiResponse } from "./types/response.types";

class App {
    public app: Application;

    constructor() {
        this.app = express();
        this.initializeMiddlewares();
        this.initializeRoutes();
        this.initializeErrorHandling();
    }

    private initializeMiddlewares(): void {
        // Security middleware
        this.app.use(helmet());
        this.app.use(cors(config.cors));

        // Request parsing; images arrive as multipart and are parsed per route
        this.app.use(express.json({ limit: '1mb' }));
        this.app.use(express.urlencoded({ extended: true, limit: '1mb' }));

        // HTTP request logging
        this.app.use(requestLogger);
    }

    private initializeRoutes(): void {
        // Root route
        this.app.get('/', (_req: Request, res: Response) => {
            const response: ApiResponse = {
                success: true,
                message: 'Batch Image Cropper API is running!',
                data: {
                    version: config.api.version,
                    environment: config.nodeEnv,
                    timestamp: new Date().toISOString(),
                },
            };
            res.json(response);
        });

        // API routes
        this.app.use('/health', healthRoutes);
        this.app.use(`${config.api.prefix}/crop`, cropRoutes);
        this.app.use(`${config.api.prefix}/job`, jobRoutes);
    }

    private initializeErrorHandling(): void {
        this.app.use(notFoundHandler);
        this.app.use(errorHandler);
    }
}

export default new App().app;
