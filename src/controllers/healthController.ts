import { Request, Response } from 'express';
import sharp from 'sharp';
import config from '../config';
import { ApiResponse } from "../types/response.types";

export const getHealth = (_req: Request, res: Response): void => {
    const response: ApiResponse = {
        success: true,
        message: 'Service is healthy',
        data: {
            status: 'healthy',
            version: config.api.version,
            environment: config.nodeEnv,
            timestamp: new Date().toISOString(),
            uptime: process.uptime(),
            // Image library in use, useful when a prebuilt binary is missing
            libvips: sharp.versions.vips,
        },
    };

    res.json(response);
};
