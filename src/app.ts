import express, { Request, Response, NextFunction } from 'express';
import type { BridgeContext } from './context';
import config from './utils/config';
import logger from './utils/logger';
import { createAttendanceRoutes } from './routes/attendance.routes';
import { createHealthRoutes } from './routes/health.routes';

/**
 * Admin HTTP API over the running bridge
 */
export function createApp(ctx: BridgeContext): express.Express {
    const app = express();

    // Middleware
    app.use(express.json());

    // Request logging
    app.use((req: Request, res: Response, next: NextFunction) => {
        logger.info(`${req.method} ${req.path}`, {
            ip: req.ip,
            userAgent: req.get('user-agent'),
        });
        next();
    });

    // Routes
    app.use('/health', createHealthRoutes(ctx));
    app.use('/attendance', createAttendanceRoutes(ctx));

    // Root endpoint
    app.get('/', (req: Request, res: Response) => {
        res.json({
            name: 'Attendance Push Bridge',
            version: '1.0.0',
            status: 'running',
            devices: ctx.listeners.map(listener => `${listener.endpoint.label}:${listener.endpoint.port}`),
            endpoints: {
                health: '/health',
                devices: '/health/devices',
                attendance: '/attendance',
            },
        });
    });

    // 404 handler
    app.use((req: Request, res: Response) => {
        res.status(404).json({
            success: false,
            error: 'Not found',
        });
    });

    // Error handling middleware
    app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
        logger.error('Unhandled error', {
            error: err.message,
            stack: err.stack,
            path: req.path,
        });

        res.status(500).json({
            success: false,
            error: 'Internal server error',
            message: config.nodeEnv === 'development' ? err.message : undefined,
        });
    });

    return app;
}
