import { Request, Response } from 'express';
import type { BridgeContext } from '../context';
import type { StoreStats } from '../services/attendance-store.service';
import { errorMessage } from '../utils/errors';
import logger from '../utils/logger';

/**
 * Overall health check
 */
export function getHealth(ctx: BridgeContext) {
    return async (req: Request, res: Response): Promise<void> => {
        const listeners = ctx.listeners.map(listener => listener.status());
        const state = ctx.state.get();

        const health = {
            status: 'healthy',
            timestamp: new Date().toISOString(),
            uptime: process.uptime(),
            startedAt: ctx.startedAt.toISOString(),
            services: {
                store: ctx.storeStatus.ready ? 'healthy' : 'unhealthy',
                listeners: {
                    listening: listeners.filter(listener => listener.state === 'listening').length,
                    failed: listeners.filter(listener => listener.state === 'failed').length,
                },
            },
            punchLog: {
                lastSeq: ctx.punchLog.lastSequence,
                processingCursor: state.processingCursor,
                backlog: Math.max(ctx.punchLog.lastSequence - state.processingCursor, 0),
            },
            commands: {
                nextId: state.commandCounter,
                lastAcknowledged: state.lastAckedCommandId,
            },
            storeError: ctx.storeStatus.error,
        };

        if (!ctx.storeStatus.ready || health.services.listeners.failed > 0) {
            health.status = 'degraded';
        }

        try {
            const attendance: StoreStats | null = ctx.storeStatus.ready ? ctx.store.stats() : null;
            res.json({ ...health, attendance });
        } catch (error) {
            logger.error('Health check failed', { error: errorMessage(error) });
            res.status(503).json({ ...health, status: 'unhealthy', attendance: null, storeError: errorMessage(error) });
        }
    };
}

/**
 * Device listener status
 */
export function getDevices(ctx: BridgeContext) {
    return async (req: Request, res: Response): Promise<void> => {
        res.json({
            success: true,
            devices: ctx.listeners.map(listener => listener.status()),
            commands: {
                enabled: ctx.commands.enabled,
                outstanding: ctx.commands.pending,
            },
        });
    };
}
