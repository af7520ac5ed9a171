import { Request, Response } from 'express';
import type { BridgeContext } from '../context';
import { errorMessage } from '../utils/errors';
import logger from '../utils/logger';

function storeUnavailable(ctx: BridgeContext, res: Response): boolean {
    if (ctx.storeStatus.ready) {
        return false;
    }
    res.status(503).json({
        success: false,
        error: `Attendance store unavailable: ${ctx.storeStatus.error ?? 'not initialized'}`,
    });
    return true;
}

/**
 * Punches stored but not yet forwarded
 */
export function getPendingAttendance(ctx: BridgeContext) {
    return async (req: Request, res: Response): Promise<void> => {
        if (storeUnavailable(ctx, res)) {
            return;
        }

        const limit = parseInt(String(req.query.limit ?? '100'), 10);
        if (isNaN(limit) || limit < 1 || limit > 1000) {
            res.status(400).json({
                success: false,
                error: 'limit must be between 1 and 1000',
            });
            return;
        }

        try {
            const items = ctx.store.selectUnforwarded(0, limit);
            res.json({
                success: true,
                count: items.length,
                items,
            });
        } catch (error) {
            logger.error('Failed to list pending attendance', { error: errorMessage(error) });
            res.status(500).json({
                success: false,
                error: errorMessage(error),
            });
        }
    };
}

/**
 * Store totals
 */
export function getAttendanceStats(ctx: BridgeContext) {
    return async (req: Request, res: Response): Promise<void> => {
        if (storeUnavailable(ctx, res)) {
            return;
        }

        try {
            res.json({
                success: true,
                stats: ctx.store.stats(),
                processingCursor: ctx.state.get().processingCursor,
                lastLogSeq: ctx.punchLog.lastSequence,
            });
        } catch (error) {
            logger.error('Failed to read attendance stats', { error: errorMessage(error) });
            res.status(500).json({
                success: false,
                error: errorMessage(error),
            });
        }
    };
}

/**
 * Run a store loader pass now
 */
export function loadAttendance(ctx: BridgeContext) {
    return async (req: Request, res: Response): Promise<void> => {
        if (storeUnavailable(ctx, res)) {
            return;
        }

        try {
            logger.info('Manual store loader pass requested');
            const result = await ctx.loader.runPass();
            res.json({
                success: true,
                message: `Absorbed ${result.inserted} new punches`,
                result,
            });
        } catch (error) {
            logger.error('Manual store loader pass failed', { error: errorMessage(error) });
            res.status(500).json({
                success: false,
                error: errorMessage(error),
            });
        }
    };
}

/**
 * Run a forward pass now
 */
export function forwardAttendance(ctx: BridgeContext) {
    return async (req: Request, res: Response): Promise<void> => {
        if (storeUnavailable(ctx, res)) {
            return;
        }

        try {
            logger.info('Manual forward pass requested');
            const result = await ctx.forwarder.runPass();
            res.json({
                success: true,
                message: `Forwarded ${result.forwarded} out of ${result.selected} punches`,
                result,
            });
        } catch (error) {
            logger.error('Manual forward pass failed', { error: errorMessage(error) });
            res.status(500).json({
                success: false,
                error: errorMessage(error),
            });
        }
    };
}
