import { Router } from 'express';
import type { BridgeContext } from '../context';
import * as healthController from '../controllers/health.controller';

export function createHealthRoutes(ctx: BridgeContext): Router {
    const router = Router();

    // Overall health check
    router.get('/', healthController.getHealth(ctx));

    // Device listener status
    router.get('/devices', healthController.getDevices(ctx));

    return router;
}
