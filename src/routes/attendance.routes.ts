import { Router } from 'express';
import type { BridgeContext } from '../context';
import * as attendanceController from '../controllers/attendance.controller';

export function createAttendanceRoutes(ctx: BridgeContext): Router {
    const router = Router();

    // Stored punches waiting to be forwarded
    router.get('/pending', attendanceController.getPendingAttendance(ctx));

    // Store totals
    router.get('/stats', attendanceController.getAttendanceStats(ctx));

    // Manual pipeline passes
    router.post('/load', attendanceController.loadAttendance(ctx));
    router.post('/forward', attendanceController.forwardAttendance(ctx));

    return router;
}
