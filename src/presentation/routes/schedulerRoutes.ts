import { Router, Request, Response } from 'express';
import { PublishingScheduler, SchedulerStatus, TickReport } from '../../application/PublishingScheduler';
import { asyncHandler } from '../middleware/errorHandler';

/**
 * Creates scheduler control routes: status, start, stop and manual tick.
 */
export function createSchedulerRoutes(scheduler: PublishingScheduler): Router {
    const router = Router();

    router.get(
        '/scheduler',
        asyncHandler(async (req: Request, res: Response) => {
            res.json(serializeStatus(scheduler.getStatus()));
        })
    );

    router.post(
        '/scheduler/start',
        asyncHandler(async (req: Request, res: Response) => {
            scheduler.start();
            res.json(serializeStatus(scheduler.getStatus()));
        })
    );

    /**
     * Responds once any tick in progress has finished.
     */
    router.post(
        '/scheduler/stop',
        asyncHandler(async (req: Request, res: Response) => {
            await scheduler.stop();
            res.json(serializeStatus(scheduler.getStatus()));
        })
    );

    router.post(
        '/scheduler/tick',
        asyncHandler(async (req: Request, res: Response) => {
            const report = await scheduler.runTick();
            res.json(serializeTick(report));
        })
    );

    return router;
}

function serializeStatus(status: SchedulerStatus) {
    return {
        lifecycle: status.lifecycle,
        activity: status.activity,
        intervalSeconds: status.intervalMs / 1000,
        tickCount: status.tickCount,
        nextTickAt: status.nextTickAt ? status.nextTickAt.toISOString() : null,
        lastTick: status.lastTick ? serializeTick(status.lastTick) : null,
    };
}

function serializeTick(report: TickReport) {
    return {
        startedAt: report.startedAt.toISOString(),
        finishedAt: report.finishedAt.toISOString(),
        scanned: report.scanned,
        due: report.due,
        published: report.published,
        failed: report.failed,
        unmarked: report.unmarked,
        skipped: report.skipped,
        aborted: report.aborted ?? null,
    };
}
