import { Router, Request, Response } from 'express';
import { IPostRecordStore } from '../../domain/ports/IPostRecordStore';
import { getPostStatus } from '../../domain/entities/PostRecord';
import { asyncHandler, BadRequestError } from '../middleware/errorHandler';

const PREVIEW_LENGTH = 120;

/**
 * Creates post queue routes with dependency injection.
 */
export function createPostRoutes(store: IPostRecordStore): Router {
    const router = Router();

    /**
     * GET /posts
     *
     * Lists every queued post with its pending/posted status.
     */
    router.get(
        '/posts',
        asyncHandler(async (req: Request, res: Response) => {
            const records = await store.scan();

            const posts = records.map((record) => ({
                rowNumber: record.rowNumber,
                postNumber: record.postNumber,
                status: getPostStatus(record),
                scheduledTime: record.scheduledTime,
                postedAt: record.postedAt,
                attachments: record.attachments,
                contentPreview: record.content.length > PREVIEW_LENGTH
                    ? `${record.content.substring(0, PREVIEW_LENGTH)}...`
                    : record.content,
            }));

            res.json({
                total: posts.length,
                pending: posts.filter((post) => post.status === 'pending').length,
                posted: posts.filter((post) => post.status === 'posted').length,
                posts,
            });
        })
    );

    /**
     * POST /posts
     *
     * Queues an approved post: { content, scheduledTime, attachments? }.
     */
    router.post(
        '/posts',
        asyncHandler(async (req: Request, res: Response) => {
            const { content, scheduledTime, attachments } = req.body ?? {};

            if (typeof content !== 'string' || !content.trim()) {
                throw new BadRequestError('content is required and must be a non-empty string');
            }
            if (typeof scheduledTime !== 'string' || !scheduledTime.trim()) {
                throw new BadRequestError('scheduledTime is required and must be a string');
            }
            if (attachments !== undefined && !isStringArray(attachments)) {
                throw new BadRequestError('attachments must be an array of strings');
            }

            const postNumber = await store.append({ content, scheduledTime, attachments });
            console.log(`[Posts] Queued post #${postNumber} for ${scheduledTime}`);

            res.status(201).json({ postNumber, scheduledTime: scheduledTime.trim() });
        })
    );

    return router;
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((entry) => typeof entry === 'string');
}
