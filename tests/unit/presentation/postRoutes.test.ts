import request from 'supertest';
import { Application } from 'express';
import { createApp } from '../../../src/presentation/app';
import { PublishingScheduler } from '../../../src/application/PublishingScheduler';
import { InMemoryPostStore } from '../../../src/infrastructure/sheets/InMemoryPostStore';
import { StoreError } from '../../../src/domain/errors/PublishingErrors';

describe('Post routes', () => {
    let app: Application;
    let store: InMemoryPostStore;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => {});
        jest.spyOn(console, 'warn').mockImplementation(() => {});
        jest.spyOn(console, 'error').mockImplementation(() => {});

        store = new InMemoryPostStore();
        const scheduler = new PublishingScheduler(store, { publish: jest.fn() }, { runOnStart: false });
        app = createApp({ store, scheduler });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('GET /health', () => {
        test('should report ok with the scheduler lifecycle', async () => {
            const res = await request(app).get('/health');

            expect(res.status).toBe(200);
            expect(res.body.status).toBe('ok');
            expect(res.body.scheduler).toBe('stopped');
        });
    });

    describe('POST /api/posts', () => {
        test('should queue a post and return its number', async () => {
            const res = await request(app)
                .post('/api/posts')
                .send({ content: 'Shipping v2 today', scheduledTime: ' 2025-01-01 09:00 ', attachments: ['/tmp/a.jpg'] });

            expect(res.status).toBe(201);
            expect(res.body).toEqual({ postNumber: 1, scheduledTime: '2025-01-01 09:00' });
            expect(store.snapshot()[1]).toEqual(['1', 'Shipping v2 today', '/tmp/a.jpg', '2025-01-01 09:00', '']);
        });

        test('should number posts sequentially', async () => {
            await request(app).post('/api/posts').send({ content: 'One', scheduledTime: '2025-01-01 09:00' });
            const res = await request(app).post('/api/posts').send({ content: 'Two', scheduledTime: '2025-01-01 10:00' });

            expect(res.body.postNumber).toBe(2);
        });

        test('should validate input (missing content)', async () => {
            const res = await request(app).post('/api/posts').send({ scheduledTime: '2025-01-01 09:00' });

            expect(res.status).toBe(400);
            expect(res.body.error).toEqual({
                message: 'content is required and must be a non-empty string',
                code: 'BadRequestError',
            });
        });

        test('should validate input (missing scheduledTime)', async () => {
            const res = await request(app).post('/api/posts').send({ content: 'Hello' });

            expect(res.status).toBe(400);
            expect(res.body.error.message).toBe('scheduledTime is required and must be a string');
        });

        test('should validate input (attachments not strings)', async () => {
            const res = await request(app)
                .post('/api/posts')
                .send({ content: 'Hello', scheduledTime: '2025-01-01 09:00', attachments: [42] });

            expect(res.status).toBe(400);
            expect(res.body.error.message).toBe('attachments must be an array of strings');
        });

        test('should reject an unreadable schedule', async () => {
            const res = await request(app).post('/api/posts').send({ content: 'Hello', scheduledTime: 'next friday' });

            expect(res.status).toBe(400);
            expect(res.body.error).toEqual({
                message: 'Unrecognized scheduled time: "next friday"',
                code: 'InvalidPostError',
            });
            expect(store.snapshot()).toHaveLength(1);
        });

        test('should return 502 when the store fails', async () => {
            jest.spyOn(store, 'append').mockRejectedValue(new StoreError('append', 'quota exceeded'));

            const res = await request(app).post('/api/posts').send({ content: 'Hello', scheduledTime: '2025-01-01 09:00' });

            expect(res.status).toBe(502);
            expect(res.body.error).toEqual({
                message: 'Post store append failed: quota exceeded',
                code: 'StoreError',
            });
        });
    });

    describe('GET /api/posts', () => {
        test('should list posts with status counts and previews', async () => {
            const longContent = 'a'.repeat(130);
            await store.append({ content: 'Short one', scheduledTime: '2025-01-01 09:00', attachments: ['x.png'] });
            await store.append({ content: longContent, scheduledTime: '2025-01-02 09:00' });
            await store.markPosted(2, '2025-01-01 09:05:00');

            const res = await request(app).get('/api/posts');

            expect(res.status).toBe(200);
            expect(res.body).toEqual({
                total: 2,
                pending: 1,
                posted: 1,
                posts: [
                    {
                        rowNumber: 2,
                        postNumber: 1,
                        status: 'posted',
                        scheduledTime: '2025-01-01 09:00',
                        postedAt: '2025-01-01 09:05:00',
                        attachments: ['x.png'],
                        contentPreview: 'Short one',
                    },
                    {
                        rowNumber: 3,
                        postNumber: 2,
                        status: 'pending',
                        scheduledTime: '2025-01-02 09:00',
                        postedAt: null,
                        attachments: [],
                        contentPreview: `${'a'.repeat(120)}...`,
                    },
                ],
            });
        });
    });

    describe('unknown routes', () => {
        test('should return 404', async () => {
            const res = await request(app).get('/api/nope');

            expect(res.status).toBe(404);
            expect(res.body.error).toEqual({ message: 'Route not found: GET /api/nope', code: 'NotFoundError' });
        });
    });
});
