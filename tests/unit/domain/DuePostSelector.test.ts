import { selectDuePosts } from '../../../src/domain/services/DuePostSelector';
import { PostRecord } from '../../../src/domain/entities/PostRecord';

function record(rowNumber: number, scheduledTime: string, postedAt: string | null = null): PostRecord {
    return {
        rowNumber,
        postNumber: rowNumber - 1,
        content: `Post ${rowNumber}`,
        attachments: [],
        scheduledTime,
        postedAt,
    };
}

describe('selectDuePosts', () => {
    // 2025-01-01 10:00 at +05:30
    const now = new Date('2025-01-01T04:30:00Z');

    it('selects pending posts scheduled at or before now', () => {
        const records = [
            record(2, '2025-01-01 09:00'),
            record(3, '2025-01-01 10:00'),
            record(4, '2025-01-01 10:01'),
        ];

        expect(selectDuePosts(now, records).map((r) => r.rowNumber)).toEqual([2, 3]);
    });

    it('skips posts that already carry a posted_at marker', () => {
        const records = [record(2, '2025-01-01 09:00', '2025-01-01 09:01:00'), record(3, '2025-01-01 09:30')];

        expect(selectDuePosts(now, records).map((r) => r.rowNumber)).toEqual([3]);
    });

    it('never selects a post with an unreadable schedule', () => {
        const records = [record(2, 'next tuesday'), record(3, ''), record(4, '2025-02-30 09:00')];

        expect(selectDuePosts(now, records)).toEqual([]);
    });

    it('keeps the input order across formats', () => {
        const records = [
            record(2, '01/01/2025 09:30'),
            record(3, '2024-12-31 23:00'),
            record(4, '2025-01-01T04:00:00Z'),
        ];

        expect(selectDuePosts(now, records).map((r) => r.rowNumber)).toEqual([2, 3, 4]);
    });

    it('applies the configured default offset', () => {
        const records = [record(2, '2025-01-01 05:00')];

        // 05:00 UTC is after 04:30 UTC
        expect(selectDuePosts(now, records, { defaultOffsetMinutes: 0 })).toEqual([]);
        // 05:00 at +05:30 is 23:30 UTC the day before
        expect(selectDuePosts(now, records)).toHaveLength(1);
    });

    it('gives the same answer on repeated calls and leaves the snapshot untouched', () => {
        const records = [
            record(2, '2025-01-01 09:00', '2025-01-01 09:01:00'),
            record(3, 'next tuesday'),
            { ...record(4, '01/01/2025 09:30'), attachments: ['a.jpg'] },
            record(5, '2025-01-01 11:00'),
            record(6, '2024-12-31 23:00'),
        ];
        const before = records.map((r) => ({ ...r, attachments: [...r.attachments] }));

        const first = selectDuePosts(now, records);
        const second = selectDuePosts(now, records);

        expect(first.map((r) => r.rowNumber)).toEqual([4, 6]);
        expect(second).toEqual(first);
        expect(records).toEqual(before);
    });

    it('returns an empty list for an empty store', () => {
        expect(selectDuePosts(now, [])).toEqual([]);
    });
});
