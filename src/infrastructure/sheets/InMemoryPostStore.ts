/**
 * In-Memory Post Store
 *
 * Keeps the sheet layout (header row + string cells) in process memory.
 * Used for local runs (POST_STORE=memory) and tests.
 */

import { IPostRecordStore } from '../../domain/ports/IPostRecordStore';
import {
    NewPostInput,
    POST_COLUMNS,
    PostRecord,
    joinAttachments,
    nextPostNumber,
    recordsFromTable,
    resolveHeader,
    validateNewPost,
} from '../../domain/entities/PostRecord';
import { StoreError } from '../../domain/errors/PublishingErrors';
import { DEFAULT_UTC_OFFSET_MINUTES, isSchedulable } from '../../domain/services/DateTimeNormalizer';

export class InMemoryPostStore implements IPostRecordStore {
    private readonly rows: string[][];
    private readonly defaultOffsetMinutes: number;

    /**
     * @param rows - initial table including the header row; a header is created when empty
     */
    constructor(rows: string[][] = [], defaultOffsetMinutes: number = DEFAULT_UTC_OFFSET_MINUTES) {
        this.rows = rows.length > 0 ? rows.map((row) => [...row]) : [[...POST_COLUMNS]];
        this.defaultOffsetMinutes = defaultOffsetMinutes;
    }

    async append(input: NewPostInput): Promise<number> {
        const post = validateNewPost(input, (value) => isSchedulable(value, this.defaultOffsetMinutes));
        const postNumber = nextPostNumber(this.rows.map((row) => row[0] ?? ''));

        this.rows.push([
            String(postNumber),
            post.content,
            joinAttachments(post.attachments),
            post.scheduledTime,
            '',
        ]);
        return postNumber;
    }

    async scan(): Promise<PostRecord[]> {
        return recordsFromTable(this.rows);
    }

    async markPosted(rowNumber: number, timestamp: string): Promise<void> {
        const row = rowNumber >= 2 ? this.rows[rowNumber - 1] : undefined;
        if (!row) {
            throw new StoreError('markPosted', `row ${rowNumber} does not exist`);
        }

        const column = resolveHeader(this.rows[0]).indexOf('posted_at');
        const index = column >= 0 ? column : POST_COLUMNS.indexOf('posted_at');
        while (row.length <= index) {
            row.push('');
        }
        row[index] = timestamp;
    }

    /**
     * Copy of the raw table, header included.
     */
    snapshot(): string[][] {
        return this.rows.map((row) => [...row]);
    }
}
