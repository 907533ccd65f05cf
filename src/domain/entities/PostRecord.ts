/**
 * PostRecord Entity
 *
 * One row of the scheduled-post queue. A record is either pending (no
 * posted_at marker) or posted; there is no persisted in-between state.
 */

export type PostStatus = 'pending' | 'posted';

export interface PostRecord {
    /** Native 1-based row in the backing store (header is row 1) */
    rowNumber: number;
    /** Sequential post number, null when the cell is not a whole number */
    postNumber: number | null;
    /** Exact text to publish */
    content: string;
    /** Local paths or URIs, in order */
    attachments: string[];
    /** Raw schedule value as stored */
    scheduledTime: string;
    /** Raw posted_at marker, null while pending */
    postedAt: string | null;
}

/**
 * Input delivered by the approval step when a post is queued.
 */
export interface NewPostInput {
    content: string;
    attachments?: string[];
    scheduledTime: string;
}

/**
 * Column names of the backing store, in storage order.
 */
export const POST_COLUMNS = ['post_number', 'content', 'attachments', 'scheduled_time', 'posted_at'] as const;

export type PostColumn = (typeof POST_COLUMNS)[number];

/**
 * Header names from the older sheet layout that map onto current columns.
 */
export const LEGACY_COLUMN_ALIASES: Readonly<Record<string, PostColumn>> = {
    post: 'content',
    to_be_posted_at: 'scheduled_time',
};

export class InvalidPostError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidPostError';
    }
}

export function getPostStatus(record: PostRecord): PostStatus {
    return record.postedAt === null ? 'pending' : 'posted';
}

/**
 * Splits a comma-joined attachments cell.
 */
export function parseAttachments(cell: string): string[] {
    return cell
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);
}

export function joinAttachments(attachments: string[]): string {
    return attachments.join(', ');
}

/**
 * Parses a post_number cell. Only whole positive numbers count.
 */
export function parsePostNumber(cell: string): number | null {
    const trimmed = cell.trim();
    if (!/^\d+$/.test(trimmed)) {
        return null;
    }
    const value = parseInt(trimmed, 10);
    return value > 0 ? value : null;
}

/**
 * Next post number: max existing number + 1, or 1 for an empty store.
 */
export function nextPostNumber(firstColumnCells: string[]): number {
    let max = 0;
    for (const cell of firstColumnCells) {
        const value = parsePostNumber(cell);
        if (value !== null && value > max) {
            max = value;
        }
    }
    return max + 1;
}

/**
 * Normalizes and checks a new post before it is written.
 * The schedule check is passed in so this stays free of time-zone config.
 */
export function validateNewPost(
    input: NewPostInput,
    isSchedulable: (scheduledTime: string) => boolean
): Required<NewPostInput> {
    const content = input.content.trim();
    if (!content) {
        throw new InvalidPostError('Post content cannot be empty');
    }

    const scheduledTime = input.scheduledTime.trim();
    if (!isSchedulable(scheduledTime)) {
        throw new InvalidPostError(`Unrecognized scheduled time: "${input.scheduledTime}"`);
    }

    const attachments = (input.attachments ?? []).map((a) => a.trim()).filter((a) => a.length > 0);
    const withComma = attachments.find((a) => a.includes(','));
    if (withComma) {
        throw new InvalidPostError(`Attachment paths cannot contain commas: "${withComma}"`);
    }

    return { content, attachments, scheduledTime };
}

/**
 * Builds a record from a header-mapped row. Missing trailing cells are ''.
 */
export function recordFromRow(rowNumber: number, cells: Partial<Record<PostColumn, string>>): PostRecord {
    const postedAt = (cells.posted_at ?? '').trim();
    return {
        rowNumber,
        postNumber: parsePostNumber(cells.post_number ?? ''),
        content: cells.content ?? '',
        attachments: parseAttachments(cells.attachments ?? ''),
        scheduledTime: cells.scheduled_time ?? '',
        postedAt: postedAt ? postedAt : null,
    };
}

/**
 * Maps raw rows (first row = header) to records.
 * Rows shorter than the header are padded with empty strings.
 */
export function recordsFromTable(table: string[][]): PostRecord[] {
    if (table.length === 0) {
        return [];
    }

    const columns = resolveHeader(table[0]);
    return table.slice(1).map((row, index) => {
        const cells: Partial<Record<PostColumn, string>> = {};
        columns.forEach((column, position) => {
            if (column && cells[column] === undefined) {
                cells[column] = position < row.length ? row[position] : '';
            }
        });
        return recordFromRow(index + 2, cells);
    });
}

/**
 * Maps header cells to known columns (null for unknown headers).
 */
export function resolveHeader(header: string[]): Array<PostColumn | null> {
    return header.map((name) => {
        const key = name.trim().toLowerCase();
        const known = POST_COLUMNS.find((column) => column === key);
        return known ?? LEGACY_COLUMN_ALIASES[key] ?? null;
    });
}
