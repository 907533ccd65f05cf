import { PostRecord } from '../entities/PostRecord';
import { DEFAULT_UTC_OFFSET_MINUTES, parseScheduleDateTime } from './DateTimeNormalizer';

export interface DuePostSelectorOptions {
    /** Offset applied to schedule values without an explicit zone */
    defaultOffsetMinutes?: number;
}

/**
 * Returns the pending records whose scheduled time is at or before `now`,
 * in input order. Records with an unreadable schedule are never due.
 */
export function selectDuePosts(
    now: Date,
    records: readonly PostRecord[],
    options: DuePostSelectorOptions = {}
): PostRecord[] {
    const offset = options.defaultOffsetMinutes ?? DEFAULT_UTC_OFFSET_MINUTES;
    const nowMs = now.getTime();

    return records.filter((record) => {
        if (record.postedAt !== null) {
            return false;
        }
        const scheduledAt = parseScheduleDateTime(record.scheduledTime, offset);
        return scheduledAt !== null && scheduledAt.getTime() <= nowMs;
    });
}
