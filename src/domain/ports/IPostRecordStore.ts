/**
 * IPostRecordStore Port
 *
 * Tabular, append-only queue of scheduled posts. Rows are never deleted here;
 * editing and removal happen by hand in the backing store.
 */

import { NewPostInput, PostRecord } from '../entities/PostRecord';

export interface IPostRecordStore {
    /**
     * Appends a pending post and returns its assigned post number
     * (max existing + 1, or 1 for an empty store).
     */
    append(input: NewPostInput): Promise<number>;

    /**
     * Reads every row below the header.
     */
    scan(): Promise<PostRecord[]>;

    /**
     * Writes the posted_at cell of one row; other cells are left alone.
     * @param rowNumber - native row number captured by scan()
     */
    markPosted(rowNumber: number, timestamp: string): Promise<void>;
}
