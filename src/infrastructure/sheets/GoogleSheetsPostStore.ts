/**
 * GoogleSheetsPostStore
 *
 * Post queue kept in one tab of a Google Sheet:
 *   post_number | content | attachments | scheduled_time | posted_at
 * Authenticates with a service account key file.
 */

import { google, sheets_v4 } from 'googleapis';
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
import { StoreError, StoreOperation, describeError } from '../../domain/errors/PublishingErrors';
import { DEFAULT_UTC_OFFSET_MINUTES, isSchedulable } from '../../domain/services/DateTimeNormalizer';

const SHEETS_SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];
const LAST_COLUMN = columnLetter(POST_COLUMNS.length - 1);

export interface GoogleSheetsPostStoreOptions {
    sheetName?: string;
    timeoutMs?: number;
    defaultOffsetMinutes?: number;
}

export class GoogleSheetsPostStore implements IPostRecordStore {
    private readonly sheets: sheets_v4.Sheets;
    private readonly spreadsheetId: string;
    private readonly sheetName: string;
    private readonly timeoutMs: number;
    private readonly defaultOffsetMinutes: number;
    /** Column holding posted_at, taken from the most recent scan's header */
    private postedAtColumn = columnLetter(POST_COLUMNS.indexOf('posted_at'));

    constructor(sheets: sheets_v4.Sheets, spreadsheetId: string, options: GoogleSheetsPostStoreOptions = {}) {
        if (!spreadsheetId.trim()) {
            throw new Error('Google spreadsheet ID is required');
        }
        this.sheets = sheets;
        this.spreadsheetId = spreadsheetId.trim();
        this.sheetName = options.sheetName ?? 'Posts';
        this.timeoutMs = options.timeoutMs ?? 30000;
        this.defaultOffsetMinutes = options.defaultOffsetMinutes ?? DEFAULT_UTC_OFFSET_MINUTES;
    }

    static fromServiceAccount(
        keyFile: string,
        spreadsheetId: string,
        options: GoogleSheetsPostStoreOptions = {}
    ): GoogleSheetsPostStore {
        const auth = new google.auth.GoogleAuth({ keyFile, scopes: SHEETS_SCOPES });
        const sheets = google.sheets({ version: 'v4', auth });
        return new GoogleSheetsPostStore(sheets, spreadsheetId, options);
    }

    async append(input: NewPostInput): Promise<number> {
        const post = validateNewPost(input, (value) => isSchedulable(value, this.defaultOffsetMinutes));

        return this.run('append', async () => {
            const existing = await this.sheets.spreadsheets.values.get(
                { spreadsheetId: this.spreadsheetId, range: this.range('A:A') },
                { timeout: this.timeoutMs }
            );
            const firstColumn = (existing.data.values ?? []).map((row) => cellText(row[0]));
            const postNumber = nextPostNumber(firstColumn);

            await this.sheets.spreadsheets.values.append(
                {
                    spreadsheetId: this.spreadsheetId,
                    range: this.range(`A:${LAST_COLUMN}`),
                    valueInputOption: 'RAW',
                    insertDataOption: 'INSERT_ROWS',
                    requestBody: {
                        values: [[
                            String(postNumber),
                            post.content,
                            joinAttachments(post.attachments),
                            post.scheduledTime,
                            '',
                        ]],
                    },
                },
                { timeout: this.timeoutMs }
            );

            console.log(`[Sheets] Appended post #${postNumber} scheduled for ${post.scheduledTime}`);
            return postNumber;
        });
    }

    async scan(): Promise<PostRecord[]> {
        return this.run('scan', async () => {
            const response = await this.sheets.spreadsheets.values.get(
                { spreadsheetId: this.spreadsheetId, range: this.range(`A:${LAST_COLUMN}`) },
                { timeout: this.timeoutMs }
            );
            const table = (response.data.values ?? []).map((row) => row.map(cellText));

            if (table.length > 0) {
                const index = resolveHeader(table[0]).indexOf('posted_at');
                if (index >= 0) {
                    this.postedAtColumn = columnLetter(index);
                }
            }
            return recordsFromTable(table);
        });
    }

    async markPosted(rowNumber: number, timestamp: string): Promise<void> {
        if (!Number.isInteger(rowNumber) || rowNumber < 2) {
            throw new StoreError('markPosted', `invalid row number ${rowNumber}`);
        }

        await this.run('markPosted', async () => {
            await this.sheets.spreadsheets.values.update(
                {
                    spreadsheetId: this.spreadsheetId,
                    range: this.range(`${this.postedAtColumn}${rowNumber}`),
                    valueInputOption: 'RAW',
                    requestBody: { values: [[timestamp]] },
                },
                { timeout: this.timeoutMs }
            );
        });
    }

    /**
     * Creates the tab when it is missing and writes the header row into an empty sheet.
     */
    async ensureLayout(): Promise<void> {
        await this.run('ensureLayout', async () => {
            const metadata = await this.sheets.spreadsheets.get(
                { spreadsheetId: this.spreadsheetId, fields: 'sheets.properties.title' },
                { timeout: this.timeoutMs }
            );
            const exists = (metadata.data.sheets ?? []).some((sheet) => sheet.properties?.title === this.sheetName);

            if (!exists) {
                await this.sheets.spreadsheets.batchUpdate(
                    {
                        spreadsheetId: this.spreadsheetId,
                        requestBody: { requests: [{ addSheet: { properties: { title: this.sheetName } } }] },
                    },
                    { timeout: this.timeoutMs }
                );
                console.log(`[Sheets] Created sheet "${this.sheetName}"`);
            }

            const header = await this.sheets.spreadsheets.values.get(
                { spreadsheetId: this.spreadsheetId, range: this.range(`A1:${LAST_COLUMN}1`) },
                { timeout: this.timeoutMs }
            );
            if ((header.data.values ?? []).length === 0) {
                await this.sheets.spreadsheets.values.update(
                    {
                        spreadsheetId: this.spreadsheetId,
                        range: this.range(`A1:${LAST_COLUMN}1`),
                        valueInputOption: 'RAW',
                        requestBody: { values: [[...POST_COLUMNS]] },
                    },
                    { timeout: this.timeoutMs }
                );
                console.log(`[Sheets] Wrote column headers to "${this.sheetName}"`);
            }
        });
    }

    private range(a1: string): string {
        return `'${this.sheetName.replace(/'/g, "''")}'!${a1}`;
    }

    private async run<T>(operation: StoreOperation, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (error) {
            if (error instanceof StoreError) {
                throw error;
            }
            throw new StoreError(operation, describeError(error), error);
        }
    }
}

function cellText(value: unknown): string {
    return value === null || value === undefined ? '' : String(value);
}

/**
 * 0 -> A, 25 -> Z, 26 -> AA
 */
export function columnLetter(index: number): string {
    let letters = '';
    let n = index + 1;
    while (n > 0) {
        const remainder = (n - 1) % 26;
        letters = String.fromCharCode(65 + remainder) + letters;
        n = Math.floor((n - 1) / 26);
    }
    return letters;
}
