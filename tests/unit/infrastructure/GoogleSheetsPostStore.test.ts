import { sheets_v4 } from 'googleapis';
import { GoogleSheetsPostStore, columnLetter } from '../../../src/infrastructure/sheets/GoogleSheetsPostStore';
import { InvalidPostError } from '../../../src/domain/entities/PostRecord';
import { StoreError } from '../../../src/domain/errors/PublishingErrors';

const SPREADSHEET_ID = 'test-spreadsheet';
const HEADER = ['post_number', 'content', 'attachments', 'scheduled_time', 'posted_at'];

function createFakeSheets() {
    const values = {
        get: jest.fn(),
        append: jest.fn().mockResolvedValue({ data: {} }),
        update: jest.fn().mockResolvedValue({ data: {} }),
    };
    const spreadsheets = {
        get: jest.fn(),
        batchUpdate: jest.fn().mockResolvedValue({ data: {} }),
        values,
    };
    return { sheets: { spreadsheets } as unknown as sheets_v4.Sheets, spreadsheets, values };
}

describe('GoogleSheetsPostStore', () => {
    let fake: ReturnType<typeof createFakeSheets>;
    let store: GoogleSheetsPostStore;

    beforeEach(() => {
        fake = createFakeSheets();
        store = new GoogleSheetsPostStore(fake.sheets, SPREADSHEET_ID, { timeoutMs: 5000 });
        jest.spyOn(console, 'log').mockImplementation(() => {});
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('requires a spreadsheet id', () => {
        expect(() => new GoogleSheetsPostStore(fake.sheets, '  ')).toThrow('Google spreadsheet ID is required');
    });

    describe('append', () => {
        it('appends a row numbered after the existing ones', async () => {
            fake.values.get.mockResolvedValue({ data: { values: [['post_number'], ['1'], ['2']] } });

            const postNumber = await store.append({
                content: 'Hello',
                scheduledTime: '2025-01-01 09:00',
                attachments: ['a.jpg', 'b.jpg'],
            });

            expect(postNumber).toBe(3);
            expect(fake.values.get).toHaveBeenCalledWith(
                { spreadsheetId: SPREADSHEET_ID, range: "'Posts'!A:A" },
                { timeout: 5000 }
            );
            expect(fake.values.append).toHaveBeenCalledWith(
                {
                    spreadsheetId: SPREADSHEET_ID,
                    range: "'Posts'!A:E",
                    valueInputOption: 'RAW',
                    insertDataOption: 'INSERT_ROWS',
                    requestBody: { values: [['3', 'Hello', 'a.jpg, b.jpg', '2025-01-01 09:00', '']] },
                },
                { timeout: 5000 }
            );
        });

        it('starts at 1 when the sheet has no values', async () => {
            fake.values.get.mockResolvedValue({ data: {} });

            expect(await store.append({ content: 'Hello', scheduledTime: '2025-01-01 09:00' })).toBe(1);
        });

        it('validates before calling the API', async () => {
            await expect(store.append({ content: 'Hello', scheduledTime: 'later' })).rejects.toBeInstanceOf(
                InvalidPostError
            );
            expect(fake.values.get).not.toHaveBeenCalled();
        });

        it('wraps API failures in StoreError', async () => {
            fake.values.get.mockResolvedValue({ data: { values: [] } });
            fake.values.append.mockRejectedValue(new Error('quota exceeded'));

            await expect(store.append({ content: 'Hello', scheduledTime: '2025-01-01 09:00' })).rejects.toThrow(
                new StoreError('append', 'quota exceeded')
            );
        });
    });

    describe('scan', () => {
        it('reads rows as records with native row numbers', async () => {
            fake.values.get.mockResolvedValue({
                data: {
                    values: [
                        HEADER,
                        [1, 'First', '', '2025-01-01 09:00'],
                        ['2', 'Second', 'x.png', '2025-01-02 09:00', '2025-01-02 09:00:40'],
                    ],
                },
            });

            const records = await store.scan();

            expect(fake.values.get).toHaveBeenCalledWith(
                { spreadsheetId: SPREADSHEET_ID, range: "'Posts'!A:E" },
                { timeout: 5000 }
            );
            expect(records).toEqual([
                {
                    rowNumber: 2,
                    postNumber: 1,
                    content: 'First',
                    attachments: [],
                    scheduledTime: '2025-01-01 09:00',
                    postedAt: null,
                },
                {
                    rowNumber: 3,
                    postNumber: 2,
                    content: 'Second',
                    attachments: ['x.png'],
                    scheduledTime: '2025-01-02 09:00',
                    postedAt: '2025-01-02 09:00:40',
                },
            ]);
        });

        it('returns nothing for an empty sheet', async () => {
            fake.values.get.mockResolvedValue({ data: {} });

            expect(await store.scan()).toEqual([]);
        });

        it('wraps API failures in StoreError', async () => {
            fake.values.get.mockRejectedValue(new Error('socket hang up'));

            await expect(store.scan()).rejects.toThrow('Post store scan failed: socket hang up');
        });
    });

    describe('markPosted', () => {
        it('writes only the posted_at cell of the row', async () => {
            await store.markPosted(7, '2025-01-01 09:00:05');

            expect(fake.values.update).toHaveBeenCalledWith(
                {
                    spreadsheetId: SPREADSHEET_ID,
                    range: "'Posts'!E7",
                    valueInputOption: 'RAW',
                    requestBody: { values: [['2025-01-01 09:00:05']] },
                },
                { timeout: 5000 }
            );
        });

        it('uses the posted_at column found by the last scan', async () => {
            fake.values.get.mockResolvedValue({ data: { values: [['post', 'to_be_posted_at', 'posted_at']] } });
            await store.scan();

            await store.markPosted(2, 'now');

            expect(fake.values.update.mock.calls[0][0].range).toBe("'Posts'!C2");
        });

        it('rejects the header row without calling the API', async () => {
            await expect(store.markPosted(1, 'now')).rejects.toThrow('Post store markPosted failed: invalid row number 1');
            expect(fake.values.update).not.toHaveBeenCalled();
        });

        it('wraps API failures in StoreError', async () => {
            fake.values.update.mockRejectedValue(new Error('permission denied'));

            const error = await store.markPosted(2, 'now').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(StoreError);
            expect((error as StoreError).operation).toBe('markPosted');
            expect((error as StoreError).message).toBe('Post store markPosted failed: permission denied');
        });
    });

    describe('ensureLayout', () => {
        it('creates a missing tab and writes the header', async () => {
            fake.spreadsheets.get.mockResolvedValue({ data: { sheets: [{ properties: { title: 'Sheet1' } }] } });
            fake.values.get.mockResolvedValue({ data: {} });

            await store.ensureLayout();

            expect(fake.spreadsheets.batchUpdate).toHaveBeenCalledWith(
                {
                    spreadsheetId: SPREADSHEET_ID,
                    requestBody: { requests: [{ addSheet: { properties: { title: 'Posts' } } }] },
                },
                { timeout: 5000 }
            );
            expect(fake.values.update).toHaveBeenCalledWith(
                {
                    spreadsheetId: SPREADSHEET_ID,
                    range: "'Posts'!A1:E1",
                    valueInputOption: 'RAW',
                    requestBody: { values: [HEADER] },
                },
                { timeout: 5000 }
            );
        });

        it('leaves an existing tab with a header alone', async () => {
            fake.spreadsheets.get.mockResolvedValue({ data: { sheets: [{ properties: { title: 'Posts' } }] } });
            fake.values.get.mockResolvedValue({ data: { values: [HEADER] } });

            await store.ensureLayout();

            expect(fake.spreadsheets.batchUpdate).not.toHaveBeenCalled();
            expect(fake.values.update).not.toHaveBeenCalled();
        });

        it('quotes sheet names in ranges', async () => {
            const named = new GoogleSheetsPostStore(fake.sheets, SPREADSHEET_ID, { sheetName: "Q1 'drafts'" });
            fake.values.get.mockResolvedValue({ data: {} });

            await named.scan();

            expect(fake.values.get.mock.calls[0][0].range).toBe("'Q1 ''drafts'''!A:E");
        });
    });

    describe('columnLetter', () => {
        it.each([
            [0, 'A'],
            [4, 'E'],
            [25, 'Z'],
            [26, 'AA'],
            [27, 'AB'],
        ])('maps %d to %s', (index, letter) => {
            expect(columnLetter(index)).toBe(letter);
        });
    });
});
