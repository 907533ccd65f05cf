import fs from 'fs';
import path from 'path';

/**
 * Values read from a credentials.json written by the setup flow:
 *
 * {
 *   "linkedin_access_token": "...",
 *   "person_urn": "urn:li:person:...",
 *   "google_sheets": { "spreadsheet_id": "...", "sheet_name": "Posts", "service_account_file": "..." }
 * }
 */
export interface CredentialsFileValues {
    linkedinAccessToken?: string;
    linkedinPersonUrn?: string;
    googleSpreadsheetId?: string;
    googleSheetName?: string;
    googleServiceAccountFile?: string;
}

export function readCredentialsFile(filePath: string): CredentialsFileValues {
    const resolved = path.resolve(filePath);
    if (!fs.existsSync(resolved)) {
        throw new Error(`Credentials file not found at: ${resolved}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
    } catch (error) {
        throw new Error(`Credentials file ${resolved} is not valid JSON: ${error instanceof Error ? error.message : error}`);
    }

    if (!isObject(parsed)) {
        throw new Error(`Credentials file ${resolved} must contain a JSON object`);
    }

    const sheets = isObject(parsed.google_sheets) ? parsed.google_sheets : {};
    const serviceAccountFile = stringField(sheets, 'service_account_file');

    return {
        linkedinAccessToken: stringField(parsed, 'linkedin_access_token'),
        linkedinPersonUrn: stringField(parsed, 'person_urn'),
        googleSpreadsheetId: stringField(sheets, 'spreadsheet_id'),
        googleSheetName: stringField(sheets, 'sheet_name'),
        // Relative key paths are relative to the credentials file
        googleServiceAccountFile: serviceAccountFile
            ? path.resolve(path.dirname(resolved), serviceAccountFile)
            : undefined,
    };
}

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(source: Record<string, unknown>, key: string): string | undefined {
    const value = source[key];
    return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}
