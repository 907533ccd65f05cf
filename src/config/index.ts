import dotenv from 'dotenv';
import { CredentialsFileValues, readCredentialsFile } from './credentialsFile';
import { parseUtcOffset } from '../domain/services/DateTimeNormalizer';

// Load environment variables
dotenv.config();

export type PostStoreDriver = 'sheets' | 'memory';

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;

    // LinkedIn
    linkedinAccessToken: string;
    linkedinPersonUrn: string; // Resolved from the token at startup when empty
    linkedinApiBaseUrl: string;

    // Post store
    postStore: PostStoreDriver;
    googleServiceAccountFile: string;
    googleSpreadsheetId: string;
    googleSheetName: string;
    googleSheetsAutoSetup: boolean;

    // Scheduler
    schedulerIntervalSeconds: number;
    schedulerAutoStart: boolean;
    schedulerRunOnStart: boolean;
    defaultUtcOffset: string;
    defaultUtcOffsetMinutes: number; // NaN when defaultUtcOffset is unreadable; see validateConfig

    // Outbound calls
    requestTimeoutMs: number;

    credentialsFile?: string;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

/**
 * Env value first, then the credentials file, then the default.
 * A blank env value counts as unset, as .env templates leave keys empty.
 */
function getEnvVarOrFile(key: string, fileValue: string | undefined, defaultValue = ''): string {
    return getEnvVar(key, '') || fileValue || defaultValue;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarBoolean(key: string, defaultValue?: boolean): boolean {
    const value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return getEnvVar(key).toLowerCase() === 'true';
}

function getPostStoreDriver(): PostStoreDriver {
    const value = getEnvVar('POST_STORE', 'sheets').toLowerCase();
    if (value === 'sheets' || value === 'memory') {
        return value;
    }
    throw new Error(`POST_STORE must be "sheets" or "memory", got: ${value}`);
}

/**
 * Loads configuration from environment variables.
 * Values missing from the environment fall back to CREDENTIALS_FILE when it is set.
 */
export function loadConfig(): Config {
    const credentialsFile = process.env.CREDENTIALS_FILE ? getEnvVar('CREDENTIALS_FILE') : undefined;
    const fromFile: CredentialsFileValues = credentialsFile ? readCredentialsFile(credentialsFile) : {};
    const defaultUtcOffset = getEnvVar('DEFAULT_UTC_OFFSET', '+05:30');

    return {
        // Server
        port: getEnvVarNumber('PORT', 3000),
        environment: getEnvVar('NODE_ENV', 'development'),

        // LinkedIn
        linkedinAccessToken: getEnvVarOrFile('LINKEDIN_ACCESS_TOKEN', fromFile.linkedinAccessToken),
        linkedinPersonUrn: getEnvVarOrFile('LINKEDIN_PERSON_URN', fromFile.linkedinPersonUrn),
        linkedinApiBaseUrl: getEnvVar('LINKEDIN_API_BASE_URL', 'https://api.linkedin.com/v2'),

        // Post store
        postStore: getPostStoreDriver(),
        googleServiceAccountFile: getEnvVarOrFile('GOOGLE_SERVICE_ACCOUNT_FILE', fromFile.googleServiceAccountFile),
        googleSpreadsheetId: getEnvVarOrFile('GOOGLE_SPREADSHEET_ID', fromFile.googleSpreadsheetId),
        googleSheetName: getEnvVarOrFile('GOOGLE_SHEET_NAME', fromFile.googleSheetName, 'Posts'),
        googleSheetsAutoSetup: getEnvVarBoolean('GOOGLE_SHEETS_AUTO_SETUP', true),

        // Scheduler
        schedulerIntervalSeconds: getEnvVarNumber('SCHEDULER_INTERVAL_SECONDS', 300),
        schedulerAutoStart: getEnvVarBoolean('SCHEDULER_AUTO_START', true),
        schedulerRunOnStart: getEnvVarBoolean('SCHEDULER_RUN_ON_START', true),
        defaultUtcOffset,
        defaultUtcOffsetMinutes: parseUtcOffset(defaultUtcOffset) ?? NaN,

        requestTimeoutMs: getEnvVarNumber('REQUEST_TIMEOUT_MS', 30000),

        credentialsFile,
    };
}

/**
 * Validates that the settings needed by the selected drivers are present.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!config.linkedinAccessToken) {
        errors.push('LINKEDIN_ACCESS_TOKEN is required for publishing');
    }
    if (config.postStore === 'sheets') {
        if (!config.googleServiceAccountFile) {
            errors.push('GOOGLE_SERVICE_ACCOUNT_FILE is required when POST_STORE is "sheets"');
        }
        if (!config.googleSpreadsheetId) {
            errors.push('GOOGLE_SPREADSHEET_ID is required when POST_STORE is "sheets"');
        }
    }
    if (!(config.schedulerIntervalSeconds > 0)) {
        errors.push('SCHEDULER_INTERVAL_SECONDS must be greater than 0');
    }
    if (Number.isNaN(config.defaultUtcOffsetMinutes)) {
        errors.push(`DEFAULT_UTC_OFFSET must look like "+05:30" or "Z", got: ${config.defaultUtcOffset}`);
    }
    if (!(config.requestTimeoutMs > 0)) {
        errors.push('REQUEST_TIMEOUT_MS must be greater than 0');
    }

    return errors;
}
