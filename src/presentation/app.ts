import express, { Application, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { Config } from '../config';
import { PublishingScheduler } from '../application/PublishingScheduler';
import { IPostRecordStore } from '../domain/ports/IPostRecordStore';
import { ILinkedInPosterService } from '../domain/ports/ILinkedInPosterService';
import { LinkedInUgcPosterService } from '../infrastructure/linkedin/LinkedInUgcPosterService';
import { GoogleSheetsPostStore } from '../infrastructure/sheets/GoogleSheetsPostStore';
import { InMemoryPostStore } from '../infrastructure/sheets/InMemoryPostStore';

// Route imports
import { createPostRoutes } from './routes/postRoutes';
import { createSchedulerRoutes } from './routes/schedulerRoutes';
import { errorHandler, NotFoundError } from './middleware/errorHandler';

export interface AppDependencies {
    store: IPostRecordStore;
    poster: ILinkedInPosterService;
    scheduler: PublishingScheduler;
}

/**
 * Creates and configures the Express application.
 */
export function createApp(deps: Pick<AppDependencies, 'store' | 'scheduler'>): Application {
    const app = express();

    // Middleware
    app.use(cors());
    app.use(express.json());

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            scheduler: deps.scheduler.getStatus().lifecycle,
        });
    });

    // Routes
    app.use('/api', createPostRoutes(deps.store));
    app.use('/api', createSchedulerRoutes(deps.scheduler));

    app.use((req: Request, res: Response, next: NextFunction) => {
        next(new NotFoundError(`Route not found: ${req.method} ${req.path}`));
    });

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}

/**
 * Creates all dependencies with proper wiring.
 */
export async function createDependencies(config: Config): Promise<AppDependencies> {
    const store = await createPostStore(config);
    const poster = await createPoster(config);
    const scheduler = new PublishingScheduler(store, poster, {
        intervalMs: config.schedulerIntervalSeconds * 1000,
        runOnStart: config.schedulerRunOnStart,
        defaultOffsetMinutes: config.defaultUtcOffsetMinutes,
    });

    return { store, poster, scheduler };
}

// --- Helper Functions ---

async function createPostStore(config: Config): Promise<IPostRecordStore> {
    if (config.postStore === 'memory') {
        console.log('⚠️  Using in-memory post store (posts are lost on restart)');
        return new InMemoryPostStore([], config.defaultUtcOffsetMinutes);
    }

    const store = GoogleSheetsPostStore.fromServiceAccount(
        config.googleServiceAccountFile,
        config.googleSpreadsheetId,
        {
            sheetName: config.googleSheetName,
            timeoutMs: config.requestTimeoutMs,
            defaultOffsetMinutes: config.defaultUtcOffsetMinutes,
        }
    );

    if (config.googleSheetsAutoSetup) {
        await store.ensureLayout();
    }
    console.log(`✅ Google Sheets post store: ${config.googleSpreadsheetId.substring(0, 12)}... / ${config.googleSheetName}`);
    return store;
}

async function createPoster(config: Config): Promise<ILinkedInPosterService> {
    const options = { apiBaseUrl: config.linkedinApiBaseUrl, timeoutMs: config.requestTimeoutMs };

    let personUrn = config.linkedinPersonUrn;
    if (!personUrn) {
        console.log('🔍 No LINKEDIN_PERSON_URN set, looking it up from the access token...');
        personUrn = await LinkedInUgcPosterService.resolvePersonUrn(config.linkedinAccessToken, options);
    }
    console.log(`✅ LinkedIn publishing as ${personUrn}`);

    return new LinkedInUgcPosterService(config.linkedinAccessToken, personUrn, options);
}
