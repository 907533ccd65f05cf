import { createApp, createDependencies } from './presentation/app';
import { loadConfig, validateConfig } from './config';

async function main(): Promise<void> {
    console.log('📅 LinkedIn Post Scheduler - starting...');

    try {
        // 1. Load and validate configuration
        console.log('📋 Loading configuration...');
        const config = loadConfig();

        console.log('🔍 Validating configuration...');
        const configErrors = validateConfig(config);

        if (configErrors.length > 0) {
            console.error('❌ Configuration validation failed:');
            configErrors.forEach((error) => console.error(`  - ${error}`));
            process.exit(1);
        }

        // 2. Wire the store, LinkedIn client and scheduler
        console.log('🚀 Initializing application components...');
        const { store, scheduler } = await createDependencies(config);
        const app = createApp({ store, scheduler });

        const server = app.listen(config.port, () => {
            console.log(`✅ Server running on http://localhost:${config.port}`);
            console.log(`   Environment: ${config.environment}`);
            console.log(`   Post store: ${config.postStore}`);
            console.log(`   Default time zone: UTC${config.defaultUtcOffset}`);
        });

        if (config.schedulerAutoStart) {
            scheduler.start();
        } else {
            console.log('⏸️  Scheduler not started (SCHEDULER_AUTO_START=false), use POST /api/scheduler/start');
        }

        // 3. Graceful shutdown: let the current tick finish before exiting
        let shuttingDown = false;
        const shutdown = (signal: string) => {
            if (shuttingDown) {
                return;
            }
            shuttingDown = true;
            console.log(`\n🛑 ${signal} received, stopping scheduler...`);
            scheduler
                .stop()
                .then(() => {
                    server.close(() => {
                        console.log('👋 Shutdown complete');
                        process.exit(0);
                    });
                })
                .catch((error) => {
                    console.error('Error during shutdown:', error);
                    process.exit(1);
                });
        };

        process.on('SIGINT', () => shutdown('SIGINT'));
        process.on('SIGTERM', () => shutdown('SIGTERM'));
    } catch (error) {
        console.error('💥 Fatal error during bootstrap:', error);
        process.exit(1);
    }
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
});
