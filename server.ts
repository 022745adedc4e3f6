import mongoose from 'mongoose';

import { createApp } from './src/app';
import { loadConfig } from './src/config';
import { MongoTriviaStore } from './src/mongoStore';

async function main(): Promise<void> {
    const config = loadConfig();

    await mongoose.connect(config.mongoUri);

    const app = createApp({
        store: new MongoTriviaStore(mongoose.connection),
        questionsPerPage: config.questionsPerPage,
    });

    const server = app.listen(config.port, () => console.log(`Backend running on port ${config.port}`));

    const shutdown = (signal: string) => {
        console.log(`${signal} received, shutting down`);
        server.close(() => {
            mongoose.disconnect().then(
                () => console.log('Disconnected from MongoDB'),
                (error) => {
                    console.error('Failed to disconnect from MongoDB:', error);
                    process.exitCode = 1;
                },
            );
        });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error) => {
    console.error('Failed to start server:', error);
    process.exitCode = 1;
});
