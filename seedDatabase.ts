import mongoose from "mongoose";
import {loadConfig} from "./src/config";
import {MongoTriviaStore} from "./src/mongoStore";
import {createOpenTdbClient, seedDatabase} from "./src/seed";

// Seed Database from opentdb
async function main(): Promise<void> {
    const config = loadConfig();
    await mongoose.connect(config.mongoUri);
    try {
        const summary = await seedDatabase({
            client: createOpenTdbClient(),
            store: new MongoTriviaStore(mongoose.connection),
            questionsPerDifficulty: config.seedQuestionsPerDifficulty,
        });
        console.log(`Seeded ${summary.categories} categories and ${summary.questions} questions`);
    } finally {
        await mongoose.disconnect();
    }
}

main().then(() => {
    console.log("Seeding complete");
}, (error) => {
    console.error('Seeding failed:', error);
    process.exitCode = 1;
});
