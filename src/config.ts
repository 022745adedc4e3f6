import 'dotenv/config';

export interface Config {
    /** Port the HTTP server listens on */
    port: number;
    mongoUri: string;
    /** Page size of GET /questions */
    questionsPerPage: number;
    /** Questions requested from opentdb per category and difficulty when seeding */
    seedQuestionsPerDifficulty: number;
}

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 1) {
        throw new Error(`Invalid environment variable ${name}: expected a positive integer, got "${raw}"`);
    }
    return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    return {
        port: readPositiveInt(env, 'PORT', 5000),
        mongoUri: env.MONGODB_URI || 'mongodb://localhost:27017/trivia',
        questionsPerPage: readPositiveInt(env, 'QUESTIONS_PER_PAGE', 10),
        seedQuestionsPerDifficulty: readPositiveInt(env, 'SEED_QUESTIONS_PER_DIFFICULTY', 50),
    };
}
