import axios, {AxiosInstance} from "axios";
import axiosRetry from "axios-retry";
import {decode} from "html-entities";
import {TriviaStore} from "./store";
import {Category, NewQuestion} from "./types";

export const OPENTDB_URL = 'https://opentdb.com';

export const DIFFICULTY_LEVELS = {easy: 1, medium: 2, hard: 3} as const;
export type OpenTdbDifficulty = keyof typeof DIFFICULTY_LEVELS;

export interface OpenTdbCategory {
    id: number;
    name: string;
}

export interface OpenTdbQuestion {
    category: string;
    type: string;
    difficulty: OpenTdbDifficulty;
    question: string;
    correct_answer: string;
    incorrect_answers: string[];
}

export interface OpenTdbQuestionsResponse {
    response_code: number;
    results: OpenTdbQuestion[];
}

export interface OpenTdbClientOptions {
    retries?: number;
    /** Back-off unit; the n-th retry waits n times this long */
    retryDelayMs?: number;
}

export function createOpenTdbClient(
    instance: AxiosInstance = axios.create({baseURL: OPENTDB_URL}),
    {retries = 3, retryDelayMs = 8000}: OpenTdbClientOptions = {},
): AxiosInstance {
    axiosRetry(instance, {
        retries,
        retryDelay: (retryCount) => {
            console.log(`retry attempt: ${retryCount}`);
            return retryCount * retryDelayMs;
        },
        // opentdb answers 429 when polled faster than once every 5 seconds
        retryCondition: (error) => {
            return error.response?.status === 429;
        },
        onRetry: (retryCount, _error, requestConfig) => {
            console.log(`Retrying request ${requestConfig.url}. Retry count: ${retryCount}`);
        },
    });
    return instance;
}

export function toCategory(category: OpenTdbCategory): Category {
    return {id: category.id, type: decode(category.name)};
}

export function toNewQuestion(result: OpenTdbQuestion, categoryId: number): NewQuestion {
    return {
        question: decode(result.question),
        answer: decode(result.correct_answer),
        difficulty: DIFFICULTY_LEVELS[result.difficulty],
        category: categoryId,
    };
}

export interface SeedOptions {
    client: AxiosInstance;
    store: TriviaStore;
    questionsPerDifficulty: number;
    /** Pause before each question request */
    requestIntervalMs?: number;
    sleep?: (ms: number) => Promise<void>;
}

export interface SeedSummary {
    categories: number;
    questions: number;
}

function delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

// Replaces the store's contents with categories and questions from opentdb
export async function seedDatabase({
    client,
    store,
    questionsPerDifficulty,
    requestIntervalMs = 5500,
    sleep = delay,
}: SeedOptions): Promise<SeedSummary> {
    const categoriesRes = await client.get<{ trivia_categories: OpenTdbCategory[] }>('/api_category.php');
    const categories = categoriesRes.data.trivia_categories.map(toCategory);

    await store.withSession(async (repo) => {
        await repo.clear();
        await repo.insertCategories(categories);
    });
    console.log(`Inserted ${categories.length} categories`);

    let questions = 0;
    for (const category of categories) {
        for (const difficulty of Object.keys(DIFFICULTY_LEVELS)) {
            // opentdb answers 429 to a request within 5 seconds of the previous one
            await sleep(requestIntervalMs);
            const questionRes = await client.get<OpenTdbQuestionsResponse>('/api.php', {
                params: {amount: questionsPerDifficulty, category: category.id, difficulty, type: 'multiple'},
            });
            if (questionRes.data.response_code === 0) {
                const inputs = questionRes.data.results.map((result) => toNewQuestion(result, category.id));
                questions += await store.withSession((repo) => repo.insertQuestions(inputs));
                console.log(`${category.type} (${difficulty}): ${inputs.length} questions`);
            } else {
                console.log(`${category.type} (${difficulty}): skipped, response code ${questionRes.data.response_code}`);
            }
        }
    }

    return {categories: categories.length, questions};
}
