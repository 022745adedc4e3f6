import {StoreError} from "./errors";
import {TriviaRepository, TriviaStore} from "./store";
import {Category, NewQuestion, Page, Question} from "./types";

const byId = (a: {id: number}, b: {id: number}) => a.id - b.id;

/**
 * Process-local store used by the tests. Rows are copied in and out so callers
 * never share references with the stored state.
 */
export class MemoryTriviaStore implements TriviaStore, TriviaRepository {
    private categories: Category[] = [];
    private questions: Question[] = [];
    private lastId = 0;

    /** Sessions opened and not yet released. */
    openSessions = 0;

    constructor(seed: {categories?: Category[]; questions?: Question[]} = {}) {
        this.categories = (seed.categories ?? []).map((c) => ({...c}));
        this.questions = (seed.questions ?? []).map((q) => ({...q}));
        this.lastId = this.questions.reduce((max, q) => Math.max(max, q.id), 0);
    }

    async withSession<T>(work: (repo: TriviaRepository) => Promise<T>): Promise<T> {
        this.openSessions++;
        try {
            return await work(this);
        } finally {
            this.openSessions--;
        }
    }

    async listCategories(): Promise<Category[]> {
        return this.categories.map((c) => ({...c})).sort(byId);
    }

    async paginateQuestions(page: number, perPage: number): Promise<Page<Question>> {
        const sorted = this.copyQuestions().sort(byId);
        const start = (page - 1) * perPage;
        return {items: sorted.slice(start, start + perPage), total: sorted.length};
    }

    async findQuestion(id: number): Promise<Question | null> {
        const found = this.questions.find((q) => q.id === id);
        return found ? {...found} : null;
    }

    async deleteQuestion(id: number): Promise<boolean> {
        const before = this.questions.length;
        this.questions = this.questions.filter((q) => q.id !== id);
        return this.questions.length < before;
    }

    async createQuestion(input: NewQuestion): Promise<number> {
        if (!this.categories.some((c) => c.id === input.category)) {
            throw new StoreError(`Category ${input.category} does not exist`);
        }
        const id = ++this.lastId;
        this.questions.push({...input, id});
        return id;
    }

    async searchQuestions(term: string): Promise<Question[]> {
        const needle = term.toLowerCase();
        return this.copyQuestions()
            .filter((q) => q.question.toLowerCase().includes(needle))
            .sort(byId);
    }

    async questionsByCategory(categoryId: number): Promise<Question[]> {
        return this.copyQuestions().filter((q) => q.category === categoryId).sort(byId);
    }

    async quizPool(categoryId: number | null): Promise<Question[]> {
        return categoryId === null ? this.copyQuestions() : this.questionsByCategory(categoryId);
    }

    async clear(): Promise<void> {
        this.categories = [];
        this.questions = [];
        this.lastId = 0;
    }

    async insertCategories(categories: Category[]): Promise<void> {
        this.categories.push(...categories.map((c) => ({...c})));
    }

    async insertQuestions(inputs: NewQuestion[]): Promise<number> {
        for (const input of inputs) {
            this.questions.push({...input, id: ++this.lastId});
        }
        return inputs.length;
    }

    private copyQuestions(): Question[] {
        return this.questions.map((q) => ({...q}));
    }
}
