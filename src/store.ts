import {Category, NewQuestion, Page, Question} from "./types";

/** Queries and mutations available inside one store session. */
export interface TriviaRepository {
    listCategories(): Promise<Category[]>;
    paginateQuestions(page: number, perPage: number): Promise<Page<Question>>;
    findQuestion(id: number): Promise<Question | null>;
    deleteQuestion(id: number): Promise<boolean>;
    /** Resolves to the new question's id. Rejects when the category does not exist. */
    createQuestion(input: NewQuestion): Promise<number>;
    /** Case-insensitive substring match on the question text. */
    searchQuestions(term: string): Promise<Question[]>;
    questionsByCategory(categoryId: number): Promise<Question[]>;
    /** Every question when `categoryId` is null, otherwise one category's questions. */
    quizPool(categoryId: number | null): Promise<Question[]>;

    clear(): Promise<void>;
    insertCategories(categories: Category[]): Promise<void>;
    insertQuestions(inputs: NewQuestion[]): Promise<number>;
}

export interface TriviaStore {
    /**
     * Runs `work` against a repository bound to a freshly acquired session.
     * The session is released however `work` settles.
     */
    withSession<T>(work: (repo: TriviaRepository) => Promise<T>): Promise<T>;
}
