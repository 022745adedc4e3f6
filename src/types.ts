export interface Category {
    id: number;
    type: string;
}

export interface Question {
    id: number;
    question: string;
    answer: string;
    difficulty: number;
    category: number;
}

export type NewQuestion = Omit<Question, 'id'>;

// Sequence document used to hand out numeric question ids
export interface Counter {
    _id: string;
    seq: number;
}

export interface Page<T> {
    items: T[];
    total: number;
}

/** Category id (as a JSON key) to display label. */
export type CategoryMap = Record<string, string>;

export function formatQuestion(question: Question): Question {
    return {
        id: question.id,
        question: question.question,
        answer: question.answer,
        difficulty: question.difficulty,
        category: question.category,
    };
}

export function toCategoryMap(categories: Category[]): CategoryMap {
    const map: CategoryMap = {};
    for (const category of categories) {
        map[category.id] = category.type;
    }
    return map;
}
