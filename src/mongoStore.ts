import mongoose, {ClientSession} from "mongoose";
import {ApiError, StoreError} from "./errors";
import {CategoryModel, CounterModel, QuestionModel} from "./models";
import {escapeRegExp} from "./search";
import {TriviaRepository, TriviaStore} from "./store";
import {Category, Counter, NewQuestion, Page, Question} from "./types";

const CATEGORY_FIELDS = {_id: 0, id: 1, type: 1};
const QUESTION_FIELDS = {_id: 0, id: 1, question: 1, answer: 1, difficulty: 1, category: 1};
const QUESTION_SEQUENCE = 'questions';

async function guard<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
        return await run();
    } catch (error) {
        if (error instanceof ApiError) throw error;
        throw new StoreError(`${operation} failed`, error);
    }
}

class MongoTriviaRepository implements TriviaRepository {
    constructor(private readonly session: ClientSession) {}

    listCategories(): Promise<Category[]> {
        return guard('listCategories', () =>
            CategoryModel.find({}, CATEGORY_FIELDS).sort({id: 1}).session(this.session).lean<Category[]>().exec());
    }

    paginateQuestions(page: number, perPage: number): Promise<Page<Question>> {
        return guard('paginateQuestions', async () => {
            const total = await QuestionModel.countDocuments().session(this.session).exec();
            const offset = (page - 1) * perPage;
            if (offset >= total) return {items: [], total};
            const items = await QuestionModel.find({}, QUESTION_FIELDS)
                .sort({id: 1})
                .skip(offset)
                .limit(perPage)
                .session(this.session)
                .lean<Question[]>()
                .exec();
            return {items, total};
        });
    }

    findQuestion(id: number): Promise<Question | null> {
        return guard('findQuestion', () =>
            QuestionModel.findOne({id}, QUESTION_FIELDS).session(this.session).lean<Question>().exec());
    }

    deleteQuestion(id: number): Promise<boolean> {
        return guard('deleteQuestion', async () => {
            const result = await QuestionModel.deleteOne({id}).session(this.session).exec();
            return result.deletedCount > 0;
        });
    }

    createQuestion(input: NewQuestion): Promise<number> {
        return guard('createQuestion', async () => {
            const category = await CategoryModel.exists({id: input.category}).session(this.session).exec();
            if (!category) {
                throw new StoreError(`Category ${input.category} does not exist`);
            }
            const [id] = await this.reserveIds(1);
            await QuestionModel.create([{...input, id}], {session: this.session});
            return id;
        });
    }

    searchQuestions(term: string): Promise<Question[]> {
        return guard('searchQuestions', () =>
            QuestionModel.find({question: {$regex: escapeRegExp(term), $options: 'i'}}, QUESTION_FIELDS)
                .sort({id: 1})
                .session(this.session)
                .lean<Question[]>()
                .exec());
    }

    questionsByCategory(categoryId: number): Promise<Question[]> {
        return guard('questionsByCategory', () =>
            QuestionModel.find({category: categoryId}, QUESTION_FIELDS)
                .sort({id: 1})
                .session(this.session)
                .lean<Question[]>()
                .exec());
    }

    quizPool(categoryId: number | null): Promise<Question[]> {
        const filter = categoryId === null ? {} : {category: categoryId};
        return guard('quizPool', () =>
            QuestionModel.find(filter, QUESTION_FIELDS).session(this.session).lean<Question[]>().exec());
    }

    clear(): Promise<void> {
        return guard('clear', async () => {
            await CategoryModel.deleteMany({}).session(this.session).exec();
            await QuestionModel.deleteMany({}).session(this.session).exec();
            await CounterModel.deleteMany({}).session(this.session).exec();
        });
    }

    insertCategories(categories: Category[]): Promise<void> {
        return guard('insertCategories', async () => {
            await CategoryModel.insertMany(categories, {session: this.session});
        });
    }

    insertQuestions(inputs: NewQuestion[]): Promise<number> {
        if (!inputs.length) return Promise.resolve(0);
        return guard('insertQuestions', async () => {
            const ids = await this.reserveIds(inputs.length);
            const docs = inputs.map((input, index) => ({...input, id: ids[index]}));
            const inserted = await QuestionModel.insertMany(docs, {session: this.session});
            return inserted.length;
        });
    }

    // Advances the question sequence by `count` and returns the ids handed out
    private async reserveIds(count: number): Promise<number[]> {
        const counter = await CounterModel.findOneAndUpdate(
            {_id: QUESTION_SEQUENCE},
            {$inc: {seq: count}},
            {new: true, upsert: true, session: this.session},
        ).lean<Counter>().exec();
        if (!counter) {
            throw new StoreError('Question id sequence is unavailable');
        }
        const first = counter.seq - count + 1;
        return Array.from({length: count}, (_, offset) => first + offset);
    }
}

export class MongoTriviaStore implements TriviaStore {
    constructor(private readonly connection: mongoose.Connection = mongoose.connection) {}

    async withSession<T>(work: (repo: TriviaRepository) => Promise<T>): Promise<T> {
        const session = await guard('startSession', () => this.connection.startSession());
        try {
            return await work(new MongoTriviaRepository(session));
        } finally {
            await session.endSession();
        }
    }
}
