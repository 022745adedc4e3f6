import {Router} from 'express';
import {ApiError, ErrorKind} from '../errors';
import {handle, parseRouteId} from '../http';
import {TriviaStore} from '../store';
import {formatQuestion, toCategoryMap} from '../types';
import {CreateQuestionReq, PageQuery, SearchReq} from '../validation';

export function questionsRouter(store: TriviaStore, questionsPerPage: number): Router {
    const router = Router();

    // GET /questions?page=1
    router.get('/questions', handle(async (req, res) => {
        const query = PageQuery.safeParse(req.query);
        if (!query.success) {
            throw new ApiError(ErrorKind.Unprocessable, `Invalid page: ${query.error.message}`);
        }
        const page = query.data.page ?? 1;
        if (page < 1 || !Number.isSafeInteger(page)) {
            throw new ApiError(ErrorKind.NotFound, `Page ${page} is out of range`);
        }

        const {items, total, categories} = await store.withSession(async (repo) => {
            const questions = await repo.paginateQuestions(page, questionsPerPage);
            return {...questions, categories: await repo.listCategories()};
        });
        if (!items.length || !categories.length) {
            throw new ApiError(ErrorKind.NotFound, `Page ${page} is empty`);
        }

        res.json({
            success: true,
            total_questions: total,
            questions: items.map(formatQuestion),
            categories: toCategoryMap(categories),
            current_category: null,
        });
    }));

    router.delete('/questions/:id', handle(async (req, res) => {
        const id = parseRouteId(req.params.id);
        await store.withSession(async (repo) => {
            const question = await repo.findQuestion(id);
            if (!question) {
                throw new ApiError(ErrorKind.NotFound, `Question ${id} does not exist`);
            }
            if (!(await repo.deleteQuestion(question.id))) {
                throw new ApiError(ErrorKind.NotFound, `Question ${id} was already deleted`);
            }
        });
        res.json({success: true, id});
    }));

    router.post('/questions', handle(async (req, res) => {
        const body = CreateQuestionReq.safeParse(req.body);
        if (!body.success) {
            throw new ApiError(ErrorKind.BadRequest, body.error.message);
        }
        const id = await store.withSession((repo) => repo.createQuestion(body.data));
        res.json({success: true, id});
    }));

    router.post('/questions/search', handle(async (req, res) => {
        const body = SearchReq.safeParse(req.body);
        if (!body.success) {
            throw new ApiError(ErrorKind.Unprocessable, body.error.message);
        }
        const questions = await store.withSession((repo) => repo.searchQuestions(body.data.searchTerm));
        res.json({
            success: true,
            questions: questions.map(formatQuestion),
            total_questions: questions.length,
            current_category: null,
        });
    }));

    return router;
}
