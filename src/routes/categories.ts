import {Router} from 'express';
import {ApiError, ErrorKind} from '../errors';
import {handle, parseRouteId} from '../http';
import {TriviaStore} from '../store';
import {formatQuestion, toCategoryMap} from '../types';

export function categoriesRouter(store: TriviaStore): Router {
    const router = Router();

    router.get('/categories', handle(async (_req, res) => {
        const categories = await store.withSession((repo) => repo.listCategories());
        if (!categories.length) {
            throw new ApiError(ErrorKind.NotFound, 'No categories');
        }
        res.json({
            success: true,
            categories: toCategoryMap(categories),
        });
    }));

    router.get('/categories/:id/questions', handle(async (req, res) => {
        const id = parseRouteId(req.params.id);
        const questions = await store.withSession((repo) => repo.questionsByCategory(id));
        if (!questions.length) {
            throw new ApiError(ErrorKind.NotFound, `No questions in category ${id}`);
        }
        res.json({
            success: true,
            total_questions: questions.length,
            questions: questions.map(formatQuestion),
            current_category: id,
        });
    }));

    return router;
}
