import {Router} from 'express';
import {ApiError, ErrorKind} from '../errors';
import {handle} from '../http';
import {pickQuizQuestion, RandomSource} from '../quiz';
import {TriviaStore} from '../store';
import {formatQuestion} from '../types';
import {QuizReq} from '../validation';

// quiz_category.id of 0 plays across every category
const ALL_CATEGORIES = 0;

export function quizzesRouter(store: TriviaStore, random: RandomSource): Router {
    const router = Router();

    router.post('/quizzes', handle(async (req, res) => {
        const body = QuizReq.safeParse(req.body);
        if (!body.success) {
            throw new ApiError(ErrorKind.Unprocessable, body.error.message);
        }
        const {previous_questions, quiz_category} = body.data;
        const categoryId = quiz_category.id === ALL_CATEGORIES ? null : quiz_category.id;

        const pool = await store.withSession((repo) => repo.quizPool(categoryId));
        const question = pickQuizQuestion(pool, previous_questions, random);

        res.json({
            success: true,
            question: question ? formatQuestion(question) : null,
        });
    }));

    return router;
}
