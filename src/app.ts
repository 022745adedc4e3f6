import express, {Express} from 'express';
import cors from 'cors';
import {errorHandler, notFound} from './http';
import {RandomSource} from './quiz';
import {categoriesRouter} from './routes/categories';
import {questionsRouter} from './routes/questions';
import {quizzesRouter} from './routes/quizzes';
import {TriviaStore} from './store';

const ALLOWED_METHODS = 'GET,POST,PATCH,DELETE,OPTIONS';
const ALLOWED_HEADERS = 'Content-Type';

export interface AppOptions {
    store: TriviaStore;
    questionsPerPage: number;
    /** Source of randomness for quiz draws, Math.random by default */
    random?: RandomSource;
}

export function createApp({store, questionsPerPage, random = Math.random}: AppOptions): Express {
    const app = express();

    // cors() only lists methods and headers on preflight; the client expects them everywhere
    app.use((_req, res, next) => {
        res.header('Access-Control-Allow-Methods', ALLOWED_METHODS);
        res.header('Access-Control-Allow-Headers', ALLOWED_HEADERS);
        next();
    });
    app.use(cors({origin: '*', methods: ALLOWED_METHODS, allowedHeaders: ALLOWED_HEADERS}));
    app.use(express.json());

    app.get('/health', (_req, res) => {
        res.json({success: true});
    });

    app.use(categoriesRouter(store));
    app.use(questionsRouter(store, questionsPerPage));
    app.use(quizzesRouter(store, random));

    app.use(notFound);
    app.use(errorHandler);

    return app;
}
