import {NextFunction, Request, RequestHandler, Response} from 'express';
import {ApiError, ErrorKind, errorBody, statusOf} from './errors';

export function handle(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
    return (req, res, next) => {
        fn(req, res).catch(next);
    };
}

/** Route ids are non-negative integers; anything else does not name a resource. */
export function parseRouteId(raw: string): number {
    if (!/^\d+$/.test(raw)) {
        throw new ApiError(ErrorKind.NotFound, `Invalid id "${raw}"`);
    }
    return Number(raw);
}

function isBodyParseError(error: unknown): boolean {
    return error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';
}

export function notFound(_req: Request, res: Response): void {
    res.status(statusOf(ErrorKind.NotFound)).json(errorBody(ErrorKind.NotFound));
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
    if (err instanceof ApiError) {
        if (err.kind === ErrorKind.Unprocessable || err.kind === ErrorKind.Internal) {
            console.error(`${req.method} ${req.path}:`, err.message, err.cause ?? '');
        }
        res.status(err.status).json(errorBody(err.kind));
        return;
    }
    if (isBodyParseError(err)) {
        res.status(statusOf(ErrorKind.BadRequest)).json(errorBody(ErrorKind.BadRequest));
        return;
    }
    console.error(`${req.method} ${req.path}:`, err);
    res.status(statusOf(ErrorKind.Unprocessable)).json(errorBody(ErrorKind.Unprocessable));
}
