export enum ErrorKind {
    BadRequest = 'bad_request',
    NotFound = 'not_found',
    Unprocessable = 'unprocessable',
    Internal = 'internal',
}

const STATUS: Record<ErrorKind, number> = {
    [ErrorKind.BadRequest]: 400,
    [ErrorKind.NotFound]: 404,
    [ErrorKind.Unprocessable]: 422,
    [ErrorKind.Internal]: 500,
};

const MESSAGES: Record<ErrorKind, string> = {
    [ErrorKind.BadRequest]: 'Bad request error',
    [ErrorKind.NotFound]: 'Resource not found',
    [ErrorKind.Unprocessable]: 'Unprocessable entity',
    [ErrorKind.Internal]: 'An error has occurred, please try again',
};

export interface ErrorBody {
    success: false;
    error: number;
    message: string;
}

/**
 * An error that already knows which HTTP status it answers with.
 * The message is for logs; clients only ever see the fixed text of the kind.
 */
export class ApiError extends Error {
    constructor(
        public readonly kind: ErrorKind,
        message: string = MESSAGES[kind],
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = this.constructor.name;
        Object.setPrototypeOf(this, new.target.prototype);
    }

    get status(): number {
        return STATUS[this.kind];
    }
}

/** Raised by the store layer for any failure of the underlying data store. */
export class StoreError extends ApiError {
    constructor(message: string, cause?: unknown) {
        super(ErrorKind.Unprocessable, message, {cause});
    }
}

export function statusOf(kind: ErrorKind): number {
    return STATUS[kind];
}

export function errorBody(kind: ErrorKind): ErrorBody {
    return {
        success: false,
        error: STATUS[kind],
        message: MESSAGES[kind],
    };
}
