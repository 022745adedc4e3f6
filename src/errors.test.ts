import {describe, expect, it} from 'vitest';
import {ApiError, ErrorKind, StoreError, errorBody, statusOf} from './errors';

describe('errors', () => {
    it('maps every kind to a fixed status', () => {
        expect(statusOf(ErrorKind.BadRequest)).toBe(400);
        expect(statusOf(ErrorKind.NotFound)).toBe(404);
        expect(statusOf(ErrorKind.Unprocessable)).toBe(422);
        expect(statusOf(ErrorKind.Internal)).toBe(500);
    });

    it('builds the error envelope', () => {
        expect(errorBody(ErrorKind.Internal)).toEqual({
            success: false,
            error: 500,
            message: 'An error has occurred, please try again',
        });
    });

    it('defaults the message to the kind text', () => {
        const error = new ApiError(ErrorKind.NotFound);
        expect(error.message).toBe('Resource not found');
        expect(error.status).toBe(404);
        expect(error.name).toBe('ApiError');
    });

    it('keeps the data-store cause on a StoreError', () => {
        const cause = new Error('connection reset');
        const error = new StoreError('findQuestion failed', cause);
        expect(error).toBeInstanceOf(ApiError);
        expect(error.kind).toBe(ErrorKind.Unprocessable);
        expect(error.status).toBe(422);
        expect(error.cause).toBe(cause);
        expect(error.name).toBe('StoreError');
    });
});
