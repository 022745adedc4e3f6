import {describe, expect, it} from 'vitest';
import {pickQuizQuestion} from './quiz';

const pool = [{id: 1}, {id: 2}, {id: 3}, {id: 4}];

describe('pickQuizQuestion', () => {
    it('never returns a question that was already served', () => {
        for (const r of [0, 0.25, 0.5, 0.75, 0.999]) {
            const picked = pickQuizQuestion(pool, [1, 3], () => r);
            expect(picked).not.toBeNull();
            expect([2, 4]).toContain(picked?.id);
        }
    });

    it('draws uniformly over the unseen questions', () => {
        expect(pickQuizQuestion(pool, [2], () => 0)).toEqual({id: 1});
        expect(pickQuizQuestion(pool, [2], () => 0.4)).toEqual({id: 3});
        expect(pickQuizQuestion(pool, [2], () => 0.9)).toEqual({id: 4});
    });

    it('returns null once every question has been served', () => {
        expect(pickQuizQuestion(pool, [4, 3, 2, 1])).toBeNull();
    });

    it('returns null for an empty pool', () => {
        expect(pickQuizQuestion([], [])).toBeNull();
    });

    it('ignores previous ids that are not in the pool', () => {
        expect(pickQuizQuestion(pool, [7, 8, 1, 2, 3], () => 0.5)).toEqual({id: 4});
    });

    it('stays in range when the random source returns 1', () => {
        expect(pickQuizQuestion(pool, [], () => 1)).toEqual({id: 4});
    });
});
