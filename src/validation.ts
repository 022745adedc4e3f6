import {z} from 'zod';

// Accepts 3, 3.9 and " 3 " alike; anything else fails to parse
const integer = z.union([
    z.number().finite().transform(Math.trunc),
    z.string().regex(/^\s*[-+]?\d+\s*$/).transform(Number),
]);

export const PageQuery = z.object({
    page: z.string().regex(/^\s*[-+]?\d+\s*$/).transform(Number).optional(),
});

// Every field must be present and truthy, so a difficulty of 0 is rejected too
export const CreateQuestionReq = z.object({
    question: z.string().min(1),
    answer: z.string().min(1),
    difficulty: integer.pipe(z.number().int().positive()),
    category: integer.pipe(z.number().int().refine((id) => id !== 0)),
});

export const SearchReq = z.object({
    searchTerm: z.string(),
});

export const QuizReq = z.object({
    previous_questions: z.array(z.number().int()),
    quiz_category: z.object({
        id: integer.pipe(z.number().int().nonnegative()),
    }),
});
