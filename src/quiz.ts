export type RandomSource = () => number;

/**
 * Draws one question the player has not seen yet, uniformly at random.
 * Resolves to null once the pool is exhausted, which ends the quiz.
 */
export function pickQuizQuestion<T extends {id: number}>(
    pool: T[],
    previousIds: Iterable<number>,
    random: RandomSource = Math.random,
): T | null {
    const seen = new Set(previousIds);
    const unseen = pool.filter((question) => !seen.has(question.id));
    if (!unseen.length) return null;
    const index = Math.min(Math.floor(random() * unseen.length), unseen.length - 1);
    return unseen[index];
}
