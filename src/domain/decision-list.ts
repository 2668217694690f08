/**
 * Ordered list of (predicate, outcome) rules. Evaluation runs top to bottom
 * and stops at the first rule whose predicate holds.
 */
export interface DecisionRule<TInput, TOutcome> {
    matches: (input: TInput) => boolean;
    outcome: TOutcome;
}

export function decide<TInput, TOutcome>(
    rules: ReadonlyArray<DecisionRule<TInput, TOutcome>>,
    input: TInput,
    fallback: TOutcome,
): TOutcome {
    const rule = rules.find((candidate) => candidate.matches(input));
    return rule ? rule.outcome : fallback;
}

export function containsAny(text: string, terms: readonly string[]): boolean {
    return terms.some((term) => term.length > 0 && text.includes(term.toLowerCase()));
}

export function keywordRule<TOutcome>(
    keywords: readonly string[],
    outcome: TOutcome,
): DecisionRule<string, TOutcome> {
    return {
        matches: (text) => containsAny(text, keywords),
        outcome,
    };
}

export function searchableText(title: string, description: string): string {
    return `${title} ${description}`.toLowerCase();
}
