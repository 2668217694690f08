import { RelevanceRules } from './digest-config';
import { containsAny, searchableText } from './decision-list';

/**
 * Keyword gate over title and description. Matching is plain case-insensitive
 * substring containment, so short terms such as "apt" also hit inside longer
 * words. That over-matching is accepted.
 */
export function isRelevant(title: string, description: string, rules: RelevanceRules): boolean {
    const text = searchableText(title, description);

    if (containsAny(text, rules.exclude_topics)) {
        return false;
    }

    const combinationHit = rules.exclude_combinations.some(
        (terms) => terms.length > 0 && terms.every((term) => text.includes(term.toLowerCase())),
    );
    if (combinationHit) {
        return false;
    }

    const lowerTitle = title.toLowerCase();
    if (rules.exclude_title_prefixes.some((prefix) => prefix && lowerTitle.startsWith(prefix.toLowerCase()))) {
        return false;
    }

    return containsAny(text, rules.focus_areas);
}
