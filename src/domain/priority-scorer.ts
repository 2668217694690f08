import { ScoringGroup } from './digest-config';
import { containsAny, searchableText } from './decision-list';

// Groups add up independently; keywords inside one group never stack.
export function scorePriority(title: string, description: string, groups: readonly ScoringGroup[]): number {
    const text = searchableText(title, description);
    return groups.reduce((score, group) => (containsAny(text, group.keywords) ? score + group.weight : score), 0);
}
