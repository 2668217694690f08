import { ArticleCategory } from './article';
import { CategoryRule } from './digest-config';
import { decide, keywordRule, searchableText } from './decision-list';

export const DEFAULT_CATEGORY: ArticleCategory = 'cybersecurity';

/**
 * First matching rule wins, so with the default rule order an article that
 * mentions both an AI term and a regulator is filed under `ai`.
 */
export function categorize(title: string, description: string, rules: readonly CategoryRule[]): ArticleCategory {
    const decisionList = rules.map((rule) => keywordRule(rule.keywords, rule.category));
    return decide(decisionList, searchableText(title, description), DEFAULT_CATEGORY);
}
