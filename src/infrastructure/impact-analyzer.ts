import OpenAI from 'openai';
import { Article } from '@/domain/article';
import { DecisionRule, containsAny, decide, searchableText } from '@/domain/decision-list';
import { logger, errorMessage } from '@/utils/logger';

export interface ImpactAnalyzer {
    analyze(article: Article): Promise<string>;
}

const DEFAULT_IMPACT =
    'BUSINESS IMPACT: MEDIUM - Emerging cybersecurity concern. Monitor for developments and assess potential impact on business operations.';

// Any of these routes the text to the HIGH tier; text that hits none of its
// specific rules then gets the default rating, not a lower tier.
const HIGH_IMPACT_TERMS = ['ransomware', 'zero-day', 'critical vulnerability', 'supply chain', 'data breach', 'major breach'];

const isHighImpact = (text: string): boolean => containsAny(text, HIGH_IMPACT_TERMS);

const IMPACT_RULES: DecisionRule<string, string>[] = [
    {
        matches: (text) => text.includes('ransomware'),
        outcome:
            'BUSINESS IMPACT: HIGH - Ransomware can cause complete operational shutdown, significant recovery costs, and regulatory compliance issues. Review backup systems and incident response procedures immediately.',
    },
    {
        matches: (text) => isHighImpact(text) && containsAny(text, ['zero-day', 'zero day']),
        outcome:
            'BUSINESS IMPACT: HIGH - Zero-day vulnerabilities require immediate attention as patches may not be available. Consider additional monitoring and containment measures.',
    },
    {
        matches: (text) => isHighImpact(text) && text.includes('supply chain'),
        outcome:
            'BUSINESS IMPACT: HIGH - Supply chain attacks can compromise entire business ecosystems. Review vendor security assessments and third-party risk management.',
    },
    {
        matches: (text) =>
            isHighImpact(text) && text.includes('breach') && containsAny(text, ['data', 'customer', 'personal', 'credit']),
        outcome:
            'BUSINESS IMPACT: HIGH - Data breaches carry regulatory, financial, and reputational risks. Legal and PR response may be required.',
    },
    {
        matches: isHighImpact,
        outcome: DEFAULT_IMPACT,
    },
    {
        matches: (text) => containsAny(text, ['critical', 'exploit', 'rce', 'remote code execution']),
        outcome:
            'BUSINESS IMPACT: MEDIUM-HIGH - Critical vulnerability requiring prompt attention. Assess exposure and prioritize patching efforts.',
    },
    {
        matches: (text) => containsAny(text, ['vulnerability', 'attack', 'malware', 'phishing']),
        outcome:
            'BUSINESS IMPACT: MEDIUM - Cybersecurity threat requiring attention. Review current security posture and ensure appropriate defenses are in place.',
    },
];

export class KeywordImpactAnalyzer implements ImpactAnalyzer {
    async analyze(article: Article): Promise<string> {
        return decide(IMPACT_RULES, searchableText(article.title, article.description), DEFAULT_IMPACT);
    }
}

export interface OpenAIImpactAnalyzerOptions {
    apiKey: string;
    model?: string;
    maxTokens?: number;
    fallback?: ImpactAnalyzer;
    client?: OpenAI;
}

export class OpenAIImpactAnalyzer implements ImpactAnalyzer {
    private readonly client: OpenAI;
    private readonly model: string;
    private readonly maxTokens: number;
    private readonly fallback: ImpactAnalyzer;

    constructor(options: OpenAIImpactAnalyzerOptions) {
        if (!options.apiKey && !options.client) {
            throw new Error('OpenAI API key is not set');
        }
        this.client = options.client ?? new OpenAI({ apiKey: options.apiKey });
        this.model = options.model || 'gpt-4o-mini';
        this.maxTokens = options.maxTokens ?? 200;
        this.fallback = options.fallback ?? new KeywordImpactAnalyzer();
    }

    async analyze(article: Article): Promise<string> {
        logger.info('Requesting impact analysis from OpenAI', {
            model: this.model,
            title: article.title,
        });

        try {
            const response = await this.client.chat.completions.create({
                model: this.model,
                temperature: 0.3,
                max_tokens: this.maxTokens,
                messages: [
                    {
                        role: 'user',
                        content: this.buildPrompt(article),
                    },
                ],
            });

            const content = response.choices[0]?.message?.content?.trim();
            if (!content) {
                throw new Error('Empty response from OpenAI');
            }
            return content;
        } catch (error) {
            logger.error('OpenAI impact analysis failed, using keyword analysis', {
                title: article.title,
                error: errorMessage(error),
            });
            return this.fallback.analyze(article);
        }
    }

    private buildPrompt(article: Article): string {
        return `Analyze this cybersecurity article for business impact relevant to executives:

Title: ${article.title}
Summary: ${article.description}

Provide a concise one-paragraph summary focusing on:
- Business risk and potential impact
- What executives need to know
- Any action items or implications

Keep it executive-level, avoid technical jargon, focus on business consequences.`;
    }
}
