import { OpenAI } from 'openai';
import { STEP_TOKEN_BUDGETS } from '@/constants';
import { getLogger } from '@/logging';
import { buildPrompt } from '@/prompt/templates';
import { GenerationConfig, GenerationContext, GenerationError, StepKind } from './types';

export interface Instance {
    generate(step: StepKind, context: GenerationContext): Promise<string>;
}

export const create = (config: GenerationConfig): Instance => {
    const logger = getLogger();
    let client: OpenAI | undefined;

    const getClient = (step: StepKind): OpenAI => {
        if (!config.apiKey) {
            throw new GenerationError(step, 'OPENAI_API_KEY environment variable is not set');
        }
        if (!client) {
            client = new OpenAI({ apiKey: config.apiKey });
        }
        return client;
    };

    const generate = async (step: StepKind, context: GenerationContext): Promise<string> => {
        const prompt = buildPrompt(step, context);
        const openai = getClient(step);
        const maxTokens = config.tokenBudgets?.[step] ?? STEP_TOKEN_BUDGETS[step];

        logger.info('Generating %s with %s...', step, config.model);
        logger.debug('Prompt for %s: %s', step, prompt.user);

        const startTime = Date.now();
        let content: string | null | undefined;
        try {
            const completion = await openai.chat.completions.create({
                model: config.model,
                messages: [
                    { role: 'system', content: prompt.system },
                    { role: 'user', content: prompt.user },
                ],
                max_completion_tokens: maxTokens,
            });
            content = completion.choices[0]?.message?.content;
        } catch (error: unknown) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error('Error calling OpenAI API for %s: %s', step, message);
            throw new GenerationError(step, `Failed to generate ${step}: ${message}`, { cause: error });
        }

        const duration = ((Date.now() - startTime) / 1000).toFixed(1);
        const text = content?.trim();
        if (!text) {
            throw new GenerationError(step, `No ${step} content received from OpenAI`);
        }

        logger.verbose('%s responded in %ss (%d characters)', step, duration, text.length);
        return text;
    };

    return { generate };
};
