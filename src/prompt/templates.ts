/**
 * Prompt Templates
 *
 * One template per generation step. Each step asks for a narrow slice of
 * output with fixed section headers so the response parser can anchor on
 * them. Later steps receive earlier output verbatim and are told not to
 * rewrite it.
 */

import { GenerationContext, GenerationError, StepKind } from '../generation/types';

export interface PromptParts {
    system: string;
    user: string;
}

const dateContext = (today: string): string => {
    const year = today.slice(0, 4);
    return `CURRENT DATE CONTEXT:
Today's date is ${today}. The current year is ${year}. Do not reference earlier years unless the transcript mentions them; say "this year" for current trends.`;
};

const requireTitle = (step: StepKind, context: GenerationContext): string => {
    if (!context.title) {
        throw new GenerationError(step, `The ${step} step needs a confirmed title`);
    }
    return context.title;
};

const examplesSection = (examples?: string): string => examples
    ? `
NEWSLETTER WRITING EXAMPLES:
Match the tone, structure and length of these examples.

${examples}
`
    : '';

const SYSTEM_PROMPT = (showName: string) =>
    `You write publishing copy for ${showName}, a panel discussion show. You work only from the transcript you are given and never invent guests, quotes or facts.`;

const titlesPrompt = (context: GenerationContext): PromptParts => {
    const feedbackBlock = context.feedback
        ? `
FEEDBACK ON THE PREVIOUS OPTIONS:
${context.feedback}

Generate 5 NEW title options that address this feedback.
`
        : '';

    return {
        system: SYSTEM_PROMPT(context.showName),
        user: `${dateContext(context.today)}

TRANSCRIPT:
${context.transcript}
${feedbackBlock}
Create 5 title options that are:
- Keyword-rich for search
- Optimized for curiosity (a question, an emotional trigger or a bold claim)
- Under 60 characters
- About the panel discussion only, not any teaser for a later segment

Use plain text only, no markdown. Format each on its own line as:
TITLE 1: [title]
TITLE 2: [title]
TITLE 3: [title]
TITLE 4: [title]
TITLE 5: [title]`,
    };
};

const descriptionPrompt = (context: GenerationContext): PromptParts => {
    const title = requireTitle('description', context);
    return {
        system: SYSTEM_PROMPT(context.showName),
        user: `${dateContext(context.today)}

The video title is: "${title}"
Every component below must support this title.

TRANSCRIPT:
${context.transcript}

Produce the following YouTube description components. Use PLAIN TEXT ONLY in every component: no **, no __, no links, no headings.

HOOK:
2-3 sentences that create curiosity about the panel discussion.

KEY_TOPICS:
3-5 lines, each starting with "• ", covering the panel discussion only.

TIMESTAMPS:
Chapter markers such as "00:00 - Introduction", one per line, covering the whole transcript. Make the last marker a specific, enticing preview of the segment that follows the panel.

PANELISTS:
One line per panelist: "• Name - Title/Company". Use just the name when no title is mentioned.

KEYWORDS:
5-10 search keywords, comma-separated, on ONE line, no hashtags and nothing after the list.

Start each component with its header exactly as written above (HOOK:, KEY_TOPICS:, TIMESTAMPS:, PANELISTS:, KEYWORDS:).`,
    };
};

const teaserPrompt = (context: GenerationContext): PromptParts => {
    const title = requireTitle('teaser', context);
    const hookBlock = context.hook
        ? `
The published hook for this episode is below. Keep the teaser consistent with it and do not restate it word for word:
${context.hook}
`
        : '';
    return {
        system: SYSTEM_PROMPT(context.showName),
        user: `${dateContext(context.today)}

The video title is: "${title}"
${hookBlock}
TRANSCRIPT:
${context.transcript}
${examplesSection(context.examples)}
Write a newsletter teaser of 2-3 sentences (under 60 words).
- Use markdown: **bold** for one panelist name or key idea, *italics* for a short quote.
- End with a link to the video written exactly as [Watch the discussion →]({{YOUTUBE_URL}}).

Start the section with the header "NEWSLETTER TEASER:".`,
    };
};

const articlePrompt = (context: GenerationContext): PromptParts => {
    const title = requireTitle('article', context);
    const earlier = [
        context.hook ? `HOOK (already published, reuse its framing):\n${context.hook}` : '',
        context.teaser ? `NEWSLETTER TEASER (already published, do not contradict it):\n${context.teaser}` : '',
    ].filter(Boolean).join('\n\n');

    return {
        system: SYSTEM_PROMPT(context.showName),
        user: `${dateContext(context.today)}

The video title is: "${title}"

${earlier}

TRANSCRIPT:
${context.transcript}
${examplesSection(context.examples)}
Write a ~150 word article recapping the panel discussion:
- Give context on the topic, then the key discussion points with specific examples.
- Feature ONE quote from a panelist, using their real name.
- Present contrasting perspectives when they came up.
- End with a clear takeaway and a call to watch the video.

MARKDOWN IS REQUIRED in this article:
- **Bold** panelist names on first mention and 3-5 key terms.
- *Italics* for direct quotes.
- Hyperlinks: the video as [Watch the full discussion]({{YOUTUBE_URL}}), plus companies or products mentioned.

Start the section with the header "BLOG POST:". The first line after it is the headline, exactly:
${title}
Then a blank line, then the article.`,
    };
};

const BUILDERS: Record<StepKind, (context: GenerationContext) => PromptParts> = {
    titles: titlesPrompt,
    description: descriptionPrompt,
    teaser: teaserPrompt,
    article: articlePrompt,
};

export const buildPrompt = (step: StepKind, context: GenerationContext): PromptParts => BUILDERS[step](context);
