/**
 * Prompt text for marker completion.
 *
 * The model sees the document view and the small window with the marker
 * replaced by CURSOR_TOKEN, and answers in XML (see SYSTEM_PROMPT).
 */

import { CompletionContext } from '../types';

export const CURSOR_TOKEN = '<|cursor|>';

export const SYSTEM_PROMPT = `You are a code completion engine embedded in a developer's editor workflow.
The developer typed a marker where they want code written. You see their file with the marker
shown as ${CURSOR_TOKEN}. Write exactly the code that belongs at the cursor.

Output your response in XML format, choosing ONE of the two forms.

Form 1, when only the cursor needs to be filled:
<response>
<insert>code that replaces ${CURSOR_TOKEN}</insert>
</response>

Form 2, when code next to the cursor must change as well:
<response>
<search>a short, exact, contiguous copy of the text around the cursor, including ${CURSOR_TOKEN}</search>
<replace>the same text rewritten, without ${CURSOR_TOKEN}</replace>
</response>

Rules:
- Copy text verbatim. Do not escape characters and do not use CDATA.
- Keep the indentation style of the surrounding code.
- Never explain, never add markdown, never repeat code outside the tags.`;

export const REMINDER = `Answer with a single <response> element using <insert>, or <search> and <replace>. Nothing else.`;

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string };

/**
 * Build the chat messages for one completion request.
 */
export function buildCompletionMessages(context: CompletionContext): ChatMessage[] {
  const fence = context.language !== 'unknown' ? `\`\`\`${context.language}` : '```';
  const header =
    context.language !== 'unknown'
      ? `File: ${context.path}\nLanguage: ${context.language}`
      : `File: ${context.path}`;

  const document = `${context.documentPrefix}${CURSOR_TOKEN}${context.documentSuffix}`;
  const window = `${context.prefix}${CURSOR_TOKEN}${context.suffix}`;

  return [
    { role: 'system', content: SYSTEM_PROMPT },
    {
      role: 'user',
      content: `${header}\n\nDocument:\n${fence}\n${document}\n\`\`\``,
    },
    {
      role: 'user',
      content: `Code around the cursor:\n${fence}\n${window}\n\`\`\``,
    },
    { role: 'user', content: REMINDER },
  ];
}
