/**
 * ResponseParser - Turns the model's XML answer into a SuggestedEdit.
 *
 * Anything that cannot be a replacement for the marker is rejected here, so
 * the orchestrator only ever patches with a structurally sane suggestion.
 */

import { SuggestedEdit } from '../types';
import { CURSOR_TOKEN } from './Prompts';

/**
 * The model's answer could not be used.
 */
export class CompletionResponseError extends Error {
  constructor(
    message: string,
    public readonly rawResponse: string
  ) {
    super(message);
    this.name = 'CompletionResponseError';
  }
}

export function parseCompletionXML(raw: string): SuggestedEdit {
  const xml = unwrapResponse(raw);

  const insert = extractXMLTag(xml, 'insert');
  if (insert !== undefined) {
    const text = insert.split(CURSOR_TOKEN).join('');
    if (text.trim() === '') {
      throw new CompletionResponseError('Empty <insert> in completion response', raw);
    }
    return { kind: 'insert', text };
  }

  const search = extractXMLTag(xml, 'search');
  const replace = extractXMLTag(xml, 'replace');
  if (search === undefined && replace === undefined) {
    throw new CompletionResponseError(
      'Completion response has neither <insert> nor <search>/<replace>',
      raw
    );
  }
  if (search === undefined || replace === undefined) {
    throw new CompletionResponseError(
      `Completion response is missing <${search === undefined ? 'search' : 'replace'}>`,
      raw
    );
  }

  const parts = search.split(CURSOR_TOKEN);
  if (parts.length !== 2) {
    throw new CompletionResponseError(
      parts.length < 2
        ? `<search> does not contain ${CURSOR_TOKEN}`
        : `<search> contains ${CURSOR_TOKEN} more than once`,
      raw
    );
  }
  const [before = '', after = ''] = parts;
  const replacement = replace.split(CURSOR_TOKEN).join('');

  if (replacement === before + after) {
    throw new CompletionResponseError('<replace> only removes the cursor', raw);
  }

  return { kind: 'replace', before, after, replacement };
}

/**
 * Strip code fences and anything outside the <response> element.
 */
function unwrapResponse(raw: string): string {
  let text = raw;
  const fenced = text.match(/```[\w-]*\n([\s\S]*?)```/);
  if (fenced?.[1] !== undefined && fenced[1].includes('<response>')) {
    text = fenced[1];
  }
  const response = text.match(/<response>([\s\S]*)<\/response>/);
  return response?.[1] ?? text;
}

/**
 * Contents of the first `<tag>...</tag>`. A single newline right after the
 * opening tag and right before the closing tag is layout, not content.
 */
export function extractXMLTag(xml: string, tag: string): string | undefined {
  const regex = new RegExp(`<${tag}>([\\s\\S]*?)<\\/${tag}>`);
  const match = xml.match(regex);
  if (match?.[1] === undefined) {
    return undefined;
  }

  let value = match[1];
  const cdata = value.match(/^\s*<!\[CDATA\[([\s\S]*)\]\]>\s*$/);
  if (cdata?.[1] !== undefined) {
    value = cdata[1];
  }
  value = value.replace(/^\r?\n/, '');
  value = value.replace(/\r?\n$/, '');
  return value;
}
