export {
  CompletionClient,
  CompletionClientConfig,
  CompletionProvider,
  CompletionStats,
  ProviderResponse,
  errorMessage,
} from './CompletionClient';

export { CompletionResponseError, parseCompletionXML, extractXMLTag } from './ResponseParser';

export {
  CURSOR_TOKEN,
  SYSTEM_PROMPT,
  REMINDER,
  ChatMessage,
  buildCompletionMessages,
} from './Prompts';
