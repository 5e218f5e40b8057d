export { DEFAULT_MARKER, decodeText, scanMarker, countMarkers } from './MarkerScanner';
export { LanguageDetector, SupportedLanguage } from './LanguageDetector';
export {
  ContextExtractor,
  ContextExtractorOptions,
  DEFAULT_CONTEXT_OPTIONS,
  computeLineStarts,
} from './ContextExtractor';
export { scanProject, ScanOptions, MarkerHit } from './ProjectScanner';
